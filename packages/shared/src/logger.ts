import pino from 'pino';

const REDACTED_KEYS = new Set([
  'token',
  'apitoken',
  'accesstoken',
  'encryptedaccesstoken',
  'secret',
  'publickey',
  'authorization',
  'cookie',
  'password',
  'databaseurl',
]);

const REDACTED = '[REDACTED]';

function isRedactedKey(key: string): boolean {
  return REDACTED_KEYS.has(key.replace(/[_-]/g, '').toLowerCase());
}

export function redactSecrets(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRedactedKey(key)) {
      result[key] = REDACTED;
    } else if (value instanceof Date || value instanceof Error) {
      result[key] = value;
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isPlainRecord(item) ? redactSecrets(item) : item));
    } else if (isPlainRecord(value)) {
      result[key] = redactSecrets(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(redactSecrets(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(redactSecrets(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(redactSecrets(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(redactSecrets(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(redactSecrets(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(redactSecrets(bindings)));
    },
  };
}

/** Level falls back to LOG_LEVEL so module-scoped loggers follow the process config. */
export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
