export { createLogger, redactSecrets, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  ApiConfigSchema,
} from './config';
export { CryptoRandomSource } from './random';
export { JoseTokenCrypto, parsePublicKey } from './auth/token-crypto';
