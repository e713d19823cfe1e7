import { buildServer } from './server';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  CryptoRandomSource,
  JoseTokenCrypto,
} from '@collab/shared';
import {
  initPool,
  closePool,
  withTransaction,
  PgUserRepository,
  PgInviteCodeRepository,
  PgAccessTokenRepository,
} from '@collab/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({
    connectionString: config.DATABASE_URL,
    maxConnections: config.DATABASE_MAX_CONNECTIONS,
  });

  const app = await buildServer({
    apiToken: config.API_TOKEN,
    userRepo: new PgUserRepository(),
    inviteCodeRepo: new PgInviteCodeRepository(),
    accessTokenRepo: new PgAccessTokenRepository(),
    tokenCrypto: new JoseTokenCrypto(),
    random: new CryptoRandomSource(),
    withTransaction,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ host: config.API_HOST, port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
