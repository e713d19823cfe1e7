import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger } from '@collab/shared';
import {
  UserDirectoryService,
  InviteCodeService,
  AccessTokenService,
  type UserRepository,
  type InviteCodeRepository,
  type AccessTokenRepository,
  type TokenCrypto,
  type RandomSource,
  type TransactionRunner,
} from '@collab/domain';
import { registerErrorHandler, registerNotFoundHandler } from './plugins/error-handler';
import { createApiTokenGate } from './plugins/api-token';
import { registerUserRoutes } from './routes/users';
import { registerInviteCodeRoutes } from './routes/invite-codes';
import { registerAccessTokenRoutes } from './routes/access-tokens';
import { registerPanicRoutes } from './routes/panic';

const logger = createLogger({ name: 'api' });

/** Everything the handlers need, built once at startup and never mutated. */
export interface ServerDeps {
  apiToken: string;
  userRepo: UserRepository;
  inviteCodeRepo: InviteCodeRepository;
  accessTokenRepo: AccessTokenRepository;
  tokenCrypto: TokenCrypto;
  random: RandomSource;
  withTransaction: TransactionRunner;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    // Fits a 255-character login even when each character percent-encodes to 9
    maxParamLength: 2_560,
  });

  const apiTokenGate = createApiTokenGate(deps.apiToken);

  registerErrorHandler(app);
  registerNotFoundHandler(app, apiTokenGate);

  const { userRepo, inviteCodeRepo, accessTokenRepo, tokenCrypto, random, withTransaction } = deps;

  const userDirectory = new UserDirectoryService({ userRepo, withTransaction });
  const inviteCodes = new InviteCodeService({ inviteCodeRepo, random, withTransaction });
  const accessTokens = new AccessTokenService({
    userRepo,
    accessTokenRepo,
    tokenCrypto,
    random,
    withTransaction,
  });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await app.register(async (admin) => {
    admin.addHook('onRequest', apiTokenGate);

    registerUserRoutes(admin, { userDirectory });
    registerInviteCodeRoutes(admin, { inviteCodes });
    registerAccessTokenRoutes(admin, { accessTokens });
    registerPanicRoutes(admin);
  });

  return app;
}
