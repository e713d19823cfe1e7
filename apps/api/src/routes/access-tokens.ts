import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@collab/shared';
import {
  AccessTokenError,
  NO_IMPERSONATION,
  impersonate,
  type AccessTokenService,
} from '@collab/domain';
import {
  CreateAccessTokenQuerySchema,
  UserLoginParamsSchema,
  type AccessTokenResponse,
} from '@collab/proto';
import { parseInput } from './parse';

const logger = createLogger({ name: 'api:access-tokens' });

interface AccessTokenRouteDeps {
  accessTokens: AccessTokenService;
}

function mapAccessTokenError(err: unknown): never {
  if (err instanceof AccessTokenError) {
    const codeMap: Record<AccessTokenError['kind'], ErrorCode> = {
      NOT_FOUND: ErrorCode.NOT_FOUND,
      UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
      UNPROCESSABLE_ENTITY: ErrorCode.UNPROCESSABLE_ENTITY,
      BAD_REQUEST: ErrorCode.BAD_REQUEST,
      INTERNAL: ErrorCode.INTERNAL,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function registerAccessTokenRoutes(app: FastifyInstance, deps: AccessTokenRouteDeps): void {
  const { accessTokens } = deps;

  // Older clients POST here; both verbs take their parameters from the query string.
  app.route({
    method: ['GET', 'POST'],
    url: '/users/:login/access_tokens',
    handler: async (request, reply) => {
      const { login } = parseInput(UserLoginParamsSchema, request.params, 'Invalid login');
      const query = parseInput(CreateAccessTokenQuerySchema, request.query, 'Invalid access token request');

      try {
        const grant = await accessTokens.createAccessToken({
          subjectLogin: login,
          publicKey: query.public_key,
          impersonation: query.impersonate === undefined ? NO_IMPERSONATION : impersonate(query.impersonate),
        });

        if (grant.impersonatorId !== null) {
          logger.info(
            { impersonatorId: grant.impersonatorId, userId: grant.userId, requestId: request.id },
            'Issued access token for impersonated user',
          );
        }

        const response: AccessTokenResponse = {
          user_id: grant.userId,
          encrypted_access_token: grant.encryptedAccessToken,
        };
        return reply.status(200).send(response);
      } catch (err) {
        return mapAccessTokenError(err);
      }
    },
  });
}
