import { timingSafeEqual } from 'node:crypto';
import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@collab/shared';

const SCHEME_PREFIX = 'token ';

/**
 * Shared-secret gate. Every request in the admin scope must carry
 * `Authorization: token <API_TOKEN>`; this is a static credential, not a
 * per-user identity.
 */
export function createApiTokenGate(apiToken: string) {
  const expected = Buffer.from(apiToken);

  return async function validateApiToken(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header) {
      throw new AppError(ErrorCode.BAD_REQUEST, 'Missing authorization header');
    }
    if (!header.startsWith(SCHEME_PREFIX)) {
      throw new AppError(ErrorCode.BAD_REQUEST, 'Invalid authorization header');
    }

    const provided = Buffer.from(header.slice(SCHEME_PREFIX.length));
    if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid authorization token');
    }
  };
}
