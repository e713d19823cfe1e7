import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@collab/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    const context = { requestId: request.id, method: request.method, url: request.url };

    if (error instanceof AppError) {
      logger.warn({ ...context, code: error.code, ...error.safeMeta }, error.message);
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own client errors: malformed JSON, unsupported media type, oversized body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ ...context, fastifyCode: error.code }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ ...context, err: error.message }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}

/** Unknown routes answer 404, but only to callers that pass `guard`. */
export function registerNotFoundHandler(
  app: FastifyInstance,
  guard: (request: FastifyRequest) => Promise<void>,
): void {
  app.setNotFoundHandler(async (request, reply) => {
    await guard(request);
    return reply.status(404).send({
      code: ErrorCode.NOT_FOUND,
      message: `Route ${request.method} ${request.url.split('?')[0]} not found`,
    });
  });
}
