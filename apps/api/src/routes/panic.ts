import { type FastifyInstance } from 'fastify';
import { createLogger } from '@collab/shared';
import { PanicReportSchema } from '@collab/proto';

const logger = createLogger({ name: 'api:panic' });

/** Crash reports from clients. Always acknowledged, whatever arrives. */
export function registerPanicRoutes(app: FastifyInstance): void {
  app.post('/panic', async (request, reply) => {
    const parsed = PanicReportSchema.safeParse(request.body);
    if (parsed.success) {
      logger.error({ version: parsed.data.version, text: parsed.data.text, requestId: request.id }, 'Panic report');
    } else {
      logger.warn(
        {
          requestId: request.id,
          issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
        },
        'Malformed panic report',
      );
    }
    return reply.status(200).send();
  });
}
