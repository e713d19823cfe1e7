import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@collab/shared';
import { InviteCodeError, type InviteCodeService, type InviteCode } from '@collab/domain';
import {
  CreateInviteCodeRequestSchema,
  UpdateInviteCodeRequestSchema,
  InviteCodeParamsSchema,
  UserIdParamsSchema,
  type InviteCodeResponse,
} from '@collab/proto';
import { parseInput } from './parse';

const logger = createLogger({ name: 'api:invite-codes' });

interface InviteCodeRouteDeps {
  inviteCodes: InviteCodeService;
}

function mapInviteCodeError(err: unknown): never {
  if (err instanceof InviteCodeError) {
    const codeMap: Record<InviteCodeError['kind'], ErrorCode> = {
      NOT_FOUND: ErrorCode.NOT_FOUND,
      CONFLICT: ErrorCode.CONFLICT,
      BAD_REQUEST: ErrorCode.BAD_REQUEST,
      UNPROCESSABLE_ENTITY: ErrorCode.UNPROCESSABLE_ENTITY,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

function toInviteCodeResponse(invite: InviteCode): InviteCodeResponse {
  return {
    code: invite.code,
    owner_user_id: invite.ownerUserId,
    allowed_usage_count: invite.allowedUsageCount,
    remaining_count: invite.remainingCount,
  };
}

export function registerInviteCodeRoutes(app: FastifyInstance, deps: InviteCodeRouteDeps): void {
  const { inviteCodes } = deps;

  app.get('/users/:id/invite_codes', async (request, reply) => {
    const { id } = parseInput(UserIdParamsSchema, request.params, 'Invalid user id');
    const codes = await inviteCodes.listInviteCodes(id);
    return reply.status(200).send(codes.map(toInviteCodeResponse));
  });

  app.post('/users/:id/invite_codes', async (request, reply) => {
    const { id } = parseInput(UserIdParamsSchema, request.params, 'Invalid user id');
    const body = parseInput(CreateInviteCodeRequestSchema, request.body, 'Invalid invite code data');

    try {
      await inviteCodes.createInviteCode(id, body.allowed_usage_count);
      logger.info(
        { ownerUserId: id, allowedUsageCount: body.allowed_usage_count, requestId: request.id },
        'Invite code created',
      );
      return reply.status(200).send();
    } catch (err) {
      return mapInviteCodeError(err);
    }
  });

  app.put('/invite_codes/:code', async (request, reply) => {
    const { code } = parseInput(InviteCodeParamsSchema, request.params, 'Invalid invite code');
    const body = parseInput(UpdateInviteCodeRequestSchema, request.body, 'Invalid invite code data');

    try {
      await inviteCodes.setRemainingCount(code, body.remaining_count);
      return reply.status(200).send();
    } catch (err) {
      return mapInviteCodeError(err);
    }
  });
}
