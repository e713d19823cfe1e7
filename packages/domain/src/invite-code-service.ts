import { type InviteCode } from './user';
import { type InviteCodeRepository, type RandomSource, type TransactionRunner } from './ports';

/** 12 random bytes encode to exactly 16 base64url characters. */
const INVITE_CODE_BYTES = 12;
export const INVITE_CODE_LENGTH = 16;
export const INVITE_CODE_PATTERN = /^[A-Za-z0-9_-]{16}$/;

export interface InviteCodeServiceDeps {
  inviteCodeRepo: InviteCodeRepository;
  random: RandomSource;
  withTransaction: TransactionRunner;
}

export class InviteCodeService {
  constructor(private readonly deps: InviteCodeServiceDeps) {}

  async listInviteCodes(ownerUserId: number): Promise<InviteCode[]> {
    return this.deps.withTransaction((tx) => this.deps.inviteCodeRepo.listByOwner(tx, ownerUserId));
  }

  async createInviteCode(ownerUserId: number, allowedUsageCount: number): Promise<InviteCode> {
    if (!Number.isInteger(allowedUsageCount) || allowedUsageCount < 0) {
      throw new InviteCodeError('BAD_REQUEST', 'allowed_usage_count must be a non-negative integer');
    }

    const code = this.generateCode();
    const result = await this.deps.withTransaction((tx) =>
      this.deps.inviteCodeRepo.create(tx, { code, ownerUserId, allowedUsageCount }),
    );

    switch (result.status) {
      case 'created':
        return result.inviteCode;
      case 'duplicate_code':
        throw new InviteCodeError('CONFLICT', 'Generated invite code collides with an existing one');
      case 'unknown_owner':
        throw new InviteCodeError('NOT_FOUND', 'User not found');
    }
  }

  async setRemainingCount(code: string, remainingCount: number): Promise<void> {
    const { inviteCodeRepo } = this.deps;

    if (!Number.isInteger(remainingCount) || remainingCount < 0) {
      throw new InviteCodeError('BAD_REQUEST', 'remaining_count must be a non-negative integer');
    }

    return this.deps.withTransaction(async (tx) => {
      const invite = await inviteCodeRepo.findByCode(tx, code);
      if (!invite) {
        throw new InviteCodeError('NOT_FOUND', 'Invite code not found');
      }
      if (remainingCount > invite.allowedUsageCount) {
        throw new InviteCodeError(
          'UNPROCESSABLE_ENTITY',
          `remaining_count cannot exceed allowed_usage_count (${invite.allowedUsageCount})`,
        );
      }

      const updated = await inviteCodeRepo.setRemainingCount(tx, code, remainingCount);
      if (!updated) {
        throw new InviteCodeError('NOT_FOUND', 'Invite code not found');
      }
    });
  }

  private generateCode(): string {
    return this.deps.random.token(INVITE_CODE_BYTES);
  }
}

export class InviteCodeError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'CONFLICT' | 'BAD_REQUEST' | 'UNPROCESSABLE_ENTITY',
    message: string,
  ) {
    super(message);
    this.name = 'InviteCodeError';
  }
}
