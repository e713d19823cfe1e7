import {
  type InviteCode,
  type InviteCodeRepository,
  type InviteCodeInsertResult,
} from '@collab/domain';
import { clientOf, pgErrorCode, toDate } from '../client';

const FOREIGN_KEY_VIOLATION = '23503';
const INVITE_COLUMNS = 'code, user_id, allowed_usage_count, remaining_count, created_at';

export class PgInviteCodeRepository implements InviteCodeRepository {
  async listByOwner(tx: unknown, ownerUserId: number): Promise<InviteCode[]> {
    const result = await clientOf(tx).query(
      `SELECT ${INVITE_COLUMNS} FROM invite_codes WHERE user_id = $1 ORDER BY id`,
      [ownerUserId],
    );
    return result.rows.map(mapInviteRow);
  }

  async create(
    tx: unknown,
    invite: { code: string; ownerUserId: number; allowedUsageCount: number },
  ): Promise<InviteCodeInsertResult> {
    try {
      const result = await clientOf(tx).query(
        `INSERT INTO invite_codes (code, user_id, allowed_usage_count, remaining_count)
         VALUES ($1, $2, $3, $3)
         ON CONFLICT (code) DO NOTHING
         RETURNING ${INVITE_COLUMNS}`,
        [invite.code, invite.ownerUserId, invite.allowedUsageCount],
      );
      return result.rows[0]
        ? { status: 'created', inviteCode: mapInviteRow(result.rows[0]) }
        : { status: 'duplicate_code' };
    } catch (err) {
      if (pgErrorCode(err) === FOREIGN_KEY_VIOLATION) {
        return { status: 'unknown_owner' };
      }
      throw err;
    }
  }

  async findByCode(tx: unknown, code: string): Promise<InviteCode | null> {
    const result = await clientOf(tx).query(
      `SELECT ${INVITE_COLUMNS} FROM invite_codes WHERE code = $1`,
      [code],
    );
    return result.rows[0] ? mapInviteRow(result.rows[0]) : null;
  }

  async setRemainingCount(tx: unknown, code: string, remainingCount: number): Promise<boolean> {
    const result = await clientOf(tx).query(
      `UPDATE invite_codes SET remaining_count = $2 WHERE code = $1`,
      [code, remainingCount],
    );
    return (result.rowCount ?? 0) > 0;
  }
}

function mapInviteRow(row: Record<string, unknown>): InviteCode {
  return {
    code: String(row.code),
    ownerUserId: Number(row.user_id),
    allowedUsageCount: Number(row.allowed_usage_count),
    remainingCount: Number(row.remaining_count),
    createdAt: toDate(row.created_at),
  };
}
