import { type AccessTokenRepository } from '@collab/domain';
import { clientOf } from '../client';

export class PgAccessTokenRepository implements AccessTokenRepository {
  async record(tx: unknown, userId: number, tokenHash: string, keep: number): Promise<void> {
    const client = clientOf(tx);
    await client.query(
      `INSERT INTO access_tokens (user_id, hash) VALUES ($1, $2)`,
      [userId, tokenHash],
    );
    await client.query(
      `DELETE FROM access_tokens
       WHERE user_id = $1
         AND id NOT IN (
           SELECT id FROM access_tokens WHERE user_id = $1 ORDER BY id DESC LIMIT $2
         )`,
      [userId, keep],
    );
  }
}
