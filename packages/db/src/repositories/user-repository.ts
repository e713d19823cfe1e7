import { type User, type UserRepository } from '@collab/domain';
import { clientOf, toDate } from '../client';

const USER_COLUMNS = 'id, login, admin, created_at';

export class PgUserRepository implements UserRepository {
  async list(tx: unknown): Promise<User[]> {
    const result = await clientOf(tx).query(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`);
    return result.rows.map(mapUserRow);
  }

  async create(tx: unknown, user: { login: string; admin: boolean }): Promise<number | null> {
    const result = await clientOf(tx).query(
      `INSERT INTO users (login, admin)
       VALUES ($1, $2)
       ON CONFLICT (login) DO NOTHING
       RETURNING id`,
      [user.login, user.admin],
    );
    return result.rows[0] ? Number(result.rows[0].id) : null;
  }

  async findByLogin(tx: unknown, login: string): Promise<User | null> {
    const result = await clientOf(tx).query(
      `SELECT ${USER_COLUMNS} FROM users WHERE login = $1`,
      [login],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: number): Promise<User | null> {
    const result = await clientOf(tx).query(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async setAdmin(tx: unknown, id: number, admin: boolean): Promise<boolean> {
    const result = await clientOf(tx).query(
      `UPDATE users SET admin = $2, updated_at = NOW() WHERE id = $1`,
      [id, admin],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async delete(tx: unknown, id: number): Promise<boolean> {
    const result = await clientOf(tx).query(`DELETE FROM users WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

function mapUserRow(row: Record<string, unknown>): User {
  return {
    id: Number(row.id),
    login: String(row.login),
    admin: Boolean(row.admin),
    createdAt: toDate(row.created_at),
  };
}
