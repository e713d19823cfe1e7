import { type User, type InviteCode } from './user';

export type TransactionRunner = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface UserRepository {
  list(tx: unknown): Promise<User[]>;
  /** Resolves to the new id, or null when the login is already taken. */
  create(tx: unknown, user: { login: string; admin: boolean }): Promise<number | null>;
  findByLogin(tx: unknown, login: string): Promise<User | null>;
  findById(tx: unknown, id: number): Promise<User | null>;
  setAdmin(tx: unknown, id: number, admin: boolean): Promise<boolean>;
  delete(tx: unknown, id: number): Promise<boolean>;
}

export type InviteCodeInsertResult =
  | { status: 'created'; inviteCode: InviteCode }
  | { status: 'duplicate_code' }
  | { status: 'unknown_owner' };

export interface InviteCodeRepository {
  listByOwner(tx: unknown, ownerUserId: number): Promise<InviteCode[]>;
  create(
    tx: unknown,
    invite: { code: string; ownerUserId: number; allowedUsageCount: number },
  ): Promise<InviteCodeInsertResult>;
  findByCode(tx: unknown, code: string): Promise<InviteCode | null>;
  setRemainingCount(tx: unknown, code: string, remainingCount: number): Promise<boolean>;
}

export interface AccessTokenRepository {
  /** Stores the digest and prunes the user's digests down to the newest `keep`. */
  record(tx: unknown, userId: number, tokenHash: string, keep: number): Promise<void>;
}

export interface RandomSource {
  /** `byteLength` random bytes, base64url-encoded without padding. */
  token(byteLength: number): string;
}

export interface TokenCrypto {
  hashSecret(secret: string): string;
  seal(secret: string, publicKey: string): Promise<string>;
}

export class SealingError extends Error {
  constructor(
    public readonly reason: 'INVALID_PUBLIC_KEY' | 'ENCRYPTION_FAILED',
    message: string,
  ) {
    super(message);
    this.name = 'SealingError';
  }
}
