import {
  type UserRepository,
  type AccessTokenRepository,
  type RandomSource,
  type TokenCrypto,
  type TransactionRunner,
  SealingError,
} from './ports';
import { authorizeImpersonation, type ImpersonationRequest } from './impersonation';

/**
 * Access token secrets are 48 random bytes, base64url-encoded without padding,
 * so a client always decrypts a 64-character string.
 */
export const ACCESS_TOKEN_BYTES = 48;
export const ACCESS_TOKEN_LENGTH = 64;
export const MAX_ACCESS_TOKENS_TO_STORE = 8;

export interface AccessTokenServiceDeps {
  userRepo: UserRepository;
  accessTokenRepo: AccessTokenRepository;
  tokenCrypto: TokenCrypto;
  random: RandomSource;
  withTransaction: TransactionRunner;
}

export interface AccessTokenGrant {
  userId: number;
  encryptedAccessToken: string;
  /** Id of the admin who requested the token, when it was issued for someone else. */
  impersonatorId: number | null;
}

export class AccessTokenService {
  constructor(private readonly deps: AccessTokenServiceDeps) {}

  async createAccessToken(input: {
    subjectLogin: string;
    publicKey: string;
    impersonation: ImpersonationRequest;
  }): Promise<AccessTokenGrant> {
    const { userRepo, accessTokenRepo, tokenCrypto } = this.deps;
    const { impersonation } = input;

    return this.deps.withTransaction(async (tx) => {
      const subject = await userRepo.findByLogin(tx, input.subjectLogin);
      if (!subject) {
        throw new AccessTokenError('NOT_FOUND', 'User not found');
      }

      const target =
        impersonation.kind === 'login' && subject.admin
          ? await userRepo.findByLogin(tx, impersonation.login)
          : null;

      const decision = authorizeImpersonation(subject, impersonation, target);
      if (decision.outcome === 'not_authorized') {
        throw new AccessTokenError(
          'UNAUTHORIZED',
          'You do not have permission to impersonate other users',
        );
      }
      if (decision.outcome === 'target_missing') {
        throw new AccessTokenError('UNPROCESSABLE_ENTITY', `User ${decision.login} does not exist`);
      }

      const secret = this.generateSecret();
      const encryptedAccessToken = await this.seal(secret, input.publicKey);

      await accessTokenRepo.record(
        tx,
        decision.targetUserId,
        tokenCrypto.hashSecret(secret),
        MAX_ACCESS_TOKENS_TO_STORE,
      );

      return {
        userId: decision.targetUserId,
        encryptedAccessToken,
        impersonatorId: decision.impersonated ? subject.id : null,
      };
    });
  }

  private generateSecret(): string {
    return this.deps.random.token(ACCESS_TOKEN_BYTES);
  }

  private async seal(secret: string, publicKey: string): Promise<string> {
    try {
      return await this.deps.tokenCrypto.seal(secret, publicKey);
    } catch (err) {
      if (!(err instanceof SealingError)) throw err;
      if (err.reason === 'INVALID_PUBLIC_KEY') {
        throw new AccessTokenError('BAD_REQUEST', 'Invalid public key');
      }
      throw new AccessTokenError('INTERNAL', 'Failed to encrypt access token');
    }
  }
}

export class AccessTokenError extends Error {
  constructor(
    public readonly kind:
      | 'NOT_FOUND'
      | 'UNAUTHORIZED'
      | 'UNPROCESSABLE_ENTITY'
      | 'BAD_REQUEST'
      | 'INTERNAL',
    message: string,
  ) {
    super(message);
    this.name = 'AccessTokenError';
  }
}
