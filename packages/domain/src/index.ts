export type { User, InviteCode } from './user';
export type {
  TransactionRunner,
  UserRepository,
  InviteCodeRepository,
  InviteCodeInsertResult,
  AccessTokenRepository,
  RandomSource,
  TokenCrypto,
} from './ports';
export { SealingError } from './ports';
export {
  authorizeImpersonation,
  impersonate,
  NO_IMPERSONATION,
  type ImpersonationRequest,
  type ImpersonationDecision,
} from './impersonation';
export {
  UserDirectoryService,
  UserDirectoryError,
  type UserDirectoryServiceDeps,
} from './user-directory-service';
export {
  InviteCodeService,
  InviteCodeError,
  INVITE_CODE_LENGTH,
  INVITE_CODE_PATTERN,
  type InviteCodeServiceDeps,
} from './invite-code-service';
export {
  AccessTokenService,
  AccessTokenError,
  ACCESS_TOKEN_BYTES,
  ACCESS_TOKEN_LENGTH,
  MAX_ACCESS_TOKENS_TO_STORE,
  type AccessTokenServiceDeps,
  type AccessTokenGrant,
} from './access-token-service';
