export { initPool, closePool, getPool, withTransaction, type PoolOptions } from './client';
export { PgUserRepository } from './repositories/user-repository';
export { PgInviteCodeRepository } from './repositories/invite-code-repository';
export { PgAccessTokenRepository } from './repositories/access-token-repository';
