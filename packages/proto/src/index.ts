export {
  LoginSchema,
  UserIdSchema,
  CreateUserRequestSchema,
  UpdateUserRequestSchema,
  UserIdParamsSchema,
  UserLoginParamsSchema,
  UserResponseSchema,
  type CreateUserRequest,
  type UpdateUserRequest,
  type UserResponse,
} from './api/users';
export {
  CreateInviteCodeRequestSchema,
  UpdateInviteCodeRequestSchema,
  InviteCodeParamsSchema,
  InviteCodeResponseSchema,
  type CreateInviteCodeRequest,
  type UpdateInviteCodeRequest,
  type InviteCodeResponse,
} from './api/invite-codes';
export {
  CreateAccessTokenQuerySchema,
  AccessTokenResponseSchema,
  type CreateAccessTokenQuery,
  type AccessTokenResponse,
} from './api/access-tokens';
export { PanicReportSchema, type PanicReport } from './api/panic';
