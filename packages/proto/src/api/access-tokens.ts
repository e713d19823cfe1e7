import { z } from 'zod';

export const CreateAccessTokenQuerySchema = z.object({
  public_key: z.string().min(1, 'public_key is required'),
  // Left unvalidated: the authorizer answers for empty or unknown logins.
  impersonate: z.string().optional(),
});

export const AccessTokenResponseSchema = z.object({
  user_id: z.number().int(),
  encrypted_access_token: z.string(),
});

export type CreateAccessTokenQuery = z.infer<typeof CreateAccessTokenQuerySchema>;
export type AccessTokenResponse = z.infer<typeof AccessTokenResponseSchema>;
