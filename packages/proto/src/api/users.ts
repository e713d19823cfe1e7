import { z } from 'zod';

/** Logins come from an external identity provider and are matched case-sensitively. */
export const LoginSchema = z
  .string()
  .min(1, 'Login is required')
  .max(255, 'Login must be at most 255 characters');

export const UserIdSchema = z.coerce.number().int().positive().max(2_147_483_647);

export const CreateUserRequestSchema = z.object({
  login: LoginSchema,
  admin: z.boolean(),
});

export const UpdateUserRequestSchema = z.object({
  admin: z.boolean(),
});

export const UserIdParamsSchema = z.object({ id: UserIdSchema });

export const UserLoginParamsSchema = z.object({ login: LoginSchema });

export const UserResponseSchema = z.object({
  id: z.number().int(),
  login: z.string(),
  admin: z.boolean(),
});

export type CreateUserRequest = z.infer<typeof CreateUserRequestSchema>;
export type UpdateUserRequest = z.infer<typeof UpdateUserRequestSchema>;
export type UserResponse = z.infer<typeof UserResponseSchema>;
