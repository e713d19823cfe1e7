import { z } from 'zod';

const UsageCountSchema = z.number().int().min(0).max(2_147_483_647);

export const CreateInviteCodeRequestSchema = z.object({
  allowed_usage_count: UsageCountSchema,
});

export const UpdateInviteCodeRequestSchema = z.object({
  remaining_count: UsageCountSchema,
});

export const InviteCodeParamsSchema = z.object({
  code: z.string().min(1),
});

export const InviteCodeResponseSchema = z.object({
  code: z.string(),
  owner_user_id: z.number().int(),
  allowed_usage_count: z.number().int(),
  remaining_count: z.number().int(),
});

export type CreateInviteCodeRequest = z.infer<typeof CreateInviteCodeRequestSchema>;
export type UpdateInviteCodeRequest = z.infer<typeof UpdateInviteCodeRequestSchema>;
export type InviteCodeResponse = z.infer<typeof InviteCodeResponseSchema>;
