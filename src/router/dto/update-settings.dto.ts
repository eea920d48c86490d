import { z } from 'zod';

export const UpdateRouterSettingsBodySchema = z
  .object({
    overrideSentinels: z.array(z.string().max(50)).max(20).optional(),
    rngSeed: z.string().min(1).max(200).nullable().optional(),
  })
  .strict();

export type UpdateRouterSettingsBody = z.infer<typeof UpdateRouterSettingsBodySchema>;
