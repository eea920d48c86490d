import { z } from 'zod';

export const MAX_ROUTES = 64;

export const RouteRowSchema = z.object({
  name: z.string().min(1).max(200),
  weight: z.union([z.number(), z.string().max(50), z.null()]).optional(),
  override: z.string().max(10000).nullable().optional(),
});

export const RouterLayoutBodySchema = z.object({
  routes: z.array(RouteRowSchema).max(MAX_ROUTES),
  enableElse: z.boolean().optional().default(false),
});

export type RouterLayoutBody = z.infer<typeof RouterLayoutBodySchema>;

export const DispatchBodySchema = RouterLayoutBodySchema.extend({
  input: z.unknown().optional(),
});

export type DispatchBody = z.infer<typeof DispatchBodySchema>;
