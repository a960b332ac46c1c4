import { z } from 'zod';

export const HealthResponseSchema = z.object({
  status: z.enum(['ok', 'unhealthy']),
  ytDlp: z.object({
    available: z.boolean(),
    version: z.string().nullable(),
  }),
  uptime: z.number(), // 초 단위
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
