import { z } from 'zod';

export const generateTokenBodySchema = z
  .object({
    entropyBytes: z.number().int().positive().max(1024).optional(),
  })
  .strict();

export const verifyTokenBodySchema = z.object({
  token: z.string().min(1).max(4096),
  remove: z.boolean().default(true),
});

export type GenerateTokenBody = z.infer<typeof generateTokenBodySchema>;
export type VerifyTokenBody = z.infer<typeof verifyTokenBodySchema>;
