import { z } from 'zod';

export const assessSchema = z.object({
  repoUrl: z.string().trim().url()
});

export type AssessInput = z.infer<typeof assessSchema>;
