import { z } from 'zod';

export const repoResponseSchema = z.object({
  full_name: z.string(),
  stargazers_count: z.number().int().nonnegative().default(0),
  forks_count: z.number().int().nonnegative().default(0),
  open_issues_count: z.number().int().nonnegative().default(0),
  pushed_at: z.string().nullable().optional(),
  size: z.number().nonnegative().default(0),
  topics: z.array(z.string()).default([]),
  license: z
    .object({
      key: z.string().optional(),
      name: z.string().optional(),
      spdx_id: z.string().nullable().optional()
    })
    .nullable()
    .optional()
});

// README and file lookups share the contents payload
export const contentResponseSchema = z.object({
  content: z.string(),
  encoding: z.string().optional()
});

export const directoryResponseSchema = z.array(z.object({ name: z.string() }));

export const languagesResponseSchema = z.record(z.string(), z.number().nonnegative());

export type RepoResponse = z.infer<typeof repoResponseSchema>;
