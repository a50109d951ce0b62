import { z } from 'zod';

/**
 * Project configuration read from `.sexpfmt.yaml`.
 * There are no style settings: the layout is fixed.
 */
export const ConfigSchema = z.object({
  /** Gitignore-style patterns for files never to touch */
  ignore: z.array(z.string()).default([]),
  /** Honour .gitignore and .sexpfmtignore at the project root */
  gitignore: z.boolean().default(true),
  /** Files formatted in parallel (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
