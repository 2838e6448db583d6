import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Answers used in place of the -p / -c prompt. */
export const TransformDefaultsSchema = z.object({
  /** Templatize file and directory names */
  paths: z.boolean().optional(),
  /** Templatize file contents */
  contents: z.boolean().optional(),
});

export const ConfigSchema = z.object({
  /** Globs (root-relative, POSIX separators) skipped by the walker */
  ignore: z.array(z.string()).default(['.git']),
  defaults: withDefaults(TransformDefaultsSchema),
  log_level: LogLevelSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TransformDefaults = z.infer<typeof TransformDefaultsSchema>;
