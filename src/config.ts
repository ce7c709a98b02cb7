/**
 * Repository options: schema, defaults, and environment overrides.
 */

import { z } from 'zod';

export const DEFAULT_METADATA_DIR = '.snapvc';

export const RepositoryOptionsSchema = z.object({
  /** Name of the metadata directory at the repository root. */
  metadataDir: z
    .string()
    .min(1)
    .refine((s) => !/[\\/]/.test(s) && s !== '.' && s !== '..', {
      message: 'metadataDir must be a single path segment',
    })
    .default(DEFAULT_METADATA_DIR),
  /** Attempts to take the repository lock before giving up. */
  lockAttempts: z.number().int().positive().default(100),
  /** Base delay between lock attempts; each wait adds up to twice this in jitter. */
  lockRetryDelayMs: z.number().int().nonnegative().default(10),
  /** A lock file older than this is left over from a dead process. */
  lockStaleMs: z.number().int().positive().default(60_000),
  /** Retries for a filesystem call failing with a transient error code. */
  ioRetries: z.number().int().nonnegative().default(5),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type RepositoryOptionsInput = z.input<typeof RepositoryOptionsSchema>;
export type ResolvedOptions = z.output<typeof RepositoryOptionsSchema>;

/**
 * Validate options and fill in defaults.
 *
 * @throws {z.ZodError} If any option is out of range.
 */
export function resolveOptions(input: RepositoryOptionsInput = {}): ResolvedOptions {
  return RepositoryOptionsSchema.parse(input);
}

/**
 * Read option overrides from the environment.
 *
 * `SNAPVC_DIR` sets the metadata directory name and `SNAPVC_LOG_LEVEL`
 * the log level. Unset or empty variables are ignored.
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RepositoryOptionsInput {
  const result: RepositoryOptionsInput = {};
  if (env.SNAPVC_DIR) result.metadataDir = env.SNAPVC_DIR;
  if (env.SNAPVC_LOG_LEVEL) {
    const parsed = RepositoryOptionsSchema.pick({ logLevel: true }).parse({ logLevel: env.SNAPVC_LOG_LEVEL });
    result.logLevel = parsed.logLevel;
  }
  return result;
}
