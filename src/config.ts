import { z } from 'zod';
import { ConfigError } from './error.js';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  LINDSL_LOG_LEVEL: LogLevelSchema.default('silent'),
  LINDSL_SOLVER_TIME_LIMIT: z.coerce.number().positive().optional(),
  LINDSL_SOLVER_VERBOSE: booleanFlag.optional(),
});

/**
 * Library configuration.
 */
export interface Config {
  readonly logLevel: LogLevel;
  readonly solver: {
    /** Time limit in seconds applied when a solve call sets none */
    readonly timeLimit?: number;
    /** Print solver output */
    readonly verbose: boolean;
  };
}

/**
 * Read configuration from environment variables.
 *
 * @example
 * ```ts
 * const config = loadConfig({ LINDSL_LOG_LEVEL: 'debug' });
 * config.logLevel; // 'debug'
 * ```
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): Config {
  const parsed = EnvSchema.safeParse({
    LINDSL_LOG_LEVEL: env.LINDSL_LOG_LEVEL,
    LINDSL_SOLVER_TIME_LIMIT: env.LINDSL_SOLVER_TIME_LIMIT,
    LINDSL_SOLVER_VERBOSE: env.LINDSL_SOLVER_VERBOSE,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  return {
    logLevel: parsed.data.LINDSL_LOG_LEVEL,
    solver: {
      timeLimit: parsed.data.LINDSL_SOLVER_TIME_LIMIT,
      verbose: parsed.data.LINDSL_SOLVER_VERBOSE ?? false,
    },
  };
}
