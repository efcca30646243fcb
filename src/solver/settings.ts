import { z } from 'zod';
import { loadConfig } from '../config.js';
import { SolverError } from '../error.js';

/**
 * Solver settings.
 */
export const SolverSettingsSchema = z
  .object({
    /** Print solver output */
    verbose: z.boolean().optional(),
    /** Maximum iterations */
    maxIter: z.number().int().positive().optional(),
    /** Time limit in seconds */
    timeLimit: z.number().positive().optional(),
    /** Absolute gap tolerance */
    tolGapAbs: z.number().nonnegative().optional(),
    /** Relative gap tolerance */
    tolGapRel: z.number().nonnegative().optional(),
  })
  .strict();

export type SolverSettings = z.infer<typeof SolverSettingsSchema>;

/**
 * Solve status from the solver.
 */
export type SolveStatus =
  | 'optimal'
  | 'infeasible'
  | 'unbounded'
  | 'infeasible_or_unbounded'
  | 'max_iterations'
  | 'time_limit'
  | 'numerical_error'
  | 'unknown';

/**
 * Validate settings and fill what they leave out from configuration.
 *
 * @throws SolverError on invalid settings
 */
export function resolveSettings(settings: SolverSettings = {}): SolverSettings {
  const parsed = SolverSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`);
    throw new SolverError(`Invalid solver settings: ${issues.join('; ')}`);
  }
  const config = loadConfig();
  return {
    ...parsed.data,
    verbose: parsed.data.verbose ?? config.solver.verbose,
    timeLimit: parsed.data.timeLimit ?? config.solver.timeLimit,
  };
}
