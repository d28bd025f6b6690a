import { z } from 'zod'
import { ConfigError } from '@domain/errors.ts'
import { LOG_LEVELS, type LogLevel } from '@infrastructure/logging/logger.ts'

export const STRATEGY_KINDS = ['random', 'pantry-first', 'budget'] as const

export type StrategyKind = (typeof STRATEGY_KINDS)[number]

export interface PlannerConfig {
  strategy: StrategyKind
  seed: number
  budget: number | undefined
  logLevel: LogLevel
}

export const DEFAULT_SEED = 42

/** Unset and blank variables both fall back to the default. */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

const EnvSchema = z.object({
  PANTRY_PLANNER_STRATEGY: z.preprocess(blankToUndefined, z.enum(STRATEGY_KINDS).default('random')),
  PANTRY_PLANNER_SEED: z.preprocess(
    blankToUndefined,
    z.coerce.number().int('must be an integer').default(DEFAULT_SEED),
  ),
  PANTRY_PLANNER_BUDGET: z.preprocess(
    blankToUndefined,
    z.coerce.number().finite('must be finite').positive('must be > 0').optional(),
  ),
  PANTRY_PLANNER_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('warn')),
})

/**
 * Read planner settings from environment variables.
 *
 * - PANTRY_PLANNER_STRATEGY: random | pantry-first | budget (default random)
 * - PANTRY_PLANNER_SEED: integer seed for the random strategy (default 42)
 * - PANTRY_PLANNER_BUDGET: positive total budget for the budget strategy
 * - PANTRY_PLANNER_LOG_LEVEL: debug | info | warn | error | silent (default warn)
 */
export function loadPlannerConfig(
  env: Record<string, string | undefined> = process.env,
): PlannerConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    const [issue] = result.error.issues
    const variable = issue.path.join('.')
    throw new ConfigError(`${variable} ${issue.message}`, variable, result.error.issues)
  }

  const parsed = result.data
  return Object.freeze({
    strategy: parsed.PANTRY_PLANNER_STRATEGY,
    seed: parsed.PANTRY_PLANNER_SEED,
    budget: parsed.PANTRY_PLANNER_BUDGET,
    logLevel: parsed.PANTRY_PLANNER_LOG_LEVEL,
  })
}
