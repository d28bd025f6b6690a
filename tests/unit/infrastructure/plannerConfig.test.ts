import { describe, it, expect } from 'vitest'
import { loadPlannerConfig } from '@infrastructure/config/plannerConfig.ts'
import { ConfigError } from '@domain/errors.ts'

describe('loadPlannerConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadPlannerConfig({})).toEqual({
      strategy: 'random',
      seed: 42,
      budget: undefined,
      logLevel: 'warn',
    })
  })

  it('treats blank variables as unset', () => {
    const config = loadPlannerConfig({ PANTRY_PLANNER_SEED: '  ', PANTRY_PLANNER_BUDGET: '' })
    expect(config.seed).toBe(42)
    expect(config.budget).toBeUndefined()
  })

  it('parses every variable', () => {
    const config = loadPlannerConfig({
      PANTRY_PLANNER_STRATEGY: 'budget',
      PANTRY_PLANNER_SEED: '7',
      PANTRY_PLANNER_BUDGET: '25.5',
      PANTRY_PLANNER_LOG_LEVEL: 'debug',
    })
    expect(config).toEqual({ strategy: 'budget', seed: 7, budget: 25.5, logLevel: 'debug' })
  })

  it('returns a frozen config', () => {
    expect(Object.isFrozen(loadPlannerConfig({}))).toBe(true)
  })

  it('rejects unknown strategies', () => {
    expect(() => loadPlannerConfig({ PANTRY_PLANNER_STRATEGY: 'cheapest' })).toThrow(ConfigError)
  })

  it('rejects non-integer seeds', () => {
    expect(() => loadPlannerConfig({ PANTRY_PLANNER_SEED: '1.5' })).toThrow(
      'PANTRY_PLANNER_SEED must be an integer',
    )
  })

  it('rejects non-positive budgets and names the variable', () => {
    try {
      loadPlannerConfig({ PANTRY_PLANNER_BUDGET: '-10' })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.variable).toBe('PANTRY_PLANNER_BUDGET')
        expect(err.message).toBe('PANTRY_PLANNER_BUDGET must be > 0')
      }
    }
  })
})
