import { describe, it, expect } from 'vitest';
import { isTopN, loadConfigFromEnv, resolveConfig, screeningConfigDefaults } from '../validations/config';
import { ConfigError } from '../errors';

function configIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveConfig', () => {
  it('should fill every option from the defaults', () => {
    expect(resolveConfig()).toEqual(screeningConfigDefaults);
  });

  it('should return a frozen value', () => {
    const config = resolveConfig({ cpuWorkers: 8 });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.combinationWeights)).toBe(true);
    expect(config.cpuWorkers).toBe(8);
  });

  it('should treat explicit undefined as unset', () => {
    expect(resolveConfig({ batchCount: undefined }).batchCount).toBe(1);
  });

  it('should reject a top N outside 5, 10, 15, 20', () => {
    const issues = configIssues(() => resolveConfig({ topNPerChemical: 7 }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^topNPerChemical: /);
  });

  it('should reject weights that do not sum to one', () => {
    const issues = configIssues(() => resolveConfig({ combinationWeights: { similarity: 0.7 } }));

    expect(issues).toEqual(['combinationWeights: Weights must sum to 1.0']);
  });

  it('should list every invalid option at once', () => {
    const issues = configIssues(() => resolveConfig({ batchCount: 0, cpuWorkers: 1.5 }));

    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['batchCount', 'cpuWorkers']);
  });
});

describe('isTopN', () => {
  it('should accept only the allowed depths', () => {
    expect([5, 10, 15, 20, 7, 0].map(isTopN)).toEqual([true, true, true, true, false, false]);
  });
});

describe('loadConfigFromEnv', () => {
  it('should read SCREENING_* variables', () => {
    const config = loadConfigFromEnv({
      SCREENING_TOP_N: '15',
      SCREENING_CPU_WORKERS: '8',
      SCREENING_FORCE_REBUILD: 'true',
      SCREENING_FORCE_RESCREEN: '0',
      SCREENING_TIMEOUT_MS: '5000',
    });

    expect(config).toMatchObject({
      topNPerChemical: 15,
      cpuWorkers: 8,
      forceRebuild: true,
      forceRescreen: false,
      screeningTimeoutMs: 5000,
      batchCount: 1,
    });
  });

  it('should derive the missing weight from the one given', () => {
    const { combinationWeights } = loadConfigFromEnv({ SCREENING_WEIGHT_SIMILARITY: '0.3' });

    expect(combinationWeights.similarity).toBe(0.3);
    expect(combinationWeights.screening).toBeCloseTo(0.7, 10);
  });

  it('should ignore empty variables', () => {
    expect(loadConfigFromEnv({ SCREENING_TOP_N: '  ' }).topNPerChemical).toBe(10);
  });

  it('should reject values that do not parse', () => {
    expect(configIssues(() => loadConfigFromEnv({ SCREENING_BATCH_COUNT: 'abc' }))).toEqual([
      'SCREENING_BATCH_COUNT: "abc" is not a number',
    ]);
    expect(configIssues(() => loadConfigFromEnv({ SCREENING_FORCE_RESCREEN: 'maybe' }))).toEqual([
      'SCREENING_FORCE_RESCREEN: "maybe" is not a boolean',
    ]);
  });
});
