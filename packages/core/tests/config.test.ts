import { describe, it, expect } from 'vitest';
import {
  loadSeedFromEnv,
  loadSessionConfigFromEnv,
  parseSessionConfig,
} from '../src/config.js';
import { ConfigurationError, type ConfigurationErrorCode } from '../src/errors.js';
import { DEFAULT_TIERS } from '../src/treasure-deck.js';

function expectConfigError(fn: () => unknown, code: ConfigurationErrorCode, message: string): void {
  let caught: unknown = null;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(ConfigurationError);
  if (caught instanceof ConfigurationError) {
    expect(caught.code).toBe(code);
    expect(caught.message).toContain(message);
  }
}

// =============================================================================
// 1. Schema Tests
// =============================================================================

describe('parseSessionConfig', () => {
  it('should fill in defaults', () => {
    const config = parseSessionConfig({ divers: ['A', 'B'] });

    expect(config.divers).toEqual([
      { id: 'A', name: 'A' },
      { id: 'B', name: 'B' },
    ]);
    expect(config.oxygenMax).toBe(25);
    expect(config.tiers).toEqual(DEFAULT_TIERS);
    expect(config.highTierThreshold).toBe(4);
    expect(config.weightSlowsMovement).toBe(false);
  });

  it('should accept divers given as objects', () => {
    const config = parseSessionConfig({
      divers: [{ id: 'a', name: 'Alice' }, { id: 'b' }],
    });
    expect(config.divers).toEqual([
      { id: 'a', name: 'Alice' },
      { id: 'b', name: 'b' },
    ]);
  });

  it('should keep explicit values', () => {
    const config = parseSessionConfig({
      divers: ['A'],
      oxygenMax: 12,
      tiers: [
        { tier: 1, depth: 2, values: [1, 2] },
        { tier: 2, depth: 2, values: [3] },
      ],
      highTierThreshold: 1,
      weightSlowsMovement: true,
    });
    expect(config.oxygenMax).toBe(12);
    expect(config.tiers).toHaveLength(2);
    expect(config.highTierThreshold).toBe(1);
    expect(config.weightSlowsMovement).toBe(true);
  });

  it('should not share the default deck between configs', () => {
    const first = parseSessionConfig({ divers: ['A'] });
    const second = parseSessionConfig({ divers: ['A'] });
    expect(first.tiers).not.toBe(second.tiers);
  });

  it('should reject a zero oxygen maximum and name the field', () => {
    expectConfigError(() => parseSessionConfig({ divers: ['A'], oxygenMax: 0 }), 'INVALID_CONFIG', 'oxygenMax');
  });

  it('should reject a negative oxygen maximum', () => {
    expectConfigError(() => parseSessionConfig({ divers: ['A'], oxygenMax: -5 }), 'INVALID_CONFIG', 'oxygenMax');
  });

  it('should reject an empty diver list', () => {
    expectConfigError(() => parseSessionConfig({ divers: [] }), 'INVALID_CONFIG', 'divers');
  });

  it('should reject more than six divers', () => {
    const divers = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];
    expectConfigError(() => parseSessionConfig({ divers }), 'INVALID_CONFIG', 'divers');
  });

  it('should reject duplicate diver ids', () => {
    expectConfigError(
      () => parseSessionConfig({ divers: ['A', 'B', 'A'] }),
      'INVALID_CONFIG',
      'Duplicate diver id "A"'
    );
  });

  it('should reject a high tier threshold deeper than the deck', () => {
    expectConfigError(
      () => parseSessionConfig({ divers: ['A'], highTierThreshold: 5 }),
      'INVALID_CONFIG',
      'High tier threshold 5 exceeds the deepest tier (4)'
    );
  });

  it('should reject a missing config', () => {
    expect(() => parseSessionConfig(undefined)).toThrow(ConfigurationError);
  });

  it('should run deck validation on custom tiers', () => {
    expectConfigError(
      () =>
        parseSessionConfig({
          divers: ['A'],
          tiers: [
            { tier: 1, depth: 2, values: [6] },
            { tier: 2, depth: 2, values: [2] },
          ],
        }),
      'INVALID_DECK',
      'must not decrease with depth'
    );
  });
});

// =============================================================================
// 2. Environment Tests
// =============================================================================

describe('loadSessionConfigFromEnv', () => {
  it('should read divers and options from the environment', () => {
    const config = loadSessionConfigFromEnv({
      DSA_DIVERS: 'A, B ,C',
      DSA_OXYGEN_MAX: '12',
      DSA_HIGH_TIER_THRESHOLD: '3',
      DSA_WEIGHT_SLOWS_MOVEMENT: 'true',
    });

    expect(config.divers.map(d => d.id)).toEqual(['A', 'B', 'C']);
    expect(config.oxygenMax).toBe(12);
    expect(config.highTierThreshold).toBe(3);
    expect(config.weightSlowsMovement).toBe(true);
  });

  it('should fall back to defaults for unset options', () => {
    const config = loadSessionConfigFromEnv({ DSA_DIVERS: 'A', DSA_OXYGEN_MAX: '' });
    expect(config.oxygenMax).toBe(25);
    expect(config.weightSlowsMovement).toBe(false);
  });

  it('should accept 0 as false', () => {
    const config = loadSessionConfigFromEnv({ DSA_DIVERS: 'A', DSA_WEIGHT_SLOWS_MOVEMENT: '0' });
    expect(config.weightSlowsMovement).toBe(false);
  });

  it('should reject a non-numeric oxygen maximum', () => {
    expectConfigError(
      () => loadSessionConfigFromEnv({ DSA_DIVERS: 'A', DSA_OXYGEN_MAX: 'lots' }),
      'INVALID_CONFIG',
      'oxygenMax'
    );
  });

  it('should reject an unrecognised flag', () => {
    expectConfigError(
      () => loadSessionConfigFromEnv({ DSA_DIVERS: 'A', DSA_WEIGHT_SLOWS_MOVEMENT: 'maybe' }),
      'INVALID_CONFIG',
      'weightSlowsMovement'
    );
  });

  it('should require divers', () => {
    expectConfigError(() => loadSessionConfigFromEnv({}), 'INVALID_CONFIG', 'divers');
  });
});

describe('loadSeedFromEnv', () => {
  it('should return undefined when unset or blank', () => {
    expect(loadSeedFromEnv({})).toBeUndefined();
    expect(loadSeedFromEnv({ DSA_SEED: '  ' })).toBeUndefined();
  });

  it('should parse a hex seed', () => {
    const seed = loadSeedFromEnv({ DSA_SEED: 'ab'.repeat(32) });
    expect(seed?.length).toBe(32);
    expect(seed?.[0]).toBe(0xab);
  });

  it('should reject a malformed seed', () => {
    expectConfigError(() => loadSeedFromEnv({ DSA_SEED: 'xyz' }), 'INVALID_CONFIG', 'DSA_SEED');
  });
});
