import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import { DEFAULT_TIERS, TreasureDeck, validateTiers } from '../src/treasure-deck.js';
import type { TierDefinition } from '../src/types.js';
import { constantRandom, scriptedRandom } from './fixtures.js';

function expectDeckError(tiers: readonly TierDefinition[], message: string): void {
  let caught: unknown = null;
  try {
    validateTiers(tiers);
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(ConfigurationError);
  if (caught instanceof ConfigurationError) {
    expect(caught.code).toBe('INVALID_DECK');
    expect(caught.message).toContain(message);
  }
}

// =============================================================================
// 1. Layout Tests
// =============================================================================

describe('TreasureDeck layout', () => {
  const deck = new TreasureDeck(DEFAULT_TIERS, constantRandom(0));

  it('should lay the default deck over 32 positions', () => {
    expect(deck.trackLength).toBe(32);
    expect(deck.tierCount).toBe(4);
  });

  it('should map positions to contiguous tier zones', () => {
    expect(deck.peekNextTier(1)).toBe(1);
    expect(deck.peekNextTier(8)).toBe(1);
    expect(deck.peekNextTier(9)).toBe(2);
    expect(deck.peekNextTier(17)).toBe(3);
    expect(deck.peekNextTier(32)).toBe(4);
  });

  it('should return null for the submarine and beyond the track', () => {
    expect(deck.peekNextTier(0)).toBeNull();
    expect(deck.peekNextTier(33)).toBeNull();
  });

  it('should start with every tile available', () => {
    expect(deck.remainingByTier()).toEqual(
      new Map([
        [1, 8],
        [2, 8],
        [3, 8],
        [4, 8],
      ])
    );
  });

  it('should honour custom zone depths', () => {
    const custom = new TreasureDeck(
      [
        { tier: 1, depth: 2, values: [1] },
        { tier: 2, depth: 5, values: [4] },
      ],
      constantRandom(0)
    );
    expect(custom.trackLength).toBe(7);
    expect(custom.peekNextTier(2)).toBe(1);
    expect(custom.peekNextTier(3)).toBe(2);
    expect(custom.peekNextTier(7)).toBe(2);
  });
});

// =============================================================================
// 2. Drawing Tests
// =============================================================================

describe('TreasureDeck.drawTile', () => {
  it('should remove the drawn tile from its pool', () => {
    const deck = new TreasureDeck(DEFAULT_TIERS, constantRandom(0));

    const tile = deck.drawTile(1);

    expect(tile).toEqual({ id: 'T1-01', tier: 1, value: 0 });
    expect(deck.remaining(1)).toBe(7);
    expect(deck.isConsumed('T1-01')).toBe(true);
    expect(deck.isConsumed('T1-02')).toBe(false);
  });

  it('should pick the tile chosen by the random source', () => {
    const deck = new TreasureDeck(
      [{ tier: 1, depth: 3, values: [4, 5, 6] }],
      scriptedRandom([1, 1])
    );

    expect(deck.drawTile(1)).toEqual({ id: 'T1-02', tier: 1, value: 5 });
    // Pool is now [T1-01, T1-03]
    expect(deck.drawTile(1)).toEqual({ id: 'T1-03', tier: 1, value: 6 });
  });

  it('should never hand out the same tile twice', () => {
    const deck = new TreasureDeck(DEFAULT_TIERS, constantRandom(0));
    const ids = Array.from({ length: 8 }, () => deck.drawTile(4)?.id);

    expect(new Set(ids).size).toBe(8);
    expect(deck.remaining(4)).toBe(0);
  });

  it('should return null once a tier is exhausted', () => {
    const deck = new TreasureDeck([{ tier: 1, depth: 1, values: [4, 5] }], constantRandom(0));

    expect(deck.drawTile(1)).not.toBeNull();
    expect(deck.drawTile(1)).not.toBeNull();
    expect(deck.drawTile(1)).toBeNull();
    expect(deck.remaining(1)).toBe(0);
  });

  it('should return null for an unknown tier', () => {
    const deck = new TreasureDeck(DEFAULT_TIERS, constantRandom(0));
    expect(deck.drawTile(9)).toBeNull();
    expect(deck.remaining(9)).toBe(0);
  });

  it('should leave other tiers untouched', () => {
    const deck = new TreasureDeck(DEFAULT_TIERS, constantRandom(0));
    deck.drawTile(2);
    expect(deck.remainingByTier().get(1)).toBe(8);
    expect(deck.remainingByTier().get(2)).toBe(7);
  });
});

// =============================================================================
// 3. Validation Tests
// =============================================================================

describe('validateTiers', () => {
  it('should accept the default deck', () => {
    expect(() => validateTiers(DEFAULT_TIERS)).not.toThrow();
  });

  it('should reject an empty deck', () => {
    expectDeckError([], 'at least one tier');
  });

  it('should reject tiers out of order', () => {
    expectDeckError(
      [
        { tier: 2, depth: 1, values: [1] },
        { tier: 1, depth: 1, values: [2] },
      ],
      'found tier 2 at position 1'
    );
  });

  it('should reject a zero depth', () => {
    expectDeckError([{ tier: 1, depth: 0, values: [1] }], 'depth of at least 1');
  });

  it('should reject a tier without tiles', () => {
    expectDeckError([{ tier: 1, depth: 2, values: [] }], 'Tier 1 has no tiles');
  });

  it('should reject negative values', () => {
    expectDeckError([{ tier: 1, depth: 2, values: [1, -3] }], 'invalid tile value: -3');
  });

  it('should reject values that decrease with depth', () => {
    expectDeckError(
      [
        { tier: 1, depth: 2, values: [2, 5] },
        { tier: 2, depth: 2, values: [3, 8] },
      ],
      'tier 2 has 3, below 5 in tier 1'
    );
  });

  it('should be enforced by the constructor', () => {
    expect(() => new TreasureDeck([], constantRandom(0))).toThrow(ConfigurationError);
  });
});
