// Deep Sea Adventure - Treasure Deck
//
// The track is split into contiguous tier zones laid out shallow to deep:
// with the default deck, positions 1-8 are tier 1, 9-16 tier 2, and so on.
// Every tier owns a pool of tiles; landing on a zone draws from its pool.

import { ConfigurationError } from './errors.js';
import type { RandomSource } from './random.js';
import { SUBMARINE_POSITION, type TierDefinition, type TreasureTile } from './types.js';

// =============================================================================
// Default Deck
// =============================================================================

export const DEFAULT_TIERS: readonly TierDefinition[] = [
  { tier: 1, depth: 8, values: [0, 0, 1, 1, 2, 2, 3, 3] },
  { tier: 2, depth: 8, values: [4, 4, 5, 5, 6, 6, 7, 7] },
  { tier: 3, depth: 8, values: [8, 8, 9, 9, 10, 10, 11, 11] },
  { tier: 4, depth: 8, values: [12, 12, 13, 13, 14, 14, 15, 15] },
] as const;

interface TierZone {
  readonly tier: number;
  /** First track position of the zone (inclusive) */
  readonly start: number;
  /** Last track position of the zone (inclusive) */
  readonly end: number;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Checks a deck layout.
 * @throws ConfigurationError describing the first problem found
 */
export function validateTiers(tiers: readonly TierDefinition[]): void {
  if (tiers.length === 0) {
    throw new ConfigurationError('INVALID_DECK', 'A deck needs at least one tier');
  }

  let previousMax = -Infinity;
  tiers.forEach((definition, index) => {
    const expectedTier = index + 1;
    if (definition.tier !== expectedTier) {
      throw new ConfigurationError(
        'INVALID_DECK',
        `Tiers must be numbered 1..${tiers.length} in order; found tier ${definition.tier} at position ${expectedTier}`,
        { tier: definition.tier }
      );
    }
    if (!Number.isInteger(definition.depth) || definition.depth < 1) {
      throw new ConfigurationError(
        'INVALID_DECK',
        `Tier ${definition.tier} needs a depth of at least 1 position, got ${definition.depth}`,
        { tier: definition.tier }
      );
    }
    if (definition.values.length === 0) {
      throw new ConfigurationError(
        'INVALID_DECK',
        `Tier ${definition.tier} has no tiles`,
        { tier: definition.tier }
      );
    }
    for (const value of definition.values) {
      if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(
          'INVALID_DECK',
          `Tier ${definition.tier} has an invalid tile value: ${value}`,
          { tier: definition.tier }
        );
      }
    }

    const min = Math.min(...definition.values);
    if (min < previousMax) {
      throw new ConfigurationError(
        'INVALID_DECK',
        `Tile values must not decrease with depth: tier ${definition.tier} has ${min}, below ${previousMax} in tier ${definition.tier - 1}`,
        { tier: definition.tier }
      );
    }
    previousMax = Math.max(...definition.values);
  });
}

// =============================================================================
// TreasureDeck Class
// =============================================================================

export class TreasureDeck {
  private readonly zones: TierZone[];
  private readonly pools: Map<number, TreasureTile[]>;
  private readonly consumed: Set<string>;
  readonly trackLength: number;

  /**
   * @throws ConfigurationError if the layout is invalid
   */
  constructor(
    readonly tiers: readonly TierDefinition[],
    private readonly random: RandomSource
  ) {
    validateTiers(tiers);

    this.zones = [];
    this.pools = new Map();
    this.consumed = new Set();

    let start = SUBMARINE_POSITION + 1;
    for (const definition of tiers) {
      const end = start + definition.depth - 1;
      this.zones.push({ tier: definition.tier, start, end });
      start = end + 1;

      this.pools.set(
        definition.tier,
        definition.values.map((value, i) => ({
          id: `T${definition.tier}-${String(i + 1).padStart(2, '0')}`,
          tier: definition.tier,
          value,
        }))
      );
    }
    this.trackLength = start - 1;
  }

  /**
   * Tier of the zone holding a track position, or null for the submarine
   * and anything past the end of the track.
   */
  peekNextTier(position: number): number | null {
    const zone = this.zones.find(z => position >= z.start && position <= z.end);
    return zone ? zone.tier : null;
  }

  /**
   * Removes and returns a random unconsumed tile of the tier.
   * Returns null when the tier is exhausted (or unknown).
   */
  drawTile(tier: number): TreasureTile | null {
    const pool = this.pools.get(tier);
    if (!pool || pool.length === 0) {
      return null;
    }

    const index = this.random.nextInt(pool.length);
    const [tile] = pool.splice(index, 1);
    this.consumed.add(tile.id);
    return tile;
  }

  remaining(tier: number): number {
    return this.pools.get(tier)?.length ?? 0;
  }

  remainingByTier(): Map<number, number> {
    const result = new Map<number, number>();
    for (const [tier, pool] of this.pools) {
      result.set(tier, pool.length);
    }
    return result;
  }

  isConsumed(tileId: string): boolean {
    return this.consumed.has(tileId);
  }

  get tierCount(): number {
    return this.tiers.length;
  }
}
