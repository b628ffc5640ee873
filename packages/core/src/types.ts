// Deep Sea Adventure - Core Types

// =============================================================================
// Game Constants
// =============================================================================

export const DIVES_PER_GAME = 3;
export const MIN_DIVERS = 1;
export const MAX_DIVERS = 6;
export const DEFAULT_OXYGEN_MAX = 25;
export const DIE_FACES = 3;
export const DICE_PER_MOVE = 2;
export const SUBMARINE_POSITION = 0;

// =============================================================================
// Core Types
// =============================================================================

/** A treasure tile. Higher tiers sit deeper on the track. */
export interface TreasureTile {
  readonly id: string;
  readonly tier: number;
  readonly value: number;
}

/** One depth zone of the track and the tiles that can be found in it */
export interface TierDefinition {
  readonly tier: number;
  /** Number of contiguous track positions belonging to this tier */
  readonly depth: number;
  readonly values: readonly number[];
}

export type DivePhase = 'Diving' | 'Ended';

/**
 * descend: move away from the submarine
 * ascend: move toward the submarine (only once returning)
 * return: commit to returning, then ascend this turn
 * pass: stay in place; oxygen is still consumed
 */
export type DiveAction = 'descend' | 'ascend' | 'return' | 'pass';

export const DIVE_ACTIONS: readonly DiveAction[] = ['descend', 'ascend', 'return', 'pass'] as const;

export type DiveEndReason = 'all_returned' | 'oxygen_exhausted';

/** What happened during one turn */
export interface TurnRecord {
  readonly roundNumber: number;
  readonly diverId: string;
  readonly action: DiveAction;
  /** Sum of the movement dice, null when the diver did not roll */
  readonly roll: number | null;
  readonly distance: number;
  readonly from: number;
  readonly to: number;
  readonly oxygenBefore: number;
  readonly oxygenAfter: number;
  /** A tile was available on the landing position */
  readonly pickupOffered: boolean;
  readonly tileTaken: TreasureTile | null;
  readonly banked: boolean;
}

/** Read-only projection of a diver */
export interface DiverSnapshot {
  readonly id: string;
  readonly name: string;
  readonly position: number;
  readonly carriedTreasures: readonly TreasureTile[];
  readonly isReturning: boolean;
  readonly hasReturnedThisDive: boolean;
  readonly isActiveThisDive: boolean;
  readonly totalScore: number;
}

/** Read-only projection of a dive in progress or ended */
export interface DiveStateSnapshot {
  readonly roundNumber: number;
  readonly phase: DivePhase;
  readonly oxygenRemaining: number;
  readonly oxygenMax: number;
  readonly currentDiverId: string | null;
  readonly turnOrder: readonly string[];
  readonly divers: readonly DiverSnapshot[];
  readonly remainingByTier: ReadonlyMap<number, number>;
  readonly lastTurn: TurnRecord | null;
  readonly endReason: DiveEndReason | null;
}

export interface DiveResult {
  readonly roundNumber: number;
  readonly endReason: DiveEndReason;
  /** Tiles each diver brought back to the submarine */
  readonly banked: ReadonlyMap<string, readonly TreasureTile[]>;
  /** Tiles each diver was carrying when the oxygen ran out */
  readonly lost: ReadonlyMap<string, readonly TreasureTile[]>;
}

// =============================================================================
// Helper Functions
// =============================================================================

export function sumTileValues(tiles: readonly TreasureTile[]): number {
  return tiles.reduce((total, tile) => total + tile.value, 0);
}

export function isDiveAction(value: string): value is DiveAction {
  return DIVE_ACTIONS.some(action => action === value);
}
