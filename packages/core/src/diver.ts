// Deep Sea Adventure - Diver

import { InvalidActionError } from './errors.js';
import {
  SUBMARINE_POSITION,
  sumTileValues,
  type DiverSnapshot,
  type TreasureTile,
} from './types.js';

/**
 * Per-player state. Dive flags are reset at the start of every dive;
 * score, banked tiles and tier counts last the whole game.
 */
export class Diver {
  private _position = SUBMARINE_POSITION;
  private carried: TreasureTile[] = [];
  private bankedThisDive: TreasureTile[] = [];
  private _isReturning = false;
  private _hasReturnedThisDive = false;
  private _isActiveThisDive = true;
  private _totalScore = 0;
  private readonly _bankedTiles: TreasureTile[] = [];
  private readonly _tierCounts = new Map<number, number>();

  constructor(
    readonly id: string,
    readonly name: string = id
  ) {}

  // ===========================================================================
  // Dive State
  // ===========================================================================

  get position(): number {
    return this._position;
  }

  get carriedTreasures(): readonly TreasureTile[] {
    return this.carried;
  }

  get isReturning(): boolean {
    return this._isReturning;
  }

  get hasReturnedThisDive(): boolean {
    return this._hasReturnedThisDive;
  }

  get isActiveThisDive(): boolean {
    return this._isActiveThisDive;
  }

  /** Tiles brought back to the submarine in the current dive */
  get diveBankedTiles(): readonly TreasureTile[] {
    return this.bankedThisDive;
  }

  moveTo(newPosition: number): void {
    if (!Number.isInteger(newPosition) || newPosition < SUBMARINE_POSITION) {
      throw InvalidActionError.invalidMove(this.id, newPosition);
    }
    this._position = newPosition;
  }

  pickUp(tile: TreasureTile): void {
    if (!this._isActiveThisDive || this._hasReturnedThisDive) {
      throw InvalidActionError.diverInactive(this.id);
    }
    if (this._position === SUBMARINE_POSITION) {
      throw InvalidActionError.pickupNotAllowed(this.id, 'there is no treasure in the submarine');
    }
    this.carried.push(tile);
  }

  /**
   * Empties the diver's hands.
   * @returns the tiles that were carried (empty on repeat calls)
   */
  dropAll(): TreasureTile[] {
    const dropped = this.carried;
    this.carried = [];
    return dropped;
  }

  /**
   * Commits the diver to heading back. Allowed once per dive, and only with
   * treasure in hand.
   * @throws InvalidActionError without changing any state
   */
  beginReturn(): void {
    if (this._isReturning) {
      throw InvalidActionError.alreadyReturning(this.id);
    }
    if (this.carried.length === 0) {
      throw InvalidActionError.noTreasure(this.id);
    }
    this._isReturning = true;
  }

  /**
   * Moves carried tiles into the dive's banked tiles. The diver is done for
   * the dive afterwards.
   */
  bankTreasures(): readonly TreasureTile[] {
    if (!this._isReturning || this._position !== SUBMARINE_POSITION) {
      throw InvalidActionError.invalidMove(this.id, this._position);
    }
    const banked = this.dropAll();
    this.bankedThisDive.push(...banked);
    this._hasReturnedThisDive = true;
    this._isActiveThisDive = false;
    return banked;
  }

  /**
   * The oxygen ran out before the diver made it back.
   * @returns the tiles lost
   */
  markLost(): TreasureTile[] {
    this._isActiveThisDive = false;
    return this.dropAll();
  }

  resetForDive(): void {
    this._position = SUBMARINE_POSITION;
    this.carried = [];
    this.bankedThisDive = [];
    this._isReturning = false;
    this._hasReturnedThisDive = false;
    this._isActiveThisDive = true;
  }

  // ===========================================================================
  // Game Score
  // ===========================================================================

  get totalScore(): number {
    return this._totalScore;
  }

  get bankedTiles(): readonly TreasureTile[] {
    return this._bankedTiles;
  }

  get tierCounts(): ReadonlyMap<number, number> {
    return this._tierCounts;
  }

  tierCount(tier: number): number {
    return this._tierCounts.get(tier) ?? 0;
  }

  /** Number of banked tiles at or above a tier */
  countAtOrAbove(threshold: number): number {
    let count = 0;
    for (const [tier, n] of this._tierCounts) {
      if (tier >= threshold) {
        count += n;
      }
    }
    return count;
  }

  /**
   * Converts banked tiles into score.
   * @returns the points added
   */
  addScore(tiles: readonly TreasureTile[]): number {
    const points = sumTileValues(tiles);
    this._totalScore += points;
    for (const tile of tiles) {
      this._bankedTiles.push(tile);
      this._tierCounts.set(tile.tier, this.tierCount(tile.tier) + 1);
    }
    return points;
  }

  toSnapshot(): DiverSnapshot {
    return {
      id: this.id,
      name: this.name,
      position: this._position,
      carriedTreasures: [...this.carried],
      isReturning: this._isReturning,
      hasReturnedThisDive: this._hasReturnedThisDive,
      isActiveThisDive: this._isActiveThisDive,
      totalScore: this._totalScore,
    };
  }
}
