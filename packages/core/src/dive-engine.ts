// Deep Sea Adventure - Dive Engine
//
// Runs a single dive as a small state machine (Diving -> Ended). Decisions
// come in one at a time through submitDecision(); each one is validated in
// full before anything changes, so a rejected decision leaves the dive
// exactly as it was.
//
// Turn order within a turn:
// 1. commit to return (for the 'return' action)
// 2. consume oxygen for the acting diver
// 3. roll and move
// 4. offer the tile on the landing position (descending only)
// 5. bank if a returning diver reached the submarine
// 6. hand the turn to the next active diver

import { EventEmitter } from 'events';
import type { Die } from './die.js';
import type { Diver } from './diver.js';
import { ConfigurationError, InvalidActionError } from './errors.js';
import { OxygenTrack } from './oxygen-track.js';
import type { TreasureDeck } from './treasure-deck.js';
import {
  SUBMARINE_POSITION,
  type DiveAction,
  type DiveEndReason,
  type DivePhase,
  type DiveResult,
  type DiveStateSnapshot,
  type TreasureTile,
  type TurnRecord,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface DiveEngineOptions {
  readonly roundNumber: number;
  /** Divers in turn order for this dive */
  readonly divers: readonly Diver[];
  readonly oxygenMax: number;
  readonly deck: TreasureDeck;
  readonly die: Die;
  /** Carried tiles slow the diver down: each one takes a step off the roll */
  readonly weightSlowsMovement?: boolean;
}

export interface TreasureTakenEvent {
  readonly roundNumber: number;
  readonly diverId: string;
  readonly position: number;
  readonly tile: TreasureTile;
}

export interface DiverBankedEvent {
  readonly roundNumber: number;
  readonly diverId: string;
  readonly tiles: readonly TreasureTile[];
}

export interface DiverLostEvent {
  readonly roundNumber: number;
  readonly diverId: string;
  readonly position: number;
  readonly tiles: readonly TreasureTile[];
}

// =============================================================================
// DiveEngine Class
// =============================================================================

export class DiveEngine extends EventEmitter {
  readonly roundNumber: number;
  private readonly turnOrder: readonly string[];
  private readonly divers: Map<string, Diver>;
  private readonly oxygen: OxygenTrack;
  private readonly deck: TreasureDeck;
  private readonly die: Die;
  private readonly weightSlowsMovement: boolean;
  private readonly lootedPositions: Set<number>;
  private readonly turns: TurnRecord[];
  private currentTurnIndex: number;
  private _phase: DivePhase;
  private endReason: DiveEndReason | null;
  private result: DiveResult | null;

  /**
   * Starts a dive: every diver is put back in the submarine.
   * @throws ConfigurationError for an empty or duplicated diver list, or a bad oxygen maximum
   */
  constructor(options: DiveEngineOptions) {
    super();

    if (options.divers.length === 0) {
      throw new ConfigurationError('INVALID_CONFIG', 'A dive needs at least one diver');
    }

    this.roundNumber = options.roundNumber;
    this.oxygen = new OxygenTrack(options.oxygenMax);
    this.deck = options.deck;
    this.die = options.die;
    this.weightSlowsMovement = options.weightSlowsMovement ?? false;

    this.divers = new Map();
    for (const diver of options.divers) {
      if (this.divers.has(diver.id)) {
        throw new ConfigurationError('INVALID_CONFIG', `Duplicate diver id: ${diver.id}`, {
          diverId: diver.id,
        });
      }
      this.divers.set(diver.id, diver);
    }
    this.turnOrder = options.divers.map(d => d.id);

    for (const diver of options.divers) {
      diver.resetForDive();
    }

    this.lootedPositions = new Set();
    this.turns = [];
    this.currentTurnIndex = 0;
    this._phase = 'Diving';
    this.endReason = null;
    this.result = null;
  }

  // ===========================================================================
  // Turn Processing
  // ===========================================================================

  /**
   * Plays the current diver's turn.
   *
   * @param pickUp - take the tile on the landing position, if one is offered
   * @throws InvalidActionError if the decision is illegal (state unchanged)
   */
  submitDecision(diverId: string, action: DiveAction, pickUp = false): DiveStateSnapshot {
    if (this._phase === 'Ended') {
      throw InvalidActionError.diveOver(this.roundNumber);
    }

    if (this.oxygen.isExhausted()) {
      this.endDive('oxygen_exhausted');
      return this.snapshot();
    }

    const diver = this.validateDecision(diverId, action, pickUp);
    this.resolveTurn(diver, action, pickUp);
    return this.snapshot();
  }

  private validateDecision(diverId: string, action: DiveAction, pickUp: boolean): Diver {
    const diver = this.divers.get(diverId);
    if (!diver) {
      throw InvalidActionError.unknownDiver(diverId);
    }
    if (!diver.isActiveThisDive) {
      throw InvalidActionError.diverInactive(diverId);
    }

    const currentDiverId = this.getCurrentDiverId();
    if (diverId !== currentDiverId) {
      throw InvalidActionError.notYourTurn(diverId, currentDiverId);
    }

    switch (action) {
      case 'descend':
        if (diver.isReturning) {
          throw InvalidActionError.alreadyReturning(diverId);
        }
        break;
      case 'ascend':
        if (!diver.isReturning) {
          throw InvalidActionError.notReturning(diverId);
        }
        break;
      case 'return':
        if (diver.isReturning) {
          throw InvalidActionError.alreadyReturning(diverId);
        }
        if (diver.carriedTreasures.length === 0) {
          throw InvalidActionError.noTreasure(diverId);
        }
        break;
      case 'pass':
        break;
    }

    if (pickUp && action !== 'descend') {
      throw InvalidActionError.pickupNotAllowed(diverId, 'treasure is only collected while descending');
    }

    return diver;
  }

  private resolveTurn(diver: Diver, action: DiveAction, pickUp: boolean): void {
    const from = diver.position;
    const oxygenBefore = this.oxygen.remaining;

    if (action === 'return') {
      diver.beginReturn();
    }

    // Air is used before moving, one unit per carried tile and never less than one
    const exhausted = this.oxygen.consume(Math.max(1, diver.carriedTreasures.length));

    if (exhausted) {
      this.recordTurn({
        roundNumber: this.roundNumber,
        diverId: diver.id,
        action,
        roll: null,
        distance: 0,
        from,
        to: from,
        oxygenBefore,
        oxygenAfter: this.oxygen.remaining,
        pickupOffered: false,
        tileTaken: null,
        banked: false,
      });
      this.endDive('oxygen_exhausted');
      return;
    }

    let roll: number | null = null;
    let distance = 0;
    if (action !== 'pass') {
      roll = this.die.rollMovement();
      distance = this.weightSlowsMovement
        ? Math.max(0, roll - diver.carriedTreasures.length)
        : roll;
      const target = diver.isReturning
        ? Math.max(SUBMARINE_POSITION, from - distance)
        : Math.min(this.deck.trackLength, from + distance);
      diver.moveTo(target);
    }
    const to = diver.position;

    let pickupOffered = false;
    let tileTaken: TreasureTile | null = null;
    if (action === 'descend') {
      pickupOffered = this.isTreasureAvailable(to);
      if (pickupOffered && pickUp) {
        tileTaken = this.takeTile(diver, to);
      }
    }

    let banked = false;
    if (diver.isReturning && to === SUBMARINE_POSITION) {
      const tiles = diver.bankTreasures();
      banked = true;
      const event: DiverBankedEvent = { roundNumber: this.roundNumber, diverId: diver.id, tiles };
      this.emit('diver_banked', event);
    }

    this.recordTurn({
      roundNumber: this.roundNumber,
      diverId: diver.id,
      action,
      roll,
      distance,
      from,
      to,
      oxygenBefore,
      oxygenAfter: this.oxygen.remaining,
      pickupOffered,
      tileTaken,
      banked,
    });

    if (!this.advanceTurn()) {
      this.endDive('all_returned');
    }
  }

  private isTreasureAvailable(position: number): boolean {
    if (position === SUBMARINE_POSITION || this.lootedPositions.has(position)) {
      return false;
    }
    const tier = this.deck.peekNextTier(position);
    return tier !== null && this.deck.remaining(tier) > 0;
  }

  private takeTile(diver: Diver, position: number): TreasureTile | null {
    const tier = this.deck.peekNextTier(position);
    if (tier === null) {
      return null;
    }
    const tile = this.deck.drawTile(tier);
    if (tile === null) {
      return null;
    }

    diver.pickUp(tile);
    this.lootedPositions.add(position);

    const event: TreasureTakenEvent = {
      roundNumber: this.roundNumber,
      diverId: diver.id,
      position,
      tile,
    };
    this.emit('treasure_taken', event);
    return tile;
  }

  private recordTurn(turn: TurnRecord): void {
    this.turns.push(turn);
    this.emit('turn_complete', turn);
  }

  /**
   * Moves the cursor to the next active diver, wrapping around the turn order.
   * @returns false when nobody is left to play
   */
  private advanceTurn(): boolean {
    const count = this.turnOrder.length;
    for (let step = 1; step <= count; step++) {
      const index = (this.currentTurnIndex + step) % count;
      const diver = this.divers.get(this.turnOrder[index]);
      if (diver?.isActiveThisDive) {
        this.currentTurnIndex = index;
        return true;
      }
    }
    return false;
  }

  // ===========================================================================
  // Termination
  // ===========================================================================

  private endDive(reason: DiveEndReason): void {
    if (this._phase === 'Ended') {
      return;
    }

    const banked = new Map<string, readonly TreasureTile[]>();
    const lost = new Map<string, readonly TreasureTile[]>();

    for (const diverId of this.turnOrder) {
      const diver = this.divers.get(diverId);
      if (!diver) {
        continue;
      }

      if (diver.isActiveThisDive) {
        const position = diver.position;
        const tiles = diver.markLost();
        lost.set(diverId, tiles);
        const event: DiverLostEvent = { roundNumber: this.roundNumber, diverId, position, tiles };
        this.emit('diver_lost', event);
      } else {
        lost.set(diverId, []);
      }
      banked.set(diverId, [...diver.diveBankedTiles]);
    }

    this._phase = 'Ended';
    this.endReason = reason;
    this.result = { roundNumber: this.roundNumber, endReason: reason, banked, lost };

    this.emit('dive_complete', this.result);
  }

  // ===========================================================================
  // State Access Methods
  // ===========================================================================

  get phase(): DivePhase {
    return this._phase;
  }

  isOver(): boolean {
    return this._phase === 'Ended';
  }

  getCurrentDiverId(): string | null {
    return this._phase === 'Ended' ? null : this.turnOrder[this.currentTurnIndex];
  }

  getOxygenRemaining(): number {
    return this.oxygen.remaining;
  }

  getTurnHistory(): readonly TurnRecord[] {
    return [...this.turns];
  }

  /**
   * Banked and lost tiles per diver.
   * @throws InvalidActionError while the dive is still running
   */
  getDiveResult(): DiveResult {
    if (this.result === null) {
      throw InvalidActionError.resultNotReady(`Result of dive ${this.roundNumber}`);
    }
    return this.result;
  }

  snapshot(): DiveStateSnapshot {
    return {
      roundNumber: this.roundNumber,
      phase: this._phase,
      oxygenRemaining: this.oxygen.remaining,
      oxygenMax: this.oxygen.max,
      currentDiverId: this.getCurrentDiverId(),
      turnOrder: [...this.turnOrder],
      divers: this.turnOrder.flatMap(id => {
        const diver = this.divers.get(id);
        return diver ? [diver.toSnapshot()] : [];
      }),
      remainingByTier: this.deck.remainingByTier(),
      lastTurn: this.turns.length > 0 ? this.turns[this.turns.length - 1] : null,
      endReason: this.endReason,
    };
  }
}
