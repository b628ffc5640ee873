// Deep Sea Adventure - Game Session
//
// A game is three dives played back to back. Treasure is restocked for every
// dive, oxygen refilled and divers returned to the submarine; only scores
// and banked tiles carry over.
//
// The whole game is derivable from:
// - the session config
// - the seed
// - the decision history
// so replay() can always rebuild a session from those three.

import { EventEmitter } from 'events';
import { parseSessionConfig, type SessionConfig, type SessionConfigInput } from './config.js';
import { Die } from './die.js';
import { DiveEngine } from './dive-engine.js';
import { Diver } from './diver.js';
import { ConfigurationError, InvalidActionError } from './errors.js';
import {
  createSeededRandom,
  generateRandomSeed,
  SEED_BYTES,
  type RandomSource,
} from './random.js';
import { TreasureDeck } from './treasure-deck.js';
import {
  DIVES_PER_GAME,
  type DiveAction,
  type DiveResult,
  type DiveStateSnapshot,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface GameSessionOptions {
  /** 32-byte seed for every die roll and treasure draw */
  readonly seed?: Uint8Array;
  /** Supply the random source directly instead of a seed (the session then has no seed) */
  readonly random?: RandomSource;
}

export type DecisionResult =
  | { readonly success: true; readonly snapshot: DiveStateSnapshot }
  | { readonly success: false; readonly error: InvalidActionError };

export interface DecisionRecord {
  readonly roundNumber: number;
  readonly diverId: string;
  readonly action: DiveAction;
  readonly pickUp: boolean;
}

export interface DiverStanding {
  readonly id: string;
  readonly name: string;
  readonly totalScore: number;
  /** Banked tiles at or above the configured high tier */
  readonly highTierCount: number;
  readonly tierCounts: ReadonlyMap<number, number>;
}

export type SessionOutcome =
  | { readonly kind: 'winner'; readonly diverId: string }
  | { readonly kind: 'draw'; readonly diverIds: readonly string[] };

export interface SessionStandings {
  /** Ranked by score, then by deepest tier banked; full ties keep the configured order */
  readonly standings: readonly DiverStanding[];
  readonly outcome: SessionOutcome;
}

export interface DiveScoredEvent {
  readonly roundNumber: number;
  readonly points: ReadonlyMap<string, number>;
  readonly totals: ReadonlyMap<string, number>;
}

const FORWARDED_ENGINE_EVENTS = [
  'turn_complete',
  'treasure_taken',
  'diver_banked',
  'diver_lost',
] as const;

// =============================================================================
// GameSession Class
// =============================================================================

export class GameSession extends EventEmitter {
  private readonly config: SessionConfig;
  private readonly seed: Uint8Array | null;
  private readonly random: RandomSource;
  private readonly divers: Diver[];
  private readonly history: DecisionRecord[];
  private engine: DiveEngine | null;
  private roundNumber: number;

  /**
   * @throws ConfigurationError if the config or seed is invalid; nothing is created
   */
  constructor(config: SessionConfigInput, options: GameSessionOptions = {}) {
    super();
    this.config = parseSessionConfig(config);

    if (options.seed !== undefined && options.seed.length !== SEED_BYTES) {
      throw new ConfigurationError(
        'INVALID_CONFIG',
        `Seed must be exactly ${SEED_BYTES} bytes, got ${options.seed.length}`
      );
    }

    if (options.random) {
      if (options.seed !== undefined) {
        throw new ConfigurationError(
          'INVALID_CONFIG',
          'Pass either a seed or a random source, not both'
        );
      }
      this.seed = null;
      this.random = options.random;
    } else {
      this.seed = options.seed ?? generateRandomSeed();
      this.random = createSeededRandom(this.seed);
    }

    this.divers = this.config.divers.map(d => new Diver(d.id, d.name));
    this.history = [];
    this.engine = null;
    this.roundNumber = 0;
  }

  // ===========================================================================
  // Dive Lifecycle
  // ===========================================================================

  /**
   * Starts the next dive with fresh oxygen and a restocked deck.
   * @throws InvalidActionError if a dive is running or the round is not the next one
   */
  startDive(roundNumber: number): DiveStateSnapshot {
    if (this.engine && !this.engine.isOver()) {
      throw InvalidActionError.diveInProgress(this.engine.roundNumber);
    }
    if (this.roundNumber >= DIVES_PER_GAME) {
      throw InvalidActionError.gameOver(DIVES_PER_GAME);
    }
    const expected = this.roundNumber + 1;
    if (roundNumber !== expected) {
      throw InvalidActionError.wrongRound(expected, roundNumber);
    }

    const engine = new DiveEngine({
      roundNumber,
      divers: rotate(this.divers, roundNumber - 1),
      oxygenMax: this.config.oxygenMax,
      deck: new TreasureDeck(this.config.tiers, this.random),
      die: new Die(this.random),
      weightSlowsMovement: this.config.weightSlowsMovement,
    });

    for (const eventName of FORWARDED_ENGINE_EVENTS) {
      engine.on(eventName, (event: unknown) => this.emit(eventName, event));
    }
    engine.on('dive_complete', (result: DiveResult) => this.scoreDive(result));

    this.engine = engine;
    this.roundNumber = roundNumber;

    const snapshot = engine.snapshot();
    this.emit('dive_started', snapshot);
    return snapshot;
  }

  /**
   * Forwards one decision to the running dive. Illegal decisions come back as
   * a failed result and change nothing; the caller asks again.
   */
  submitDecision(diverId: string, action: DiveAction, pickUp = false): DecisionResult {
    try {
      if (!this.engine) {
        throw InvalidActionError.noActiveDive();
      }
      const snapshot = this.engine.submitDecision(diverId, action, pickUp);
      this.history.push({ roundNumber: this.engine.roundNumber, diverId, action, pickUp });
      return { success: true, snapshot };
    } catch (error) {
      if (error instanceof InvalidActionError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private scoreDive(result: DiveResult): void {
    const points = new Map<string, number>();
    const totals = new Map<string, number>();

    for (const diver of this.divers) {
      points.set(diver.id, diver.addScore(result.banked.get(diver.id) ?? []));
      totals.set(diver.id, diver.totalScore);
    }

    this.emit('dive_complete', result);

    const scored: DiveScoredEvent = { roundNumber: result.roundNumber, points, totals };
    this.emit('dive_scored', scored);

    if (result.roundNumber === DIVES_PER_GAME) {
      this.emit('session_complete', this.computeStandings());
    }
  }

  // ===========================================================================
  // Results
  // ===========================================================================

  /**
   * @throws InvalidActionError before a dive has ended
   */
  getDiveResult(): DiveResult {
    if (!this.engine) {
      throw InvalidActionError.noActiveDive();
    }
    return this.engine.getDiveResult();
  }

  /**
   * Final scores and the winner (or draw).
   * @throws InvalidActionError until the last dive has ended
   */
  getSessionStandings(): SessionStandings {
    if (!this.isComplete()) {
      throw InvalidActionError.resultNotReady('Session standings');
    }
    return this.computeStandings();
  }

  private computeStandings(): SessionStandings {
    const ranked = [...this.divers].sort((a, b) => this.compareDivers(a, b));
    return {
      standings: ranked.map(diver => this.toStanding(diver)),
      outcome: this.resolveOutcome(ranked),
    };
  }

  private toStanding(diver: Diver): DiverStanding {
    return {
      id: diver.id,
      name: diver.name,
      totalScore: diver.totalScore,
      highTierCount: diver.countAtOrAbove(this.config.highTierThreshold),
      tierCounts: new Map(diver.tierCounts),
    };
  }

  /**
   * Ranking order: highest score first. Equal scores are compared by how many
   * tiles each diver banked in the deepest tier, then the next tier up, and so
   * on. Returns 0 for divers that tie on everything.
   */
  private compareDivers(a: Diver, b: Diver): number {
    if (a.totalScore !== b.totalScore) {
      return b.totalScore - a.totalScore;
    }
    for (let tier = this.config.tiers.length; tier >= 1; tier--) {
      const diff = b.tierCount(tier) - a.tierCount(tier);
      if (diff !== 0) {
        return diff;
      }
    }
    return 0;
  }

  /**
   * Everyone ranked level with the leader shares the top spot; more than one
   * of them is a draw.
   */
  private resolveOutcome(ranked: readonly Diver[]): SessionOutcome {
    const [leader] = ranked;
    const top = ranked.filter(d => this.compareDivers(leader, d) === 0);

    if (top.length === 1) {
      return { kind: 'winner', diverId: leader.id };
    }
    return { kind: 'draw', diverIds: top.map(d => d.id) };
  }

  // ===========================================================================
  // State Access Methods
  // ===========================================================================

  getRoundNumber(): number {
    return this.roundNumber;
  }

  isComplete(): boolean {
    return this.roundNumber === DIVES_PER_GAME && this.engine !== null && this.engine.isOver();
  }

  getCurrentDive(): DiveStateSnapshot | null {
    return this.engine ? this.engine.snapshot() : null;
  }

  getScores(): Map<string, number> {
    return new Map(this.divers.map(d => [d.id, d.totalScore]));
  }

  getHighTierCounts(): Map<string, number> {
    return new Map(
      this.divers.map(d => [d.id, d.countAtOrAbove(this.config.highTierThreshold)])
    );
  }

  getHistory(): readonly DecisionRecord[] {
    return [...this.history];
  }

  getSeed(): Uint8Array | null {
    return this.seed ? new Uint8Array(this.seed) : null;
  }

  getConfig(): SessionConfig {
    return this.config;
  }

  // ===========================================================================
  // Replay
  // ===========================================================================

  /**
   * Rebuilds a session by replaying recorded decisions against the same seed.
   * Each dive is started as soon as a decision for it comes up.
   * @throws InvalidActionError if the history does not fit the game
   */
  static replay(
    config: SessionConfigInput,
    seed: Uint8Array,
    history: readonly DecisionRecord[]
  ): GameSession {
    const session = new GameSession(config, { seed });

    for (const record of history) {
      while (session.roundNumber < record.roundNumber) {
        session.startDive(session.roundNumber + 1);
      }
      const result = session.submitDecision(record.diverId, record.action, record.pickUp);
      if (!result.success) {
        throw result.error;
      }
    }

    return session;
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Turn order for a dive: the first diver moves along by one seat every dive.
 */
function rotate<T>(items: readonly T[], offset: number): T[] {
  if (items.length === 0) {
    return [];
  }
  const start = offset % items.length;
  return [...items.slice(start), ...items.slice(0, start)];
}
