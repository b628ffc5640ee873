// Deep Sea Adventure - Console Logger
//
// Subscribes to a session's events and writes a line for each one.

import type { DiverBankedEvent, DiverLostEvent, TreasureTakenEvent } from './dive-engine.js';
import type { DiveScoredEvent, GameSession, SessionStandings } from './game-session.js';
import { sumTileValues, type DiveStateSnapshot, type TurnRecord } from './types.js';

export interface ConsoleLoggerOptions {
  /** Log every turn, not just pickups, banking and results (default true) */
  readonly verbose?: boolean;
}

export function describeTurn(turn: TurnRecord): string {
  const oxygen = `oxygen ${turn.oxygenBefore} -> ${turn.oxygenAfter}`;
  if (turn.roll === null) {
    return `${turn.diverId} ${turn.action}: stays at ${turn.to}, ${oxygen}`;
  }
  return `${turn.diverId} ${turn.action}: rolled ${turn.roll}, ${turn.from} -> ${turn.to}, ${oxygen}`;
}

/**
 * @returns a function that detaches the logger
 */
export function attachConsoleLogger(
  session: GameSession,
  options: ConsoleLoggerOptions = {}
): () => void {
  const verbose = options.verbose ?? true;

  const onDiveStarted = (snapshot: DiveStateSnapshot) =>
    console.log(
      `[dive ${snapshot.roundNumber}] started: oxygen ${snapshot.oxygenMax}, order ${snapshot.turnOrder.join(', ')}`
    );

  const onTurn = (turn: TurnRecord) => {
    if (verbose) {
      console.log(`[dive ${turn.roundNumber}] ${describeTurn(turn)}`);
    }
  };

  const onTreasure = (e: TreasureTakenEvent) =>
    console.log(`[dive ${e.roundNumber}] ${e.diverId} picked up a tier ${e.tile.tier} treasure at ${e.position}`);

  const onBanked = (e: DiverBankedEvent) =>
    console.log(
      `[dive ${e.roundNumber}] ${e.diverId} banked ${e.tiles.length} treasure(s) worth ${sumTileValues(e.tiles)}`
    );

  const onLost = (e: DiverLostEvent) =>
    console.warn(
      `[dive ${e.roundNumber}] ${e.diverId} ran out of air at ${e.position}, losing ${e.tiles.length} treasure(s)`
    );

  const onScored = (e: DiveScoredEvent) => {
    const totals = Array.from(e.totals, ([id, total]) => `${id} ${total}`).join(', ');
    console.log(`[dive ${e.roundNumber}] scores: ${totals}`);
  };

  const onComplete = (standings: SessionStandings) => {
    const { outcome } = standings;
    if (outcome.kind === 'winner') {
      console.log(`Game over! Winner: ${outcome.diverId}`);
    } else {
      console.log(`Game over! Draw between ${outcome.diverIds.join(', ')}`);
    }
  };

  session.on('dive_started', onDiveStarted);
  session.on('turn_complete', onTurn);
  session.on('treasure_taken', onTreasure);
  session.on('diver_banked', onBanked);
  session.on('diver_lost', onLost);
  session.on('dive_scored', onScored);
  session.on('session_complete', onComplete);

  return () => {
    session.off('dive_started', onDiveStarted);
    session.off('turn_complete', onTurn);
    session.off('treasure_taken', onTreasure);
    session.off('diver_banked', onBanked);
    session.off('diver_lost', onLost);
    session.off('dive_scored', onScored);
    session.off('session_complete', onComplete);
  };
}
