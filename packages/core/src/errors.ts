// Deep Sea Adventure - Errors
//
// InvalidActionError is recoverable: the engine state is unchanged and the
// caller resubmits a corrected decision. ConfigurationError is raised while
// building a deck, oxygen track or session, before any state exists.

export type InvalidActionCode =
  | 'DIVE_OVER'
  | 'NOT_YOUR_TURN'
  | 'UNKNOWN_DIVER'
  | 'DIVER_INACTIVE'
  | 'ALREADY_RETURNING'
  | 'NOT_RETURNING'
  | 'NO_TREASURE'
  | 'PICKUP_NOT_ALLOWED'
  | 'INVALID_MOVE'
  | 'WRONG_ROUND'
  | 'DIVE_IN_PROGRESS'
  | 'NO_ACTIVE_DIVE'
  | 'GAME_OVER'
  | 'RESULT_NOT_READY';

export type ConfigurationErrorCode = 'INVALID_CONFIG' | 'INVALID_DECK' | 'INVALID_OXYGEN';

export type ErrorDetails = Record<string, string | number | boolean | null>;

export abstract class DiveGameError<Code extends string = string> extends Error {
  constructor(
    public readonly code: Code,
    message: string,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InvalidActionError extends DiveGameError<InvalidActionCode> {
  static diveOver(roundNumber: number): InvalidActionError {
    return new InvalidActionError('DIVE_OVER', `Dive ${roundNumber} has already ended`, {
      roundNumber,
    });
  }

  static notYourTurn(diverId: string, currentDiverId: string | null): InvalidActionError {
    return new InvalidActionError(
      'NOT_YOUR_TURN',
      `It is not ${diverId}'s turn (current diver: ${currentDiverId ?? 'none'})`,
      { diverId, currentDiverId }
    );
  }

  static unknownDiver(diverId: string): InvalidActionError {
    return new InvalidActionError('UNKNOWN_DIVER', `Unknown diver: ${diverId}`, { diverId });
  }

  static diverInactive(diverId: string): InvalidActionError {
    return new InvalidActionError(
      'DIVER_INACTIVE',
      `Diver ${diverId} is no longer active this dive`,
      { diverId }
    );
  }

  static alreadyReturning(diverId: string): InvalidActionError {
    return new InvalidActionError(
      'ALREADY_RETURNING',
      `Diver ${diverId} has already turned back this dive`,
      { diverId }
    );
  }

  static notReturning(diverId: string): InvalidActionError {
    return new InvalidActionError(
      'NOT_RETURNING',
      `Diver ${diverId} has not turned back and cannot ascend`,
      { diverId }
    );
  }

  static noTreasure(diverId: string): InvalidActionError {
    return new InvalidActionError(
      'NO_TREASURE',
      `Diver ${diverId} must carry at least one treasure to turn back`,
      { diverId }
    );
  }

  static pickupNotAllowed(diverId: string, reason: string): InvalidActionError {
    return new InvalidActionError('PICKUP_NOT_ALLOWED', `Diver ${diverId} cannot pick up: ${reason}`, {
      diverId,
    });
  }

  static invalidMove(diverId: string, position: number): InvalidActionError {
    return new InvalidActionError(
      'INVALID_MOVE',
      `Invalid position for diver ${diverId}: ${position}`,
      { diverId, position }
    );
  }

  static wrongRound(expected: number, received: number): InvalidActionError {
    return new InvalidActionError('WRONG_ROUND', `Expected dive ${expected}, got ${received}`, {
      expected,
      received,
    });
  }

  static diveInProgress(roundNumber: number): InvalidActionError {
    return new InvalidActionError(
      'DIVE_IN_PROGRESS',
      `Dive ${roundNumber} is still in progress`,
      { roundNumber }
    );
  }

  static noActiveDive(): InvalidActionError {
    return new InvalidActionError('NO_ACTIVE_DIVE', 'No dive has been started yet');
  }

  static gameOver(dives: number): InvalidActionError {
    return new InvalidActionError('GAME_OVER', `All ${dives} dives have been played`, { dives });
  }

  static resultNotReady(what: string): InvalidActionError {
    return new InvalidActionError('RESULT_NOT_READY', `${what} is not available yet`);
  }
}

export class ConfigurationError extends DiveGameError<ConfigurationErrorCode> {}
