// Deep Sea Adventure - Oxygen Track

import { ConfigurationError } from './errors.js';

/**
 * The oxygen supply all divers share during a dive.
 */
export class OxygenTrack {
  private _remaining: number;

  /**
   * @throws ConfigurationError unless max is a positive integer
   */
  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max <= 0) {
      throw new ConfigurationError(
        'INVALID_OXYGEN',
        `Oxygen maximum must be a positive integer, got ${max}`,
        { max }
      );
    }
    this._remaining = max;
  }

  get remaining(): number {
    return this._remaining;
  }

  /**
   * Uses up oxygen, never going below zero.
   * @returns true if the supply is now exhausted
   */
  consume(amount: number): boolean {
    this._remaining = Math.max(0, this._remaining - Math.max(0, amount));
    return this.isExhausted();
  }

  isExhausted(): boolean {
    return this._remaining === 0;
  }
}
