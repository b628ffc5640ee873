// Deep Sea Adventure - Die

import type { RandomSource } from './random.js';
import { DICE_PER_MOVE, DIE_FACES } from './types.js';

/**
 * A die numbered 1..faces. The game uses two three-faced dice per move.
 */
export class Die {
  constructor(
    private readonly random: RandomSource,
    readonly faces: number = DIE_FACES
  ) {}

  roll(): number {
    return 1 + this.random.nextInt(this.faces);
  }

  /** Endless lazy sequence of rolls */
  *rolls(): Generator<number, never, undefined> {
    while (true) {
      yield this.roll();
    }
  }

  /**
   * Movement roll: the sum of two independent rolls (2..6 with the default faces).
   */
  rollMovement(): number {
    let total = 0;
    for (let i = 0; i < DICE_PER_MOVE; i++) {
      total += this.roll();
    }
    return total;
  }
}
