import { expect } from 'vitest';
import { InvalidActionError, type InvalidActionCode } from '../src/errors.js';
import type { RandomSource } from '../src/random.js';
import type { DiveAction, DiveStateSnapshot } from '../src/types.js';

// =============================================================================
// Random Sources
// =============================================================================

/**
 * Returns the given values in order and fails loudly when it runs dry or a
 * value does not fit the requested range.
 */
export function scriptedRandom(values: readonly number[]): RandomSource & { used(): number } {
  let index = 0;
  return {
    nextInt(maxExclusive: number): number {
      if (index >= values.length) {
        throw new Error(`Scripted random exhausted after ${values.length} values`);
      }
      const value = values[index++];
      if (value < 0 || value >= maxExclusive) {
        throw new Error(`Scripted value ${value} out of range [0, ${maxExclusive})`);
      }
      return value;
    },
    used: () => index,
  };
}

export function constantRandom(value: number): RandomSource {
  return { nextInt: () => value };
}

/**
 * Raw random values that make a pair of three-faced dice total each number:
 * 2 = 1+1, 3 = 2+1, 4 = 3+1, 5 = 3+2, 6 = 3+3.
 */
export function movementScript(...totals: number[]): number[] {
  return totals.flatMap(total => {
    if (total < 2 || total > 6) {
      throw new Error(`Two three-faced dice cannot total ${total}`);
    }
    const first = Math.min(3, total - 1);
    const second = total - first;
    return [first - 1, second - 1];
  });
}

// =============================================================================
// Assertions
// =============================================================================

export function expectInvalid(fn: () => unknown, code: InvalidActionCode): InvalidActionError {
  let caught: unknown = null;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(InvalidActionError);
  if (!(caught instanceof InvalidActionError)) {
    throw new Error('Expected an InvalidActionError');
  }
  expect(caught.code).toBe(code);
  return caught;
}

/**
 * Plays the current diver with a fixed action until the dive ends.
 */
export function playOut(
  submit: (diverId: string, action: DiveAction) => DiveStateSnapshot,
  snapshot: DiveStateSnapshot,
  action: DiveAction = 'pass'
): DiveStateSnapshot {
  let current = snapshot;
  while (current.phase === 'Diving' && current.currentDiverId !== null) {
    current = submit(current.currentDiverId, action);
  }
  return current;
}
