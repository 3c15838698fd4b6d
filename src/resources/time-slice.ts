/**
 * luavm-bridge: Time slicing
 *
 * Interrupt handler that asks the running coroutine to yield every `every`
 * polls, so a host scheduler can interleave long-running threads.
 */

import type { InterruptHandler } from '../types.js';

export interface TimeSlice {
  /** Polls since the last yield request. */
  readonly polls: number;
  /** Yield requests issued so far. */
  readonly slices: number;
  readonly handler: InterruptHandler;
  reset(): void;
}

export function createTimeSlice(every: number): TimeSlice {
  if (!Number.isInteger(every) || every < 1) {
    throw new RangeError(`time slice length must be a positive integer, got ${String(every)}`);
  }
  let polls = 0;
  let slices = 0;

  return {
    get polls(): number {
      return polls;
    },

    get slices(): number {
      return slices;
    },

    handler: () => {
      polls += 1;
      if (polls < every) {
        return 'continue';
      }
      polls = 0;
      slices += 1;
      return 'yield';
    },

    reset(): void {
      polls = 0;
      slices = 0;
    },
  };
}
