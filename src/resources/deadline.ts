/**
 * luavm-bridge: Wall-clock deadline
 *
 * Aborts a script once it has run longer than a fixed limit. The clock
 * starts at the first poll after creation or `start()`, and is checked on
 * every poll after that.
 *
 * The timer function is injectable for determinism in tests.
 * Defaults to `performance.now()`.
 */

import type { InterruptHandler } from '../types.js';

// ---------------------------------------------------------------------------
// Signal
// ---------------------------------------------------------------------------

/** Thrown from the interrupt handler once the deadline has passed. */
export class DeadlineExceededSignal extends Error {
  readonly elapsedMs: number;
  readonly limitMs: number;

  constructor(elapsedMs: number, limitMs: number) {
    super(`Deadline exceeded: elapsed ${String(elapsedMs)}ms exceeds limit ${String(limitMs)}ms`);
    this.name = 'DeadlineExceededSignal';
    this.elapsedMs = elapsedMs;
    this.limitMs = limitMs;
  }
}

// ---------------------------------------------------------------------------
// Timer Function
// ---------------------------------------------------------------------------

/** A function that returns the current time in milliseconds. */
export type TimerFn = () => number;

export const defaultTimer: TimerFn = (): number => performance.now();

// ---------------------------------------------------------------------------
// Deadline
// ---------------------------------------------------------------------------

export interface Deadline {
  /** Milliseconds since the clock started; 0 before the first poll. */
  readonly elapsedMs: number;
  readonly limitMs: number;
  readonly isExpired: boolean;
  /** Restart the clock now. */
  start(): void;
  /** Throw DeadlineExceededSignal if the limit has passed. */
  check(): void;
  /** Interrupt handler checking the deadline on every poll. */
  readonly handler: InterruptHandler;
}

/**
 * Create a deadline.
 *
 * @param limitMs - Wall-clock time allowed, in milliseconds.
 * @param timer - Clock source (defaults to performance.now).
 */
export function createDeadline(limitMs: number, timer: TimerFn = defaultTimer): Deadline {
  let startTime = 0;
  let started = false;
  let expired = false;

  function start(): void {
    startTime = timer();
    started = true;
    expired = false;
  }

  function check(): void {
    if (!started) {
      start();
      return;
    }
    const elapsed = timer() - startTime;
    if (expired || elapsed > limitMs) {
      expired = true;
      throw new DeadlineExceededSignal(elapsed, limitMs);
    }
  }

  return {
    get elapsedMs(): number {
      return started ? timer() - startTime : 0;
    },

    get limitMs(): number {
      return limitMs;
    },

    get isExpired(): boolean {
      return expired;
    },

    start,
    check,

    handler: () => {
      check();
      return 'continue';
    },
  };
}
