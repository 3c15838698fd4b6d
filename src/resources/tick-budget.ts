/**
 * luavm-bridge: Tick budget
 *
 * Counts interrupt polls against a fixed budget. Each poll costs one tick.
 * Once the budget is spent, the handler throws TickBudgetExhaustedSignal,
 * which aborts the running script with the signal's message.
 */

import type { InterruptHandler } from '../types.js';

// ---------------------------------------------------------------------------
// Signal
// ---------------------------------------------------------------------------

/** Thrown from the interrupt handler once the budget is spent. */
export class TickBudgetExhaustedSignal extends Error {
  readonly ticksUsed: number;
  readonly tickLimit: number;

  constructor(ticksUsed: number, tickLimit: number) {
    super(`Tick budget exhausted: used ${String(ticksUsed)} of ${String(tickLimit)}`);
    this.name = 'TickBudgetExhaustedSignal';
    this.ticksUsed = ticksUsed;
    this.tickLimit = tickLimit;
  }
}

// ---------------------------------------------------------------------------
// Tick Budget
// ---------------------------------------------------------------------------

export interface TickBudget {
  readonly ticksUsed: number;
  readonly tickLimit: number;
  readonly isExhausted: boolean;
  /** Spend `amount` ticks. Throws TickBudgetExhaustedSignal past the limit. */
  consume(amount?: number): void;
  /** Interrupt handler spending one tick per poll. */
  readonly handler: InterruptHandler;
  /** Start a fresh budget for the next run. */
  reset(): void;
}

/**
 * Create a tick budget.
 *
 * @param tickLimit - Polls allowed before the script is aborted.
 */
export function createTickBudget(tickLimit: number): TickBudget {
  let ticksUsed = 0;
  let exhausted = false;

  function consume(amount = 1): void {
    if (exhausted) {
      throw new TickBudgetExhaustedSignal(ticksUsed, tickLimit);
    }
    ticksUsed += amount;
    if (ticksUsed > tickLimit) {
      exhausted = true;
      throw new TickBudgetExhaustedSignal(ticksUsed, tickLimit);
    }
  }

  return {
    get ticksUsed(): number {
      return ticksUsed;
    },

    get tickLimit(): number {
      return tickLimit;
    },

    get isExhausted(): boolean {
      return exhausted;
    },

    consume,

    handler: () => {
      consume();
      return 'continue';
    },

    reset(): void {
      ticksUsed = 0;
      exhausted = false;
    },
  };
}
