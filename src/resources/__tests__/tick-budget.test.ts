/**
 * luavm-bridge — Tick budget unit tests
 */

import { describe, it, expect } from 'vitest';
import { createTickBudget, TickBudgetExhaustedSignal } from '../tick-budget.js';
import { createLuaVm } from '../../vm.js';

// ---------------------------------------------------------------------------
// TickBudgetExhaustedSignal
// ---------------------------------------------------------------------------

describe('TickBudgetExhaustedSignal', () => {
  it('extends Error', () => {
    const signal = new TickBudgetExhaustedSignal(11, 10);
    expect(signal).toBeInstanceOf(Error);
    expect(signal).toBeInstanceOf(TickBudgetExhaustedSignal);
  });

  it('stores ticksUsed and tickLimit', () => {
    const signal = new TickBudgetExhaustedSignal(77, 50);
    expect(signal.ticksUsed).toBe(77);
    expect(signal.tickLimit).toBe(50);
  });

  it('has a fixed message and name', () => {
    const signal = new TickBudgetExhaustedSignal(6, 5);
    expect(signal.message).toBe('Tick budget exhausted: used 6 of 5');
    expect(signal.name).toBe('TickBudgetExhaustedSignal');
  });
});

// ---------------------------------------------------------------------------
// createTickBudget
// ---------------------------------------------------------------------------

describe('createTickBudget', () => {
  it('starts unspent', () => {
    const budget = createTickBudget(100);
    expect(budget.ticksUsed).toBe(0);
    expect(budget.tickLimit).toBe(100);
    expect(budget.isExhausted).toBe(false);
  });

  it('accumulates ticks', () => {
    const budget = createTickBudget(100);
    budget.consume();
    budget.consume(9);
    expect(budget.ticksUsed).toBe(10);
  });

  it('allows spending exactly the limit', () => {
    const budget = createTickBudget(3);
    budget.consume(3);
    expect(budget.isExhausted).toBe(false);
  });

  it('throws once the limit is passed and keeps throwing', () => {
    const budget = createTickBudget(2);
    budget.consume(2);
    expect(() => {
      budget.consume();
    }).toThrow(TickBudgetExhaustedSignal);
    expect(budget.isExhausted).toBe(true);
    expect(() => {
      budget.consume();
    }).toThrow('Tick budget exhausted: used 3 of 2');
  });

  it('handler spends one tick per poll', () => {
    const budget = createTickBudget(5);
    const vm = createLuaVm();
    expect(budget.handler(vm)).toBe('continue');
    expect(budget.handler(vm)).toBe('continue');
    expect(budget.ticksUsed).toBe(2);
    vm.close();
  });

  it('reset restores the full budget', () => {
    const budget = createTickBudget(1);
    budget.consume();
    expect(() => {
      budget.consume();
    }).toThrow(TickBudgetExhaustedSignal);
    budget.reset();
    expect(budget.ticksUsed).toBe(0);
    expect(budget.isExhausted).toBe(false);
  });
});
