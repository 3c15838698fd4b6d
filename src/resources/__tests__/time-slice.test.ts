import { describe, it, expect } from 'vitest';
import { createTimeSlice } from '../time-slice.js';
import { createLuaVm } from '../../vm.js';

describe('createTimeSlice', () => {
  it('yields on every nth poll', () => {
    const vm = createLuaVm();
    const slice = createTimeSlice(3);
    const outcomes = Array.from({ length: 6 }, () => slice.handler(vm));
    expect(outcomes).toEqual(['continue', 'continue', 'yield', 'continue', 'continue', 'yield']);
    expect(slice.slices).toBe(2);
    expect(slice.polls).toBe(0);
    vm.close();
  });

  it('yields on every poll with a length of one', () => {
    const vm = createLuaVm();
    const slice = createTimeSlice(1);
    expect(slice.handler(vm)).toBe('yield');
    expect(slice.handler(vm)).toBe('yield');
    vm.close();
  });

  it('reset clears the counters', () => {
    const vm = createLuaVm();
    const slice = createTimeSlice(2);
    slice.handler(vm);
    slice.handler(vm);
    slice.handler(vm);
    slice.reset();
    expect(slice.polls).toBe(0);
    expect(slice.slices).toBe(0);
    vm.close();
  });

  it('rejects lengths below one', () => {
    expect(() => createTimeSlice(0)).toThrow(RangeError);
    expect(() => createTimeSlice(1.5)).toThrow(RangeError);
  });
});
