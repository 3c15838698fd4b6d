import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLuaVm } from '../../vm.js';
import type { LuaValue, LuaVm } from '../../types.js';
import { ContractViolation } from '../../errors.js';
import { isVmInteger } from '../marshal.js';
import { asFunction, asTable, failureMessage, globalOf, unwrap } from '../../__tests__/fixtures.js';

describe('isVmInteger', () => {
  it('accepts 32-bit integers only', () => {
    expect(isVmInteger(0)).toBe(true);
    expect(isVmInteger(-2_147_483_648)).toBe(true);
    expect(isVmInteger(2_147_483_647)).toBe(true);
    expect(isVmInteger(2_147_483_648)).toBe(false);
    expect(isVmInteger(1.5)).toBe(false);
  });
});

describe('value marshalling', () => {
  let vm: LuaVm;

  beforeEach(() => {
    vm = createLuaVm();
  });

  afterEach(() => {
    vm.close();
  });

  it('copies primitives out of the VM', () => {
    expect(unwrap(vm.exec("return nil, true, 42, 1.5, 'text'"))).toEqual([null, true, 42, 1.5, 'text']);
  });

  it('pushes integers and floats with their subtype', () => {
    const kinds = vm.createFunction(() => [7, 2.5, 2_147_483_648]);
    unwrap(vm.globals().set('values', kinds));
    expect(
      unwrap(vm.exec('local a, b, c = values() return math.type(a), math.type(b), math.type(c)')),
    ).toEqual(['integer', 'float', 'float']);
  });

  it('passes arguments to host functions and returns every result', () => {
    const swap = vm.createFunction((_self, a, b) => [b, a]);
    expect(unwrap(swap.call('x', 1))).toEqual([1, 'x']);
    unwrap(vm.globals().set('swap', swap));
    expect(unwrap(vm.exec("return swap('left', 'right')"))).toEqual(['right', 'left']);
  });

  it('returns nothing for an undefined host result', () => {
    unwrap(vm.globals().set('quiet', vm.createFunction(() => undefined)));
    expect(unwrap(vm.exec('return select("#", quiet())'))).toEqual([0]);
  });

  it('turns a thrown host error into a script error', () => {
    unwrap(
      vm.globals().set(
        'fail',
        vm.createFunction(() => {
          throw new Error('host failed');
        }),
      ),
    );
    expect(unwrap(vm.exec('return pcall(fail)'))).toEqual([false, 'host failed']);
    expect(failureMessage(vm.exec('fail()'))).toBe('host failed');
  });

  it('rejects opaque values returned by host functions', () => {
    const opaque: LuaValue = { kind: 'lightuserdata', pointer: 1 };
    unwrap(vm.globals().set('leak', vm.createFunction(() => opaque)));
    expect(failureMessage(vm.exec('leak()'))).toBe(
      'lightuserdata values cannot be passed back into the VM',
    );
  });

  it('gives every handle to one value the same pointer', () => {
    unwrap(vm.exec('shared = {}'));
    const a = asTable(globalOf(vm, 'shared'));
    const b = asTable(globalOf(vm, 'shared'));
    expect(a).not.toBe(b);
    expect(a.pointer).toBe(b.pointer);
    expect(vm.pointerOf(a)).toBe(a.pointer);
    expect(vm.pointerOf('shared')).toBeNull();
    expect(vm.pointerOf(null)).toBeNull();
  });

  it('moves handles back into the VM', () => {
    const table = vm.createTable();
    unwrap(table.set('n', 3));
    const [fn] = unwrap(vm.exec('return function(t) return t.n * 2 end'));
    expect(unwrap(asFunction(fn).call(table))).toEqual([6]);
  });

  it('builds sequences from host arrays', () => {
    const list = vm.createSequence(['a', 'b', 'c']);
    expect(list.rawLen()).toBe(3);
    expect(list.sequenceValues()).toEqual(['a', 'b', 'c']);
    unwrap(list.rawInsert(2, 'x'));
    unwrap(list.rawRemove(1));
    expect(list.sequenceValues()).toEqual(['x', 'b', 'c']);
    expect(failureMessage(list.rawInsert(9, 'y'))).toBe('index out of bounds');
  });

  it('refuses opaque values and released or foreign handles', () => {
    const other = createLuaVm();
    const env = vm.globals();
    const released = vm.createTable();
    released.release();

    expect(() => env.set('x', { kind: 'userdata', pointer: 2 })).toThrow(ContractViolation);
    expect(() => env.set('x', other.createTable())).toThrow(ContractViolation);
    expect(() => env.set('x', released)).toThrow(ContractViolation);
    expect(() => released.rawLen()).toThrow('handle has been released');
    other.close();
  });
});
