/**
 * luavm-bridge — Full lifecycle integration tests.
 *
 * Tests the complete VM lifecycle: create → load → execute → close,
 * including multi-instance isolation, sandboxing and error paths.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ContractViolation,
  DEFAULT_STD_LIBS,
  READONLY_TABLE_MESSAGE,
  createLuaVm,
  formatVmError,
  resetInstanceCounter,
} from '../../src/index.js';
import type { LuaVm, VmError } from '../../src/index.js';
import { asFunction, asTable, failure, failureMessage, unwrap } from '../../src/__tests__/fixtures.js';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('full lifecycle', () => {
  beforeEach(() => {
    resetInstanceCounter();
  });

  it('create → load → call → close', () => {
    const vm = createLuaVm();
    expect(vm.id).toBe('luavm-0');
    expect(vm.status).toBe('open');
    expect(vm.options.stdLibs).toEqual(DEFAULT_STD_LIBS);

    const add = unwrap(vm.load('local a, b = ... return a + b', { name: 'add' }));
    expect(unwrap(add.call(3, 7))).toEqual([10]);
    expect(unwrap(add.call(-1, 1))).toEqual([0]);

    vm.close();
    expect(vm.status).toBe('closed');
  });

  it('keeps state between chunks of one instance', () => {
    const vm = createLuaVm();
    unwrap(vm.exec('total = 0 function bump(n) total = total + n return total end'));
    const bump = asFunction(unwrap(vm.globals().get('bump')));
    unwrap(bump.call(5));
    expect(unwrap(bump.call(6))).toEqual([11]);
    expect(unwrap(vm.exec('return total'))).toEqual([11]);
    vm.close();
  });

  it('isolates instances from each other', () => {
    const first = createLuaVm();
    const second = createLuaVm();
    expect(first.id).toBe('luavm-0');
    expect(second.id).toBe('luavm-1');

    unwrap(first.exec('name = "first"'));
    expect(unwrap(second.exec('return name'))).toEqual([null]);
    expect(() => second.globals().set('stolen', first.createTable())).toThrow(ContractViolation);

    first.close();
    expect(unwrap(second.exec('return 1 + 1'))).toEqual([2]);
    second.close();
  });

  it('distinguishes incomplete input from other syntax errors', () => {
    const vm = createLuaVm();
    const incomplete = failure(vm.load('return 1 +', { name: 'repl' }));
    expect(incomplete).toEqual({
      code: 'SYNTAX_ERROR',
      message: 'repl:1: unexpected symbol near <eof>',
      incompleteInput: true,
    });
    expect(failure(vm.load('if ready then', { name: 'repl' }))).toMatchObject({ incompleteInput: true });

    const wrong = failure(vm.load('x = = 1', { name: 'repl' }));
    expect(wrong).toMatchObject({ code: 'SYNTAX_ERROR', incompleteInput: false });
    expect(formatVmError(wrong)).toMatch(/^syntax error: repl:1: /);
    vm.close();
  });

  it('runs untrusted code against a frozen configuration', () => {
    const vm = createLuaVm();
    const config = vm.createTable();
    unwrap(config.set('limit', 10));
    unwrap(config.set('tags', vm.createSequence(['a', 'b'])));
    config.setReadonly(true);
    unwrap(vm.globals().set('config', config));
    unwrap(vm.sandbox(true));

    const script = unwrap(
      vm.load(
        `
        result = config.limit * 2
        local ok, err = pcall(function() config.limit = 0 end)
        return result, #config.tags, ok, err
      `,
        { name: 'job' },
      ),
    );
    expect(unwrap(script.call())).toEqual([20, 2, false, `job:3: ${READONLY_TABLE_MESSAGE}`]);

    unwrap(vm.sandbox(false));
    expect(unwrap(vm.exec('return result'))).toEqual([null]);
    expect(config.isReadonly()).toBe(true);
    vm.close();
  });

  it('rejects work after close', () => {
    const vm = createLuaVm();
    const table = vm.createTable();
    const fn = unwrap(vm.load('return 1'));
    vm.close();
    vm.close();

    const closed: VmError = { code: 'INSTANCE_CLOSED', instanceId: vm.id };
    expect(failure(vm.exec('return 1'))).toEqual(closed);
    expect(failure(vm.load('return 1'))).toEqual(closed);
    expect(failure(fn.call())).toEqual(closed);
    expect(failure(table.get('x'))).toEqual(closed);
    expect(() => vm.globals()).toThrow(ContractViolation);
    expect(() => vm.createTable()).toThrow(ContractViolation);
    expect(() => {
      vm.setInterrupt(() => 'continue');
    }).toThrow(ContractViolation);
  });

  it('reports runtime errors with their position', () => {
    const vm = createLuaVm();
    const message = failureMessage(vm.exec('local t = nil\nreturn t.field', { name: 'crash' }));
    expect(message).toMatch(/^crash:2: attempt to index a nil value/);
    const [tbl] = unwrap(vm.exec('return { 1, 2 }'));
    expect(asTable(tbl).sequenceValues()).toEqual([1, 2]);
    vm.close();
  });
});
