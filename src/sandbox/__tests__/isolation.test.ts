import { describe, it, expect, afterEach } from 'vitest';
import { createLuaVm } from '../../vm.js';
import type { LuaVm } from '../../types.js';
import { READONLY_TABLE_MESSAGE } from '../../errors.js';
import { asTable, failureMessage, globalOf, unwrap } from '../../__tests__/fixtures.js';

describe('global sandbox mode', () => {
  let vm: LuaVm;

  afterEach(() => {
    vm.close();
  });

  it('freezes the libraries and the original globals', () => {
    vm = createLuaVm();
    const original = vm.globals();
    const strings = asTable(globalOf(vm, 'string'));
    unwrap(vm.sandbox(true));

    expect(vm.isSandboxed).toBe(true);
    expect(original.isReadonly()).toBe(true);
    expect(strings.isReadonly()).toBe(true);
    expect(failureMessage(vm.exec('string.extra = 1', { name: 'sb' }))).toBe(
      `sb:1: ${READONLY_TABLE_MESSAGE}`,
    );
    expect(failureMessage(vm.exec('_G.extra = 1', { name: 'sb' }))).toBe(
      `sb:1: ${READONLY_TABLE_MESSAGE}`,
    );
  });

  it('keeps frozen tables usable as metatables', () => {
    vm = createLuaVm();
    unwrap(
      vm.exec(`
        Point = {}
        Point.__index = Point
        function Point.new(x) return setmetatable({ x = x }, Point) end
        function Point.__add(a, b) return Point.new(a.x + b.x) end
        function Point:get() return self.x end
        local v = { x = 40 }
        v.__add = function(a, b) return a.x + b end
        v.__concat = function(_, b) return 'h' .. b end
        selfmeta = setmetatable(v, v)
      `),
    );
    const script = "return (Point.new(1) + Point.new(2)):get(), selfmeta + 2, selfmeta .. 'i'";
    expect(unwrap(vm.exec(script))).toEqual([3, 42, 'hi']);

    unwrap(vm.sandbox(true));
    expect(asTable(globalOf(vm, 'Point')).isReadonly()).toBe(true);
    expect(asTable(globalOf(vm, 'selfmeta')).isReadonly()).toBe(true);
    expect(unwrap(vm.exec(script))).toEqual([3, 42, 'hi']);
    expect(failureMessage(vm.exec('rawset(Point, "__index", nil)', { name: 'sb' }))).toBe(
      `sb:1: ${READONLY_TABLE_MESSAGE}`,
    );
  });

  it('lets scripts write globals into a fresh environment', () => {
    vm = createLuaVm();
    unwrap(vm.sandbox(true));
    expect(unwrap(vm.exec('counter = 41 counter = counter + 1 return counter'))).toEqual([42]);
    expect(globalOf(vm, 'counter')).toBe(42);
    expect(unwrap(vm.exec('return string.upper("ok")'))).toEqual(['OK']);
  });

  it('marks the installed environment as safeenv', () => {
    vm = createLuaVm();
    expect(vm.globals().isSafeEnv()).toBe(false);
    unwrap(vm.sandbox(true));
    const env = vm.globals();
    expect(env.isSafeEnv()).toBe(true);
    expect(env.isReadonly()).toBe(false);
    unwrap(vm.sandbox(false));
    expect(env.isSafeEnv()).toBe(false);
    expect(vm.globals().isSafeEnv()).toBe(false);
  });

  it('restores the original globals and drops sandboxed writes', () => {
    vm = createLuaVm();
    unwrap(vm.exec('kept = 1'));
    unwrap(vm.sandbox(true));
    unwrap(vm.exec('kept = 2 temporary = true'));
    unwrap(vm.sandbox(false));

    expect(vm.isSandboxed).toBe(false);
    expect(unwrap(vm.exec('return kept, temporary'))).toEqual([1, null]);
    expect(vm.globals().isReadonly()).toBe(false);
    expect(unwrap(vm.exec('string.extra = 1 return string.extra'))).toEqual([1]);
  });

  it('leaves tables that were already readonly frozen', () => {
    vm = createLuaVm();
    const config = vm.createTable();
    unwrap(config.set('level', 3));
    config.setReadonly(true);
    unwrap(vm.globals().set('config', config));

    unwrap(vm.sandbox(true));
    unwrap(vm.sandbox(false));
    expect(config.isReadonly()).toBe(true);
  });

  it('starts from a clean environment when re-enabled', () => {
    vm = createLuaVm();
    unwrap(vm.sandbox(true));
    unwrap(vm.exec('leftover = "x"'));
    unwrap(vm.sandbox(false));
    unwrap(vm.sandbox(true));
    expect(unwrap(vm.exec('return leftover'))).toEqual([null]);
  });

  it('treats repeated calls as no-ops', () => {
    vm = createLuaVm();
    unwrap(vm.sandbox(false));
    unwrap(vm.sandbox(true));
    unwrap(vm.exec('value = 7'));
    unwrap(vm.sandbox(true));
    expect(globalOf(vm, 'value')).toBe(7);
    unwrap(vm.sandbox(false));
    expect(vm.globals().isReadonly()).toBe(false);
  });

  it('works without optional libraries', () => {
    vm = createLuaVm({ stdLibs: [] });
    unwrap(vm.sandbox(true));
    expect(unwrap(vm.exec('x = 1 return x, type(print)'))).toEqual([1, 'function']);
  });

  it('fails once the VM is closed', () => {
    vm = createLuaVm();
    vm.close();
    expect(vm.sandbox(true)).toEqual({
      ok: false,
      error: { code: 'INSTANCE_CLOSED', instanceId: vm.id },
    });
  });
});
