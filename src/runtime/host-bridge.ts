/**
 * luavm-bridge: Host function bridge
 *
 * Wraps host functions as fengari functions. While a handler runs, the
 * calling thread is the VM's current thread, so `vm.globals()` and chunks it
 * compiles see that thread's environment. A thrown error becomes a Lua error
 * carrying the thrown message; it never unwinds through fengari frames.
 */

import type { HostFunction, HostReturn, LuaFunction, LuaValue } from '../types.js';
import { messageOf } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaCFunction, LuaState } from './lua.js';
import { lua, raise } from './lua.js';
import { activeState, assertOpen } from './protected-call.js';
import { assertPushable, pushValue, readValues } from '../values/marshal.js';
import { createFunctionHandle } from '../values/function.js';

function isValueList(returned: LuaValue | readonly LuaValue[]): returned is readonly LuaValue[] {
  return Array.isArray(returned);
}

function toValueList(returned: HostReturn): readonly LuaValue[] {
  if (returned === undefined) {
    return [];
  }
  if (isValueList(returned)) {
    return returned;
  }
  return [returned];
}

/**
 * Wrap a host function with argument marshalling and error capture.
 *
 * @returns A fengari function returning the handler's values.
 */
function wrapHostFunction(ctx: VmContext, handler: HostFunction): LuaCFunction {
  return (L: LuaState): number => {
    const { state } = ctx;
    const args = readValues(ctx, L, 1, lua.lua_gettop(L));

    const previous = state.current;
    state.current = L;
    let values: readonly LuaValue[] = [];
    let failure: string | null = null;
    try {
      values = toValueList(handler(ctx.vm, ...args));
      for (const value of values) {
        assertPushable(ctx, value);
      }
    } catch (err: unknown) {
      failure = messageOf(err);
    } finally {
      state.current = previous;
    }

    if (failure !== null) {
      return raise(L, failure);
    }
    if (!lua.lua_checkstack(L, values.length)) {
      return raise(L, 'too many results');
    }
    for (const value of values) {
      pushValue(ctx, L, value);
    }
    return values.length;
  };
}

/** Create a function handle backed by `handler`. */
export function createHostFunction(ctx: VmContext, handler: HostFunction): LuaFunction {
  assertOpen(ctx);
  const L = activeState(ctx);
  lua.lua_pushjsfunction(L, wrapHostFunction(ctx, handler));
  const fn = createFunctionHandle(ctx, L, -1);
  lua.lua_pop(L, 1);
  return fn;
}
