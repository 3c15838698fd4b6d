/**
 * luavm-bridge: Function handles
 */

import type { LuaFunction, LuaValue, Result } from '../types.js';
import type { VmError } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { lua, makeRef, pointerAt } from '../runtime/lua.js';
import { callProtected } from '../runtime/protected-call.js';
import { registerHandle, releaseSlot } from './handle-registry.js';
import type { HandleSlot } from './handle-registry.js';

/** Calls the function at slot 1 with the remaining slots, keeping every result. */
function callBody(L: LuaState): number {
  lua.lua_call(L, lua.lua_gettop(L) - 1, lua.LUA_MULTRET);
  return lua.lua_gettop(L);
}

/** Create a handle pinning the function at `idx` of `L`. */
export function createFunctionHandle(ctx: VmContext, L: LuaState, idx: number): LuaFunction {
  const slot: HandleSlot = {
    ctx,
    ref: makeRef(L, idx),
    pointer: pointerAt(L, idx) ?? 0,
    released: false,
  };

  const fn: LuaFunction = {
    kind: 'function',

    get pointer(): number {
      return slot.pointer;
    },

    release(): void {
      releaseSlot(slot);
    },

    call(...args: LuaValue[]): Result<LuaValue[], VmError> {
      return callProtected(ctx, callBody, [fn, ...args]);
    },
  };

  registerHandle(fn, slot);
  return fn;
}
