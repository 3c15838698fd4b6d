/**
 * luavm-bridge: Interrupt hook
 *
 * Polls the registered InterruptHandler from fengari's debug hook on every
 * function call and every `interruptInterval` instructions, on the main
 * thread and on every coroutine.
 *
 * - 'continue' resumes execution.
 * - 'yield' suspends the running coroutine. fengari can only yield from a
 *   count event, so a yield requested at a call event arms a one-instruction
 *   count and happens there. Outside a yieldable context it is ignored.
 * - A thrown error aborts the chain with the error's message, unchanged.
 *
 * The handler never runs re-entrantly: script code it runs through the VM
 * is not interrupted by it.
 */

import type { InterruptOutcome } from '../types.js';
import { messageOf } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaDebug, LuaState } from '../runtime/lua.js';
import { lua, contextOf, raise } from '../runtime/lua.js';

const HOOK_MASK = lua.LUA_MASKCALL | lua.LUA_MASKCOUNT;

/** The fengari hook shared by every VM; the owning context is looked up from the state. */
function interruptHook(L: LuaState, ar: LuaDebug): void {
  const ctx = contextOf(L);
  if (ctx === undefined) {
    return;
  }
  const { state } = ctx;
  const handler = state.interrupt;
  if (handler === null || state.interruptRunning) {
    return;
  }

  const countEvent = ar.event === lua.LUA_HOOKCOUNT;
  if (countEvent && state.pendingYield === L) {
    state.pendingYield = null;
    lua.lua_sethook(L, interruptHook, HOOK_MASK, state.options.interruptInterval);
    if (lua.lua_isyieldable(L)) {
      lua.lua_yield(L, 0);
    }
    return;
  }

  const previous = state.current;
  state.current = L;
  state.interruptRunning = true;
  let outcome: InterruptOutcome = 'continue';
  let failure: string | null = null;
  try {
    outcome = handler(ctx.vm);
  } catch (err: unknown) {
    failure = messageOf(err);
  } finally {
    state.interruptRunning = false;
    state.current = previous;
  }

  if (failure !== null) {
    raise(L, failure);
  }
  if (outcome !== 'yield' || !lua.lua_isyieldable(L)) {
    return;
  }
  if (countEvent) {
    lua.lua_yield(L, 0);
    return;
  }
  state.pendingYield = L;
  lua.lua_sethook(L, interruptHook, HOOK_MASK, 1);
}

/** Install or clear the hook on `L` to match the registered handler. */
export function applyInterruptHook(ctx: VmContext, L: LuaState): void {
  const { state } = ctx;
  if (state.interrupt === null) {
    lua.lua_sethook(L, null, 0, 0);
  } else {
    lua.lua_sethook(L, interruptHook, HOOK_MASK, state.options.interruptInterval);
  }
}

/** Drop a yield request left behind by a thread that stopped before honouring it. */
export function clearPendingYield(ctx: VmContext, L: LuaState): void {
  if (ctx.state.pendingYield === L) {
    ctx.state.pendingYield = null;
    applyInterruptHook(ctx, L);
  }
}
