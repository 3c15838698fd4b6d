/**
 * luavm-bridge: Protected execution
 *
 * Every host operation that may raise inside the VM (metamethods, script
 * calls, library writers) runs as a fengari function under `lua_pcall`, so a
 * Lua error comes back as a Result instead of unwinding through host code.
 */

import type { LuaValue, Result } from '../types.js';
import type { VmError } from '../errors.js';
import { ContractViolation, instanceClosed, runtimeError } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaCFunction, LuaState } from './lua.js';
import { lua, errorText } from './lua.js';
import { assertPushable, pushValue, readValues } from '../values/marshal.js';

/** Extra slots reserved above the arguments of a protected call. */
const STACK_HEADROOM = 20;

/** Thread host operations push onto: the executing thread, or the main one. */
export function activeState(ctx: VmContext): LuaState {
  return ctx.state.current;
}

/** INSTANCE_CLOSED for a closed VM, otherwise null. */
export function closedError(ctx: VmContext): VmError | null {
  return ctx.state.status === 'closed' ? instanceClosed(ctx.state.id) : null;
}

/** Throw for non-Result operations on a closed VM. */
export function assertOpen(ctx: VmContext): void {
  if (ctx.state.status === 'closed') {
    throw new ContractViolation(`instance ${ctx.state.id} is closed`);
  }
}

/**
 * Run `body` under `lua_pcall` with `args` at stack slots 1..n.
 *
 * Returns every value `body` returns. A Lua error raised anywhere below
 * `body` becomes a RUNTIME_ERROR carrying the error message.
 */
export function callProtected(
  ctx: VmContext,
  body: LuaCFunction,
  args: readonly LuaValue[],
): Result<LuaValue[], VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  for (const arg of args) {
    assertPushable(ctx, arg);
  }

  const L = activeState(ctx);
  const base = lua.lua_gettop(L);
  if (!lua.lua_checkstack(L, args.length + STACK_HEADROOM)) {
    return { ok: false, error: runtimeError('stack overflow') };
  }

  lua.lua_pushjsfunction(L, body);
  for (const arg of args) {
    pushValue(ctx, L, arg);
  }

  const status = lua.lua_pcall(L, args.length, lua.LUA_MULTRET, 0);
  if (status !== lua.LUA_OK) {
    const message = errorText(L, -1);
    lua.lua_settop(L, base);
    return { ok: false, error: runtimeError(message) };
  }

  const values = readValues(ctx, L, base + 1, lua.lua_gettop(L));
  lua.lua_settop(L, base);
  return { ok: true, value: values };
}

/** `callProtected` for bodies that return at most one value. */
export function callProtectedSingle(
  ctx: VmContext,
  body: LuaCFunction,
  args: readonly LuaValue[],
): Result<LuaValue, VmError> {
  const result = callProtected(ctx, body, args);
  if (!result.ok) {
    return result;
  }
  return { ok: true, value: result.value[0] ?? null };
}

/** `callProtected` for bodies that return nothing. */
export function callProtectedVoid(
  ctx: VmContext,
  body: LuaCFunction,
  args: readonly LuaValue[],
): Result<void, VmError> {
  const result = callProtected(ctx, body, args);
  if (!result.ok) {
    return result;
  }
  return { ok: true, value: undefined };
}
