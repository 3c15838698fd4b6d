/**
 * luavm-bridge: Thread lifecycle
 *
 * Creation, resumption, status and reset of coroutines. A thread inherits
 * its sandbox flag and environment from the thread that created it, gets the
 * interrupt hook installed, and is announced to the thread event callback
 * before its creator sees it.
 */

import type { LuaFunction, LuaThread, LuaValue, Result, ThreadStatus } from '../types.js';
import type { VmError } from '../errors.js';
import { coroutineUnresumable, runtimeError } from '../errors.js';
import type { ThreadRecord, VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { lua, dropRef, errorText, pointerFor, popRef, pushRef } from '../runtime/lua.js';
import { activeState, closedError } from '../runtime/protected-call.js';
import { applyInterruptHook, clearPendingYield } from '../resources/interrupt-hook.js';
import { cloneRecord, inheritRecord, isolateRecord } from '../sandbox/environment.js';
import { assertPushable, pushValue, readValues } from '../values/marshal.js';
import type { HandleSlot } from '../values/handle-registry.js';
import { createThreadHandle } from '../values/thread.js';
import { emitThreadEvent, trackThread } from './thread-events.js';

const RESUME_HEADROOM = 20;

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/** Derive the lifecycle state of `thread` from fengari's view of it. */
export function threadStatus(ctx: VmContext, thread: LuaState): ThreadStatus {
  if (thread === ctx.state.current) {
    return 'running';
  }
  const status = lua.lua_status(thread);
  if (status === lua.LUA_YIELD) {
    return 'resumable';
  }
  if (status !== lua.LUA_OK) {
    return 'error';
  }
  if (lua.lua_getstack(thread, 0, new lua.lua_Debug()) > 0) {
    return 'normal';
  }
  return lua.lua_gettop(thread) === 0 ? 'finished' : 'resumable';
}

// ---------------------------------------------------------------------------
// Creation
// ---------------------------------------------------------------------------

/**
 * Track the new `thread`, which is also on top of `L`, and announce it.
 * Returns the callback's error message, if any.
 */
export function adoptThread(
  ctx: VmContext,
  L: LuaState,
  thread: LuaState,
  record: ThreadRecord,
): string | null {
  trackThread(ctx, thread, record);
  applyInterruptHook(ctx, thread);
  return emitThreadEvent(ctx, () => ({ kind: 'created', value: createThreadHandle(ctx, L, -1) }));
}

/** Create a thread running `fn`, on behalf of the host. */
export function spawnThread(ctx: VmContext, fn: LuaFunction): Result<LuaThread, VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  assertPushable(ctx, fn);

  const L = activeState(ctx);
  lua.lua_checkstack(L, 4);
  const thread = lua.lua_newthread(L);
  pushValue(ctx, L, fn);
  lua.lua_xmove(L, thread, 1);

  const failure = adoptThread(ctx, L, thread, inheritRecord(ctx, L, L));
  if (failure !== null) {
    lua.lua_pop(L, 1);
    return { ok: false, error: runtimeError(failure) };
  }
  const handle = createThreadHandle(ctx, L, -1);
  lua.lua_pop(L, 1);
  return { ok: true, value: handle };
}

// ---------------------------------------------------------------------------
// Resume
// ---------------------------------------------------------------------------

/** Run `thread` until it yields, returns or errors. */
export function resumeThread(
  ctx: VmContext,
  thread: LuaState,
  args: readonly LuaValue[],
): Result<LuaValue[], VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  for (const arg of args) {
    assertPushable(ctx, arg);
  }

  const status = threadStatus(ctx, thread);
  if (status !== 'resumable') {
    return { ok: false, error: coroutineUnresumable(status) };
  }
  if (!lua.lua_checkstack(thread, args.length + RESUME_HEADROOM)) {
    return { ok: false, error: runtimeError('too many arguments to resume') };
  }

  applyInterruptHook(ctx, thread);
  for (const arg of args) {
    pushValue(ctx, thread, arg);
  }

  const { state } = ctx;
  const previous = state.current;
  state.current = thread;
  let code: number;
  try {
    code = lua.lua_resume(thread, previous, args.length);
  } finally {
    state.current = previous;
  }

  if (code === lua.LUA_OK || code === lua.LUA_YIELD) {
    if (code === lua.LUA_OK) {
      clearPendingYield(ctx, thread);
    }
    const count = lua.lua_gettop(thread);
    const values = readValues(ctx, thread, 1, count);
    lua.lua_pop(thread, count);
    return { ok: true, value: values };
  }

  clearPendingYield(ctx, thread);
  const message = errorText(thread, -1);
  lua.lua_pop(thread, 1);
  return { ok: false, error: runtimeError(message) };
}

// ---------------------------------------------------------------------------
// Reset and sandbox
// ---------------------------------------------------------------------------

/** Record of `thread`, created on first use for threads the bridge did not spawn. */
export function recordFor(ctx: VmContext, thread: LuaState): ThreadRecord {
  const known = ctx.state.threads.get(thread);
  if (known !== undefined) {
    return known;
  }
  const record: ThreadRecord = { sandboxed: false, isolated: false, baseEnvRef: null, envRef: null };
  ctx.state.threads.set(thread, record);
  return record;
}

/**
 * Rebind the thread behind `slot` to `fn`.
 *
 * A finished or never-started thread is rebound in place. An errored or
 * suspended one cannot be rewound by fengari, so a fresh VM thread takes its
 * place: the handle then reports a new pointer and a creation event fires.
 * The sandbox flag survives either way; an isolated thread starts over with
 * an empty private environment.
 */
export function resetThread(
  ctx: VmContext,
  slot: HandleSlot,
  thread: LuaState,
  fn: LuaFunction,
): Result<void, VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  assertPushable(ctx, fn);

  const status = threadStatus(ctx, thread);
  if (status === 'running' || status === 'normal') {
    return { ok: false, error: runtimeError('cannot reset a running thread') };
  }

  const L = activeState(ctx);
  const record = recordFor(ctx, thread);
  if (lua.lua_status(thread) === lua.LUA_OK) {
    lua.lua_settop(thread, 0);
    lua.lua_checkstack(thread, 1);
    pushValue(ctx, thread, fn);
    if (record.isolated) {
      isolateRecord(L, record);
    }
    return { ok: true, value: undefined };
  }

  lua.lua_checkstack(L, 4);
  const fresh = lua.lua_newthread(L);
  pushValue(ctx, L, fn);
  lua.lua_xmove(L, fresh, 1);
  const failure = adoptThread(ctx, L, fresh, cloneRecord(L, record));
  if (failure !== null) {
    lua.lua_pop(L, 1);
    return { ok: false, error: runtimeError(failure) };
  }

  const previousRef = slot.ref;
  slot.pointer = pointerFor(fresh) ?? slot.pointer;
  slot.ref = popRef(L);
  dropRef(L, previousRef);
  return { ok: true, value: undefined };
}

/** Give the thread a private environment. Idempotent. */
export function sandboxThread(ctx: VmContext, thread: LuaState): Result<void, VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  const record = recordFor(ctx, thread);
  if (!record.isolated) {
    isolateRecord(activeState(ctx), record);
  }
  return { ok: true, value: undefined };
}

/** Push the thread pinned by `ref` and return it, leaving the stack unchanged. */
export function threadFromRef(L: LuaState, ref: number): LuaState | null {
  pushRef(L, ref);
  const thread = lua.lua_tothread(L, -1);
  lua.lua_pop(L, 1);
  return thread;
}
