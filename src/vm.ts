/**
 * luavm-bridge: Main VM factory.
 *
 * Creates a `LuaVm` over a fresh fengari state. Every method routes through
 * the instance's VmContext; Result operations on a closed VM return
 * INSTANCE_CLOSED, the others throw ContractViolation.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type {
  ChunkOptions,
  HostFunction,
  InterruptHandler,
  LuaFunction,
  LuaTable,
  LuaThread,
  LuaValue,
  LuaVm,
  Result,
  ThreadEventCallback,
  VmOptions,
  VmStatus,
} from './types.js';
import type { VmError } from './errors.js';
import type { VmContext } from './internal-types.js';
import { createVmState, resolveVmOptions } from './loader/instance-factory.js';
import { clearModuleCache } from './loader/require.js';
import { lua, bindContext } from './runtime/lua.js';
import { execChunk, loadChunk } from './runtime/chunk.js';
import { createHostFunction } from './runtime/host-bridge.js';
import { activeState, assertOpen, closedError } from './runtime/protected-call.js';
import { applyInterruptHook } from './resources/interrupt-hook.js';
import { pushEnvironment } from './sandbox/environment.js';
import { setSandbox } from './sandbox/isolation.js';
import { openStandardLibraries } from './stdlib/stdlib.js';
import { spawnThread } from './threads/lifecycle.js';
import { drainThreads } from './threads/thread-events.js';
import { assertPushable, pushValue } from './values/marshal.js';
import { createTableHandle } from './values/table.js';

/** Collector passes per gcCollect(); finalizers queued by one pass run before the next. */
const GC_ROUNDS = 3;

/**
 * Create a new `LuaVm`, the main entry point for the library.
 *
 * @param options - Overrides for the defaults in `VmOptions`.
 * @throws ContractViolation when safe mode is combined with an unsafe library.
 */
export function createLuaVm(options: Partial<VmOptions> = {}): LuaVm {
  const state = createVmState(resolveVmOptions(options));

  /** Re-apply the hook on the main thread and whatever thread is executing. */
  function refreshHooks(): void {
    applyInterruptHook(ctx, state.L);
    if (state.current !== state.L) {
      applyInterruptHook(ctx, state.current);
    }
  }

  const vm: LuaVm = {
    get id(): string {
      return state.id;
    },

    get options(): Readonly<VmOptions> {
      return state.options;
    },

    get status(): VmStatus {
      return state.status;
    },

    get isSandboxed(): boolean {
      return state.sandbox !== null;
    },

    globals(): LuaTable {
      assertOpen(ctx);
      const L = activeState(ctx);
      lua.lua_checkstack(L, 1);
      pushEnvironment(ctx, L, state.current);
      const table = createTableHandle(ctx, L, -1);
      lua.lua_pop(L, 1);
      return table;
    },

    createTable(): LuaTable {
      assertOpen(ctx);
      const L = activeState(ctx);
      lua.lua_checkstack(L, 1);
      lua.lua_newtable(L);
      const table = createTableHandle(ctx, L, -1);
      lua.lua_pop(L, 1);
      return table;
    },

    createSequence(values: readonly LuaValue[]): LuaTable {
      assertOpen(ctx);
      for (const value of values) {
        assertPushable(ctx, value);
      }
      const L = activeState(ctx);
      lua.lua_checkstack(L, 2);
      lua.lua_createtable(L, values.length, 0);
      values.forEach((value, index) => {
        pushValue(ctx, L, value);
        lua.lua_rawseti(L, -2, index + 1);
      });
      const table = createTableHandle(ctx, L, -1);
      lua.lua_pop(L, 1);
      return table;
    },

    createFunction(handler: HostFunction): LuaFunction {
      return createHostFunction(ctx, handler);
    },

    load(source: string, chunkOptions?: ChunkOptions): Result<LuaFunction, VmError> {
      return loadChunk(ctx, source, chunkOptions);
    },

    exec(source: string, chunkOptions?: ChunkOptions): Result<LuaValue[], VmError> {
      return execChunk(ctx, source, chunkOptions);
    },

    createThread(fn: LuaFunction): Result<LuaThread, VmError> {
      return spawnThread(ctx, fn);
    },

    sandbox(enabled: boolean): Result<void, VmError> {
      return setSandbox(ctx, enabled);
    },

    setInterrupt(handler: InterruptHandler): void {
      assertOpen(ctx);
      state.interrupt = handler;
      refreshHooks();
    },

    removeInterrupt(): void {
      assertOpen(ctx);
      state.interrupt = null;
      state.pendingYield = null;
      refreshHooks();
    },

    setThreadEventCallback(callback: ThreadEventCallback): void {
      assertOpen(ctx);
      state.threadEventCallback = callback;
    },

    removeThreadEventCallback(): void {
      assertOpen(ctx);
      state.threadEventCallback = null;
    },

    async gcCollect(): Promise<Result<void, VmError>> {
      const closed = closedError(ctx);
      if (closed !== null) {
        return { ok: false, error: closed };
      }

      for (let round = 0; round < GC_ROUNDS && state.status === 'open'; round++) {
        lua.lua_gc(state.L, lua.LUA_GCCOLLECT, 0);
        const collect: unknown = Reflect.get(globalThis, 'gc');
        if (typeof collect === 'function') {
          Reflect.apply(collect, globalThis, []);
        }
        await sleep(0);
      }

      const closedSince = closedError(ctx);
      if (closedSince !== null) {
        return { ok: false, error: closedSince };
      }
      const failure = state.deferredEventError;
      state.deferredEventError = null;
      return failure === null ? { ok: true, value: undefined } : { ok: false, error: failure };
    },

    pointerOf(value: LuaValue): number | null {
      if (value === null || typeof value !== 'object') {
        return null;
      }
      return value.pointer;
    },

    close(): void {
      if (state.status === 'closed') {
        return;
      }
      drainThreads(ctx);
      clearModuleCache(ctx);
      state.interrupt = null;
      state.pendingYield = null;
      lua.lua_sethook(state.L, null, 0, 0);
      state.threadEventCallback = null;
      state.status = 'closed';
    },
  };

  const ctx: VmContext = { state, vm };
  bindContext(ctx);
  openStandardLibraries(ctx);
  return vm;
}
