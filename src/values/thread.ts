/**
 * luavm-bridge: Thread handles
 */

import type { LuaFunction, LuaThread, LuaValue, Result, ThreadStatus } from '../types.js';
import type { VmError } from '../errors.js';
import { ContractViolation } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { makeRef, pointerAt } from '../runtime/lua.js';
import { activeState, assertOpen, closedError } from '../runtime/protected-call.js';
import {
  recordFor,
  resetThread,
  resumeThread,
  sandboxThread,
  threadFromRef,
  threadStatus,
} from '../threads/lifecycle.js';
import { liveSlot, registerHandle, releaseSlot } from './handle-registry.js';
import type { HandleSlot } from './handle-registry.js';

/** Create a handle pinning the thread at `idx` of `L`. */
export function createThreadHandle(ctx: VmContext, L: LuaState, idx: number): LuaThread {
  const slot: HandleSlot = {
    ctx,
    ref: makeRef(L, idx),
    pointer: pointerAt(L, idx) ?? 0,
    released: false,
  };

  function target(): LuaState {
    assertOpen(ctx);
    const live = liveSlot(ctx, thread);
    const state = threadFromRef(activeState(ctx), live.ref);
    if (state === null) {
      throw new ContractViolation('handle no longer refers to a thread');
    }
    return state;
  }

  const thread: LuaThread = {
    kind: 'thread',

    get pointer(): number {
      return slot.pointer;
    },

    release(): void {
      releaseSlot(slot);
    },

    resume(...args: LuaValue[]): Result<LuaValue[], VmError> {
      const closed = closedError(ctx);
      if (closed !== null) {
        return { ok: false, error: closed };
      }
      return resumeThread(ctx, target(), args);
    },

    status(): ThreadStatus {
      return threadStatus(ctx, target());
    },

    reset(fn: LuaFunction): Result<void, VmError> {
      const closed = closedError(ctx);
      if (closed !== null) {
        return { ok: false, error: closed };
      }
      return resetThread(ctx, slot, target(), fn);
    },

    sandbox(): Result<void, VmError> {
      const closed = closedError(ctx);
      if (closed !== null) {
        return { ok: false, error: closed };
      }
      return sandboxThread(ctx, target());
    },

    isSandboxed(): boolean {
      return recordFor(ctx, target()).sandboxed;
    },
  };

  registerHandle(thread, slot);
  return thread;
}
