/**
 * luavm-bridge: Thread event bridge
 *
 * Delivers creation and destruction events to the VM's single thread event
 * callback. Destruction is observed through a FinalizationRegistry on the
 * fengari thread objects, so it follows the JavaScript collector rather than
 * host handle counts. The destruction payload is a light-userdata marker
 * carrying the pointer the thread had at creation.
 *
 * While the callback runs, threads it creates fire no events of their own.
 */

import type { ThreadEvent } from '../types.js';
import { messageOf, runtimeError } from '../errors.js';
import type { ThreadRecord, VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { pointerFor } from '../runtime/lua.js';
import { releaseRecord } from '../sandbox/environment.js';

interface TrackedThread {
  readonly ctx: VmContext;
  readonly pointer: number;
  readonly record: ThreadRecord;
}

const collector = new FinalizationRegistry<TrackedThread>((tracked) => {
  onThreadCollected(tracked);
});

/**
 * Invoke the callback with the event `build` produces.
 * Returns the callback's error message, or null when it succeeded or was
 * suppressed.
 */
export function emitThreadEvent(ctx: VmContext, build: () => ThreadEvent): string | null {
  const { state } = ctx;
  const callback = state.threadEventCallback;
  if (callback === null || state.inThreadEvent) {
    return null;
  }
  state.inThreadEvent = true;
  try {
    callback(ctx.vm, build());
    return null;
  } catch (err: unknown) {
    return messageOf(err);
  } finally {
    state.inThreadEvent = false;
  }
}

function emitDestroyed(ctx: VmContext, pointer: number): void {
  const failure = emitThreadEvent(ctx, () => ({
    kind: 'destroyed',
    value: { kind: 'lightuserdata', pointer },
  }));
  if (failure !== null && ctx.state.deferredEventError === null) {
    ctx.state.deferredEventError = runtimeError(failure);
  }
}

function onThreadCollected(tracked: TrackedThread): void {
  const { ctx, pointer, record } = tracked;
  const { state } = ctx;
  if (state.status !== 'open') {
    return;
  }
  releaseRecord(state.L, record);
  if (state.liveThreads.delete(pointer)) {
    emitDestroyed(ctx, pointer);
  }
}

/** Start observing `thread`. Returns its pointer. */
export function trackThread(ctx: VmContext, thread: LuaState, record: ThreadRecord): number {
  const pointer = pointerFor(thread) ?? 0;
  ctx.state.threads.set(thread, record);
  ctx.state.liveThreads.add(pointer);
  collector.register(thread, { ctx, pointer, record });
  return pointer;
}

/** Emit one destruction event per thread still tracked, in creation order. */
export function drainThreads(ctx: VmContext): void {
  const pointers = [...ctx.state.liveThreads];
  ctx.state.liveThreads.clear();
  for (const pointer of pointers) {
    emitDestroyed(ctx, pointer);
  }
}
