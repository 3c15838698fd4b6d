/**
 * luavm-bridge: Handle slots
 *
 * A handle pins its VM value through a registry ref. The ref is freed by an
 * explicit `release()` or, once the handle itself is unreachable, by the
 * finalization registry below.
 */

import { ContractViolation } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import { dropRef } from '../runtime/lua.js';

/** Registry bookkeeping behind one handle object. */
export interface HandleSlot {
  readonly ctx: VmContext;
  /** Registry ref; replaced when a thread is reset onto a fresh VM thread. */
  ref: number;
  pointer: number;
  released: boolean;
}

const slots = new WeakMap<object, HandleSlot>();

const collector = new FinalizationRegistry<HandleSlot>((slot) => {
  releaseSlot(slot);
});

export function registerHandle(handle: object, slot: HandleSlot): void {
  slots.set(handle, slot);
  collector.register(handle, slot, slot);
}

export function slotOf(handle: object): HandleSlot | undefined {
  return slots.get(handle);
}

/** Free the slot's registry ref. Idempotent. */
export function releaseSlot(slot: HandleSlot): void {
  if (slot.released) {
    return;
  }
  slot.released = true;
  collector.unregister(slot);
  if (slot.ctx.state.status === 'open') {
    dropRef(slot.ctx.state.L, slot.ref);
  }
}

/**
 * Slot of a handle that may be used with `ctx`.
 * Throws ContractViolation for foreign, unknown or released handles.
 */
export function liveSlot(ctx: VmContext, handle: object): HandleSlot {
  const slot = slots.get(handle);
  if (slot === undefined) {
    throw new ContractViolation('value is not a handle issued by a VM instance');
  }
  if (slot.ctx !== ctx) {
    throw new ContractViolation(
      `handle belongs to instance ${slot.ctx.state.id}, not ${ctx.state.id}`,
    );
  }
  if (slot.released) {
    throw new ContractViolation('handle has been released');
  }
  return slot;
}
