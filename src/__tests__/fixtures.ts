/**
 * luavm-bridge — Shared test helpers.
 *
 * Result unwrapping and value narrowing for tests. Not a test file itself.
 */

import type { LuaFunction, LuaTable, LuaThread, LuaValue, LuaVm, Result } from '../types.js';
import type { VmError } from '../errors.js';
import { formatVmError } from '../errors.js';

/** Value of a successful result; throws with the formatted error otherwise. */
export function unwrap<T>(result: Result<T, VmError>): T {
  if (!result.ok) {
    throw new Error(formatVmError(result.error));
  }
  return result.value;
}

/** Error of a failed result; throws if the operation succeeded. */
export function failure<T>(result: Result<T, VmError>): VmError {
  if (result.ok) {
    throw new Error('expected the operation to fail');
  }
  return result.error;
}

/** Message of a failed result carrying one. */
export function failureMessage<T>(result: Result<T, VmError>): string {
  const error = failure(result);
  if (error.code !== 'RUNTIME_ERROR' && error.code !== 'SYNTAX_ERROR') {
    throw new Error(`expected an error with a message, got ${error.code}`);
  }
  return error.message;
}

export function asTable(value: LuaValue | undefined): LuaTable {
  if (typeof value !== 'object' || value === null || value.kind !== 'table') {
    throw new Error('expected a table');
  }
  return value;
}

export function asFunction(value: LuaValue | undefined): LuaFunction {
  if (typeof value !== 'object' || value === null || value.kind !== 'function') {
    throw new Error('expected a function');
  }
  return value;
}

export function asThread(value: LuaValue | undefined): LuaThread {
  if (typeof value !== 'object' || value === null || value.kind !== 'thread') {
    throw new Error('expected a thread');
  }
  return value;
}

/** Read a global of the current context. */
export function globalOf(vm: LuaVm, name: string): LuaValue {
  return unwrap(vm.globals().get(name));
}

/** Compile `source` into a function. */
export function compile(vm: LuaVm, source: string, name = 'test'): LuaFunction {
  return unwrap(vm.load(source, { name }));
}

/**
 * Run gcCollect() until `done` holds or the attempts run out.
 * Finalizers run on the collector's schedule, so one pass may not be enough.
 */
export async function collectUntil(
  vm: LuaVm,
  done: () => boolean,
  attempts = 20,
): Promise<Result<void, VmError>> {
  let last: Result<void, VmError> = { ok: true, value: undefined };
  for (let i = 0; i < attempts && !done(); i++) {
    last = await vm.gcCollect();
    if (!last.ok) {
      return last;
    }
  }
  return last;
}
