/**
 * luavm-bridge: VM state creation
 *
 * Resolves options against their defaults and creates the fengari state
 * and the internal bookkeeping for one VM instance.
 */

import type { VmOptions } from '../types.js';
import {
  DEFAULT_INTERRUPT_INTERVAL,
  DEFAULT_PACKAGE_CPATH,
  DEFAULT_PACKAGE_PATH,
  DEFAULT_SAFE_MODE,
  DEFAULT_STD_LIBS,
} from '../types.js';
import { ContractViolation } from '../errors.js';
import type { InternalVmState } from '../internal-types.js';
import { lauxlib } from '../runtime/lua.js';
import { assertLibrariesAllowed } from '../stdlib/stdlib.js';

/** Counter for deterministic ID generation. */
let instanceCounter = 0;

/** Reset the instance counter (for testing only). */
export function resetInstanceCounter(): void {
  instanceCounter = 0;
}

/**
 * Fill in defaults and validate.
 * Throws ContractViolation for an unsafe library in safe mode or a
 * non-positive interrupt interval.
 */
export function resolveVmOptions(overrides: Partial<VmOptions> = {}): Readonly<VmOptions> {
  const options: VmOptions = {
    stdLibs: [...(overrides.stdLibs ?? DEFAULT_STD_LIBS)],
    safeMode: overrides.safeMode ?? DEFAULT_SAFE_MODE,
    interruptInterval: overrides.interruptInterval ?? DEFAULT_INTERRUPT_INTERVAL,
    packagePath: overrides.packagePath ?? DEFAULT_PACKAGE_PATH,
    packageCPath: overrides.packageCPath ?? DEFAULT_PACKAGE_CPATH,
  };

  if (!Number.isInteger(options.interruptInterval) || options.interruptInterval < 1) {
    throw new ContractViolation(
      `interruptInterval must be a positive integer, got ${String(options.interruptInterval)}`,
    );
  }
  assertLibrariesAllowed(options.stdLibs, options.safeMode);

  Object.freeze(options.stdLibs);
  return Object.freeze(options);
}

/** Create the fengari state and empty bookkeeping for a new instance. */
export function createVmState(options: Readonly<VmOptions>): InternalVmState {
  const id = `luavm-${String(instanceCounter)}`;
  instanceCounter += 1;

  const L = lauxlib.luaL_newstate();
  return {
    id,
    options,
    L,
    status: 'open',
    current: L,
    interrupt: null,
    interruptRunning: false,
    pendingYield: null,
    threadEventCallback: null,
    inThreadEvent: false,
    deferredEventError: null,
    threads: new WeakMap(),
    liveThreads: new Set(),
    sandbox: null,
    safeEnvTables: new WeakSet(),
    packageRef: null,
    moduleCache: new Map(),
    modulesLoading: new Set(),
  };
}
