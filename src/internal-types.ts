/**
 * luavm-bridge: Internal types
 *
 * Mutable internal state backing the public LuaVm interface.
 * These types are NOT exported from the package.
 */

import type {
  VmOptions,
  VmStatus,
  LuaVm,
  InterruptHandler,
  ThreadEventCallback,
} from './types.js';
import type { VmError } from './errors.js';
import type { LuaState } from './runtime/lua.js';

/** Per-thread sandbox bookkeeping. Never references the thread itself. */
export interface ThreadRecord {
  /** Created under global sandbox mode, or sandboxed explicitly. */
  sandboxed: boolean;
  /** `thread.sandbox()` was applied. */
  isolated: boolean;
  /** Registry ref of the environment inherited from the creator, null for the VM globals. */
  baseEnvRef: number | null;
  /** Registry ref of the private environment created by `thread.sandbox()`. */
  envRef: number | null;
}

/** What global sandbox mode changed, so disabling can undo exactly that. */
export interface SandboxSnapshot {
  /** Registry ref of the original global table. */
  readonly globalsRef: number;
  /** Registry ref of the proxy installed as the global table. */
  readonly proxyRef: number;
  /** Registry refs of the tables marked readonly on enable. */
  readonly markedRefs: readonly number[];
}

/** Mutable internal state for a VM instance. */
export interface InternalVmState {
  readonly id: string;
  readonly options: Readonly<VmOptions>;
  /** Main thread of the fengari state. */
  readonly L: LuaState;
  status: VmStatus;
  /** Thread whose frames are executing; the main thread when idle. */
  current: LuaState;

  interrupt: InterruptHandler | null;
  interruptRunning: boolean;
  /** Thread that asked to yield at a call boundary. */
  pendingYield: LuaState | null;

  threadEventCallback: ThreadEventCallback | null;
  inThreadEvent: boolean;
  /** Failure of a destruction callback, reported by the next gcCollect(). */
  deferredEventError: VmError | null;
  readonly threads: WeakMap<LuaState, ThreadRecord>;
  /** Pointers of tracked threads not yet collected. */
  readonly liveThreads: Set<number>;

  sandbox: SandboxSnapshot | null;
  readonly safeEnvTables: WeakSet<object>;

  /** Registry ref of the `package` table, null when module loading is off. */
  packageRef: number | null;
  /** Resolved absolute path to registry ref of the module result. */
  readonly moduleCache: Map<string, number>;
  readonly modulesLoading: Set<string>;
}

/** Internal state paired with the public object handed to callbacks. */
export interface VmContext {
  readonly state: InternalVmState;
  readonly vm: LuaVm;
}
