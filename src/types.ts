/**
 * luavm-bridge: Core type definitions
 *
 * Public types for embedding a Lua VM: options, handles, thread events,
 * interrupt outcomes and the result type every fallible operation returns.
 */

import type { VmError } from './errors.js';

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** Success branch of a Result. */
export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failure branch of a Result. */
export interface ResultErr<E> {
  readonly ok: false;
  readonly error: E;
}

/** Discriminated union for fallible operations. */
export type Result<T, E> = ResultOk<T> | ResultErr<E>;

// ---------------------------------------------------------------------------
// Standard Libraries
// ---------------------------------------------------------------------------

/** Optional library groups. The base library is always opened. */
export type StdLibName =
  | 'coroutine'
  | 'table'
  | 'string'
  | 'utf8'
  | 'math'
  | 'os'
  | 'package'
  | 'debug';

/** Libraries that may only be opened outside safe mode. */
export const UNSAFE_STD_LIBS: readonly StdLibName[] = ['debug'];

/** Every safe library, including module loading. */
export const DEFAULT_STD_LIBS: readonly StdLibName[] = [
  'coroutine',
  'table',
  'string',
  'utf8',
  'math',
  'os',
  'package',
];

// ---------------------------------------------------------------------------
// VM Options
// ---------------------------------------------------------------------------

/** Default values for VmOptions. */
export const DEFAULT_SAFE_MODE = true;
export const DEFAULT_INTERRUPT_INTERVAL = 1_000;
export const DEFAULT_PACKAGE_PATH = './?.lua;./?/init.lua';
export const DEFAULT_PACKAGE_CPATH = './?.cjs';

/** Configuration for creating a VM instance. */
export interface VmOptions {
  /** Optional libraries to open. `[]` leaves only the base library. Default: DEFAULT_STD_LIBS. */
  readonly stdLibs: readonly StdLibName[];
  /** Refuse unsafe libraries and native modules. Default: true. */
  readonly safeMode: boolean;
  /** VM instructions between interrupt polls. Default: 1,000. */
  readonly interruptInterval: number;
  /** Initial `package.path` templates. Default: './?.lua;./?/init.lua'. */
  readonly packagePath: string;
  /** Initial `package.cpath` templates. Default: './?.cjs'. */
  readonly packageCPath: string;
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A VM value the host can observe but never pass back. */
export interface LuaOpaque {
  readonly kind: 'lightuserdata' | 'userdata';
  /** Address-like identifier of the underlying value. */
  readonly pointer: number;
}

/** Any value crossing the boundary. `nil` is `null`. */
export type LuaValue =
  | null
  | boolean
  | number
  | string
  | LuaTable
  | LuaFunction
  | LuaThread
  | LuaOpaque;

/** Return value of a host function: nothing, one value, or several. */
export type HostReturn = LuaValue | readonly LuaValue[] | undefined | void;

/** A host function callable from scripts. Throwing raises a Lua error. */
export type HostFunction = (vm: LuaVm, ...args: LuaValue[]) => HostReturn;

/** Common surface of every reference handle. */
export interface LuaHandle {
  /** Address-like identifier, equal for handles to the same VM value. */
  readonly pointer: number;
  /** Unpin the value. Using the handle afterwards is a contract violation. */
  release(): void;
}

/** Handle to a VM table. */
export interface LuaTable extends LuaHandle {
  readonly kind: 'table';
  /** Keyed read, honouring metamethods. */
  get(key: LuaValue): Result<LuaValue, VmError>;
  /** Keyed write, honouring metamethods. */
  set(key: LuaValue, value: LuaValue): Result<void, VmError>;
  rawGet(key: LuaValue): Result<LuaValue, VmError>;
  rawSet(key: LuaValue, value: LuaValue): Result<void, VmError>;
  /** Length, honouring `__len`. */
  len(): Result<number, VmError>;
  rawLen(): number;
  /** Append after the last element, honouring metamethods. */
  push(value: LuaValue): Result<void, VmError>;
  /** Remove and return the last element, honouring metamethods. */
  pop(): Result<LuaValue, VmError>;
  rawPush(value: LuaValue): Result<void, VmError>;
  rawPop(): Result<LuaValue, VmError>;
  /** Insert at a 1-based position, shifting later elements up. */
  rawInsert(index: number, value: LuaValue): Result<void, VmError>;
  /** Remove at a 1-based position, shifting later elements down. */
  rawRemove(index: number): Result<void, VmError>;
  /** Raw key/value pairs in traversal order. */
  pairs(): Array<readonly [LuaValue, LuaValue]>;
  /** Elements 1..n of the sequence part. */
  sequenceValues(): LuaValue[];
  isReadonly(): boolean;
  setReadonly(enabled: boolean): void;
  isSafeEnv(): boolean;
  setSafeEnv(enabled: boolean): void;
  getMetatable(): LuaTable | null;
  /** Throws ContractViolation when the table is readonly. */
  setMetatable(metatable: LuaTable | null): void;
}

/** Handle to a VM function (script or host). */
export interface LuaFunction extends LuaHandle {
  readonly kind: 'function';
  call(...args: LuaValue[]): Result<LuaValue[], VmError>;
}

/** Lifecycle state of a thread. */
export type ThreadStatus = 'resumable' | 'running' | 'normal' | 'finished' | 'error';

/** Handle to a VM coroutine. */
export interface LuaThread extends LuaHandle {
  readonly kind: 'thread';
  /** Run until the thread yields, returns or errors. */
  resume(...args: LuaValue[]): Result<LuaValue[], VmError>;
  status(): ThreadStatus;
  /** Rebind a finished, errored or not yet started thread to a new function. */
  reset(fn: LuaFunction): Result<void, VmError>;
  /** Isolate the thread's subsequent global writes from its creator. */
  sandbox(): Result<void, VmError>;
  /** Whether the thread was created under sandbox mode or sandboxed itself. */
  isSandboxed(): boolean;
}

// ---------------------------------------------------------------------------
// Interrupts
// ---------------------------------------------------------------------------

/** Outcome of one interrupt poll. Throwing aborts the running chain. */
export type InterruptOutcome = 'continue' | 'yield';

/** Host callback polled by the VM while scripts run. */
export type InterruptHandler = (vm: LuaVm) => InterruptOutcome;

// ---------------------------------------------------------------------------
// Thread Events
// ---------------------------------------------------------------------------

/** Emitted when a thread is created or collected. */
export type ThreadEvent =
  | { readonly kind: 'created'; readonly value: LuaThread }
  | { readonly kind: 'destroyed'; readonly value: LuaOpaque };

/** Host callback for thread events. Throwing fails the triggering operation. */
export type ThreadEventCallback = (vm: LuaVm, event: ThreadEvent) => void;

// ---------------------------------------------------------------------------
// VM Instance
// ---------------------------------------------------------------------------

/** Options accepted when compiling a chunk. */
export interface ChunkOptions {
  /** Chunk name used in error positions. Defaults to the source text. */
  readonly name?: string;
}

/** Lifecycle state of a VM instance. */
export type VmStatus = 'open' | 'closed';

/** One root embedding of the Lua runtime. */
export interface LuaVm {
  /** Unique instance identifier. */
  readonly id: string;
  /** Frozen options for this instance. */
  readonly options: Readonly<VmOptions>;
  readonly status: VmStatus;
  /** Whether global sandbox mode is enabled. */
  readonly isSandboxed: boolean;

  /** Global table of the currently executing context. */
  globals(): LuaTable;
  createTable(): LuaTable;
  createSequence(values: readonly LuaValue[]): LuaTable;
  createFunction(handler: HostFunction): LuaFunction;

  /** Compile without running. */
  load(source: string, options?: ChunkOptions): Result<LuaFunction, VmError>;
  /** Compile and run, returning every result. */
  exec(source: string, options?: ChunkOptions): Result<LuaValue[], VmError>;

  createThread(fn: LuaFunction): Result<LuaThread, VmError>;

  sandbox(enabled: boolean): Result<void, VmError>;

  setInterrupt(handler: InterruptHandler): void;
  removeInterrupt(): void;

  setThreadEventCallback(callback: ThreadEventCallback): void;
  removeThreadEventCallback(): void;

  /** Run a full collection and deliver pending destruction events. */
  gcCollect(): Promise<Result<void, VmError>>;

  /** Address-like identifier of any reference value. */
  pointerOf(value: LuaValue): number | null;

  /** Drain outstanding threads and release the VM. */
  close(): void;
}

// ---------------------------------------------------------------------------
// Re-export VmError from errors module (type-only)
// ---------------------------------------------------------------------------

export type { VmError, VmErrorCode } from './errors.js';
