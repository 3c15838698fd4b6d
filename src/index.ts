/**
 * luavm-bridge — Embedded Lua VM with sandboxing, readonly tables, interrupts,
 * thread events and module loading.
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  Result,
  ResultOk,
  ResultErr,
  StdLibName,
  VmOptions,
  LuaOpaque,
  LuaValue,
  HostReturn,
  HostFunction,
  LuaHandle,
  LuaTable,
  LuaFunction,
  ThreadStatus,
  LuaThread,
  InterruptOutcome,
  InterruptHandler,
  ThreadEvent,
  ThreadEventCallback,
  ChunkOptions,
  VmStatus,
  LuaVm,
  VmError,
  VmErrorCode,
} from './types.js';

export {
  UNSAFE_STD_LIBS,
  DEFAULT_STD_LIBS,
  DEFAULT_SAFE_MODE,
  DEFAULT_INTERRUPT_INTERVAL,
  DEFAULT_PACKAGE_PATH,
  DEFAULT_PACKAGE_CPATH,
} from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  READONLY_TABLE_MESSAGE,
  SAFE_MODE_DYLIB_MESSAGE,
  moduleNotFoundMessage,
  runtimeError,
  syntaxError,
  coroutineUnresumable,
  instanceClosed,
  formatVmError,
  ContractViolation,
} from './errors.js';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export { createLuaVm } from './vm.js';
export { resetInstanceCounter } from './loader/instance-factory.js';

// ---------------------------------------------------------------------------
// Interrupt Handlers
// ---------------------------------------------------------------------------

export type { TickBudget } from './resources/tick-budget.js';
export { createTickBudget, TickBudgetExhaustedSignal } from './resources/tick-budget.js';
export type { Deadline, TimerFn } from './resources/deadline.js';
export { createDeadline, DeadlineExceededSignal, defaultTimer } from './resources/deadline.js';
export type { TimeSlice } from './resources/time-slice.js';
export { createTimeSlice } from './resources/time-slice.js';
