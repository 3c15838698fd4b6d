/**
 * luavm-bridge: Error types
 *
 * Discriminated union of the recoverable errors the bridge returns, factory
 * functions for each variant, the fixed message shapes callers match on,
 * and the ContractViolation thrown on host API misuse.
 */

import type { ThreadStatus } from './types.js';

// ---------------------------------------------------------------------------
// Error Codes
// ---------------------------------------------------------------------------

/** All recoverable error codes produced by the bridge. */
export type VmErrorCode =
  | 'RUNTIME_ERROR'
  | 'SYNTAX_ERROR'
  | 'COROUTINE_UNRESUMABLE'
  | 'INSTANCE_CLOSED';

// ---------------------------------------------------------------------------
// Error Union
// ---------------------------------------------------------------------------

/** Discriminated union of all recoverable errors. */
export type VmError =
  | {
      readonly code: 'RUNTIME_ERROR';
      readonly message: string;
    }
  | {
      readonly code: 'SYNTAX_ERROR';
      readonly message: string;
      /** The chunk ended before a statement was complete. */
      readonly incompleteInput: boolean;
    }
  | {
      readonly code: 'COROUTINE_UNRESUMABLE';
      readonly status: ThreadStatus;
    }
  | {
      readonly code: 'INSTANCE_CLOSED';
      readonly instanceId: string;
    };

// ---------------------------------------------------------------------------
// Message Contracts
// ---------------------------------------------------------------------------

/** Raised by every structural mutation of a readonly table. */
export const READONLY_TABLE_MESSAGE = 'attempt to modify a readonly table';

/** Appended to a failed lookup when a native candidate exists in safe mode. */
export const SAFE_MODE_DYLIB_MESSAGE = 'dynamic libraries are disabled in safe mode';

/** Header of the message raised when no module candidate matches. */
export function moduleNotFoundMessage(name: string): string {
  return `module '${name}' not found`;
}

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create a RUNTIME_ERROR error. */
export function runtimeError(message: string): VmError {
  return { code: 'RUNTIME_ERROR', message } as const;
}

/** Create a SYNTAX_ERROR error. */
export function syntaxError(message: string): Extract<VmError, { code: 'SYNTAX_ERROR' }> {
  return { code: 'SYNTAX_ERROR', message, incompleteInput: message.endsWith('<eof>') } as const;
}

/** Create a COROUTINE_UNRESUMABLE error. */
export function coroutineUnresumable(status: ThreadStatus): VmError {
  return { code: 'COROUTINE_UNRESUMABLE', status } as const;
}

/** Create an INSTANCE_CLOSED error. */
export function instanceClosed(instanceId: string): VmError {
  return { code: 'INSTANCE_CLOSED', instanceId } as const;
}

/** Render any VmError as a single line of text. */
export function formatVmError(error: VmError): string {
  switch (error.code) {
    case 'RUNTIME_ERROR':
      return `runtime error: ${error.message}`;
    case 'SYNTAX_ERROR':
      return `syntax error: ${error.message}`;
    case 'COROUTINE_UNRESUMABLE':
      return `coroutine is non-resumable (status: ${error.status})`;
    case 'INSTANCE_CLOSED':
      return `instance ${error.instanceId} is closed`;
  }
}

/** Best-effort message of anything a host callback threw. */
export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Contract Violations
// ---------------------------------------------------------------------------

/**
 * Thrown when host code misuses the API. Never returned as a Result: the
 * embedding cannot safely continue past it.
 */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolation';
  }
}
