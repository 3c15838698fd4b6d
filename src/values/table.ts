/**
 * luavm-bridge: Table handles
 *
 * Keyed and sequence operations on a VM table. Metamethod-honouring
 * operations run under `lua_pcall`; raw reads and traversal work on the
 * table's contents directly, which for a readonly table is its backing table.
 */

import type { LuaTable, LuaValue, Result, ResultErr } from '../types.js';
import type { VmError } from '../errors.js';
import { ContractViolation, READONLY_TABLE_MESSAGE, runtimeError } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { lua, lauxlib, makeRef, pointerAt, pushRef, raise } from '../runtime/lua.js';
import {
  activeState,
  assertOpen,
  callProtectedSingle,
  callProtectedVoid,
  closedError,
} from '../runtime/protected-call.js';
import {
  isReadonlyAt,
  pushContents,
  pushVisibleMetatable,
  setReadonlyAt,
} from '../readonly/readonly-table.js';
import { isSafeEnvAt, setSafeEnvAt } from '../sandbox/isolation.js';
import { liveSlot, registerHandle, releaseSlot } from './handle-registry.js';
import type { HandleSlot } from './handle-registry.js';
import { assertPushable, pushValue, readValue } from './marshal.js';

// ---------------------------------------------------------------------------
// Protected bodies (table at slot 1)
// ---------------------------------------------------------------------------

function getBody(L: LuaState): number {
  lua.lua_gettable(L, 1);
  return 1;
}

function setBody(L: LuaState): number {
  lua.lua_settable(L, 1);
  return 0;
}

function rawGetBody(L: LuaState): number {
  pushContents(L, 1);
  lua.lua_pushvalue(L, 2);
  lua.lua_rawget(L, -2);
  return 1;
}

function rawSetBody(L: LuaState): number {
  lua.lua_rawset(L, 1);
  return 0;
}

function lenBody(L: LuaState): number {
  lua.lua_pushinteger(L, lauxlib.luaL_len(L, 1));
  return 1;
}

function pushBody(L: LuaState): number {
  const length = lauxlib.luaL_len(L, 1);
  lua.lua_seti(L, 1, length + 1);
  return 0;
}

function popBody(L: LuaState): number {
  const length = lauxlib.luaL_len(L, 1);
  if (length === 0) {
    lua.lua_pushnil(L);
    return 1;
  }
  lua.lua_geti(L, 1, length);
  lua.lua_pushnil(L);
  lua.lua_seti(L, 1, length);
  return 1;
}

function rawPushBody(L: LuaState): number {
  lua.lua_rawseti(L, 1, lua.lua_rawlen(L, 1) + 1);
  return 0;
}

function rawPopBody(L: LuaState): number {
  const length = lua.lua_rawlen(L, 1);
  if (length === 0) {
    lua.lua_pushnil(L);
    return 1;
  }
  lua.lua_rawgeti(L, 1, length);
  lua.lua_pushnil(L);
  lua.lua_rawseti(L, 1, length);
  return 1;
}

function rawInsertBody(position: number): (L: LuaState) => number {
  return (L) => {
    const length = lua.lua_rawlen(L, 1);
    if (!Number.isInteger(position) || position < 1 || position > length + 1) {
      return raise(L, 'index out of bounds');
    }
    for (let i = length; i >= position; i--) {
      lua.lua_rawgeti(L, 1, i);
      lua.lua_rawseti(L, 1, i + 1);
    }
    lua.lua_rawseti(L, 1, position);
    return 0;
  };
}

function rawRemoveBody(position: number): (L: LuaState) => number {
  return (L) => {
    const length = lua.lua_rawlen(L, 1);
    if (!Number.isInteger(position) || position < 1 || position > length) {
      return raise(L, 'index out of bounds');
    }
    for (let i = position; i < length; i++) {
      lua.lua_rawgeti(L, 1, i + 1);
      lua.lua_rawseti(L, 1, i);
    }
    lua.lua_pushnil(L);
    lua.lua_rawseti(L, 1, length);
    return 0;
  };
}

// ---------------------------------------------------------------------------
// Handle
// ---------------------------------------------------------------------------

/** Create a handle pinning the table at `idx` of `L`. */
export function createTableHandle(ctx: VmContext, L: LuaState, idx: number): LuaTable {
  const slot: HandleSlot = {
    ctx,
    ref: makeRef(L, idx),
    pointer: pointerAt(L, idx) ?? 0,
    released: false,
  };

  /** Push the table on the active thread; the caller pops. */
  function pushSelf(): LuaState {
    assertOpen(ctx);
    const live = liveSlot(ctx, table);
    const active = activeState(ctx);
    lua.lua_checkstack(active, 8);
    pushRef(active, live.ref);
    return active;
  }

  /** Run `inspect` with the table on top of the active stack, then restore it. */
  function withSelf<T>(inspect: (active: LuaState, t: number) => T): T {
    const active = pushSelf();
    const base = lua.lua_gettop(active) - 1;
    try {
      return inspect(active, base + 1);
    } finally {
      lua.lua_settop(active, base);
    }
  }

  function readonlyError(): ResultErr<VmError> | null {
    const closed = closedError(ctx);
    if (closed !== null) {
      return { ok: false, error: closed };
    }
    return isReadonly() ? { ok: false, error: runtimeError(READONLY_TABLE_MESSAGE) } : null;
  }

  function isReadonly(): boolean {
    return withSelf((active, t) => isReadonlyAt(active, t));
  }

  const table: LuaTable = {
    kind: 'table',

    get pointer(): number {
      return slot.pointer;
    },

    release(): void {
      releaseSlot(slot);
    },

    get(key: LuaValue): Result<LuaValue, VmError> {
      return callProtectedSingle(ctx, getBody, [table, key]);
    },

    set(key: LuaValue, value: LuaValue): Result<void, VmError> {
      return readonlyError() ?? callProtectedVoid(ctx, setBody, [table, key, value]);
    },

    rawGet(key: LuaValue): Result<LuaValue, VmError> {
      return callProtectedSingle(ctx, rawGetBody, [table, key]);
    },

    rawSet(key: LuaValue, value: LuaValue): Result<void, VmError> {
      return readonlyError() ?? callProtectedVoid(ctx, rawSetBody, [table, key, value]);
    },

    len(): Result<number, VmError> {
      const result = callProtectedSingle(ctx, lenBody, [table]);
      if (!result.ok) {
        return result;
      }
      return { ok: true, value: typeof result.value === 'number' ? result.value : 0 };
    },

    rawLen(): number {
      return withSelf((active, t) => {
        pushContents(active, t);
        return lua.lua_rawlen(active, -1);
      });
    },

    push(value: LuaValue): Result<void, VmError> {
      return readonlyError() ?? callProtectedVoid(ctx, pushBody, [table, value]);
    },

    pop(): Result<LuaValue, VmError> {
      return readonlyError() ?? callProtectedSingle(ctx, popBody, [table]);
    },

    rawPush(value: LuaValue): Result<void, VmError> {
      return readonlyError() ?? callProtectedVoid(ctx, rawPushBody, [table, value]);
    },

    rawPop(): Result<LuaValue, VmError> {
      return readonlyError() ?? callProtectedSingle(ctx, rawPopBody, [table]);
    },

    rawInsert(index: number, value: LuaValue): Result<void, VmError> {
      return readonlyError() ?? callProtectedVoid(ctx, rawInsertBody(index), [table, value]);
    },

    rawRemove(index: number): Result<void, VmError> {
      return readonlyError() ?? callProtectedVoid(ctx, rawRemoveBody(index), [table]);
    },

    pairs(): Array<readonly [LuaValue, LuaValue]> {
      return withSelf((active, t) => {
        pushContents(active, t);
        const contents = lua.lua_gettop(active);
        const entries: Array<readonly [LuaValue, LuaValue]> = [];
        lua.lua_pushnil(active);
        while (lua.lua_next(active, contents)) {
          entries.push([readValue(ctx, active, -2), readValue(ctx, active, -1)]);
          lua.lua_pop(active, 1);
        }
        return entries;
      });
    },

    sequenceValues(): LuaValue[] {
      return withSelf((active, t) => {
        pushContents(active, t);
        const length = lua.lua_rawlen(active, -1);
        const values: LuaValue[] = [];
        for (let i = 1; i <= length; i++) {
          lua.lua_rawgeti(active, -1, i);
          values.push(readValue(ctx, active, -1));
          lua.lua_pop(active, 1);
        }
        return values;
      });
    },

    isReadonly,

    setReadonly(enabled: boolean): void {
      withSelf((active, t) => {
        setReadonlyAt(active, t, enabled);
      });
    },

    isSafeEnv(): boolean {
      return withSelf((active, t) => isSafeEnvAt(ctx, active, t));
    },

    setSafeEnv(enabled: boolean): void {
      withSelf((active, t) => {
        setSafeEnvAt(ctx, active, t, enabled);
      });
    },

    getMetatable(): LuaTable | null {
      return withSelf((active, t) => {
        if (!pushVisibleMetatable(active, t) || !lua.lua_istable(active, -1)) {
          return null;
        }
        return createTableHandle(ctx, active, -1);
      });
    },

    setMetatable(metatable: LuaTable | null): void {
      if (metatable !== null) {
        assertPushable(ctx, metatable);
      }
      withSelf((active, t) => {
        if (isReadonlyAt(active, t)) {
          throw new ContractViolation('cannot replace the metatable of a readonly table');
        }
        pushValue(ctx, active, metatable);
        lua.lua_setmetatable(active, t);
      });
    },
  };

  registerHandle(table, slot);
  return table;
}
