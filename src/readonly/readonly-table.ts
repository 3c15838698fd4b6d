/**
 * luavm-bridge: Readonly enforcement
 *
 * fengari tables carry no immutability flag, so a readonly table is kept as
 * an empty shell: its entries live in a hidden backing table and a guard
 * metatable serves reads from it and rejects every write. Table identity is
 * unchanged, so existing references keep working.
 *
 * String keys starting with `__` stay on the shell as well: metamethods are
 * looked up raw, so a readonly table still serves as a metatable. Host
 * writes and `rawset` refuse them like any other key; a script assignment
 * to one of these keys bypasses `__newindex` and lands on the shell only.
 *
 * Guard metatable layout:
 *   [BACKING_KEY]  backing table holding the entries
 *   [ORIGINAL_KEY] metatable the table had before (absent when none)
 *   __index        backing lookup, then the original `__index`
 *   __newindex     raises READONLY_TABLE_MESSAGE
 *   __len, __pairs answer from the backing table
 *   other fields   copied from the original metatable
 */

import { READONLY_TABLE_MESSAGE } from '../errors.js';
import type { LuaState } from '../runtime/lua.js';
import { lua, lauxlib, pushString, raiseAt } from '../runtime/lua.js';

const BACKING_KEY = { purpose: 'readonly backing table' };
const ORIGINAL_KEY = { purpose: 'readonly original metatable' };

/** Metatable fields the guard owns; never copied from the original. */
const GUARD_FIELDS: ReadonlySet<string> = new Set([
  '__index',
  '__newindex',
  '__len',
  '__pairs',
  '__metatable',
]);

// ---------------------------------------------------------------------------
// Guard metamethods
// ---------------------------------------------------------------------------

/** `__index` closure. Upvalues: backing table, original metatable or nil. */
function guardIndex(L: LuaState): number {
  lua.lua_pushvalue(L, 2);
  lua.lua_rawget(L, lua.lua_upvalueindex(1));
  if (!lua.lua_isnil(L, -1) || !lua.lua_istable(L, lua.lua_upvalueindex(2))) {
    return 1;
  }
  lua.lua_pop(L, 1);

  pushString(L, '__index');
  lua.lua_rawget(L, lua.lua_upvalueindex(2));
  if (lua.lua_rawequal(L, -1, 1)) {
    // Self-indexing: the backing lookup already answered.
    lua.lua_pop(L, 1);
    lua.lua_pushnil(L);
    return 1;
  }
  if (lua.lua_isfunction(L, -1)) {
    lua.lua_pushvalue(L, 1);
    lua.lua_pushvalue(L, 2);
    lua.lua_call(L, 2, 1);
    return 1;
  }
  if (!lua.lua_isnil(L, -1)) {
    lua.lua_pushvalue(L, 2);
    lua.lua_gettable(L, -2);
  }
  return 1;
}

function guardNewIndex(L: LuaState): number {
  return raiseAt(L, READONLY_TABLE_MESSAGE);
}

/** `__len` closure. Upvalue: backing table. */
function guardLen(L: LuaState): number {
  lua.lua_pushinteger(L, lua.lua_rawlen(L, lua.lua_upvalueindex(1)));
  return 1;
}

/** Raw `next` over the table at slot 1. */
function rawNext(L: LuaState): number {
  lauxlib.luaL_checktype(L, 1, lua.LUA_TTABLE);
  lua.lua_settop(L, 2);
  if (lua.lua_next(L, 1)) {
    return 2;
  }
  lua.lua_pushnil(L);
  return 1;
}

/** `__pairs` closure. Upvalue: backing table. */
function guardPairs(L: LuaState): number {
  lua.lua_pushjsfunction(L, rawNext);
  lua.lua_pushvalue(L, lua.lua_upvalueindex(1));
  lua.lua_pushnil(L);
  return 3;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Push field `key` of the guard metatable of the table at `idx`.
 * Pushes nil when the table is not readonly.
 */
function pushGuardField(L: LuaState, idx: number, key: object): void {
  const t = lua.lua_absindex(L, idx);
  if (!lua.lua_istable(L, t) || !lua.lua_getmetatable(L, t)) {
    lua.lua_pushnil(L);
    return;
  }
  lua.lua_pushlightuserdata(L, BACKING_KEY);
  lua.lua_rawget(L, -2);
  if (!lua.lua_istable(L, -1)) {
    lua.lua_pop(L, 2);
    lua.lua_pushnil(L);
    return;
  }
  if (key !== BACKING_KEY) {
    lua.lua_pop(L, 1);
    lua.lua_pushlightuserdata(L, key);
    lua.lua_rawget(L, -2);
  }
  lua.lua_remove(L, -2);
}

export function isReadonlyAt(L: LuaState, idx: number): boolean {
  pushGuardField(L, idx, BACKING_KEY);
  const readonly = lua.lua_istable(L, -1);
  lua.lua_pop(L, 1);
  return readonly;
}

/** Push the table that holds the entries of the table at `idx`. */
export function pushContents(L: LuaState, idx: number): void {
  const t = lua.lua_absindex(L, idx);
  pushGuardField(L, t, BACKING_KEY);
  if (lua.lua_isnil(L, -1)) {
    lua.lua_pop(L, 1);
    lua.lua_pushvalue(L, t);
  }
}

/**
 * Push the metatable scripts and the host observe for the value at `idx`:
 * the original one for readonly tables. Pushes nothing and returns false
 * when there is none.
 */
export function pushVisibleMetatable(L: LuaState, idx: number): boolean {
  const t = lua.lua_absindex(L, idx);
  if (!isReadonlyAt(L, t)) {
    return lua.lua_getmetatable(L, t);
  }
  pushGuardField(L, t, ORIGINAL_KEY);
  if (lua.lua_isnil(L, -1)) {
    lua.lua_pop(L, 1);
    return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Toggle
// ---------------------------------------------------------------------------

/** Whether the key at `idx` names a metamethod field. */
function isMetaField(L: LuaState, idx: number): boolean {
  return lua.lua_type(L, idx) === lua.LUA_TSTRING && (lua.lua_tojsstring(L, idx) ?? '').startsWith('__');
}

function freeze(L: LuaState, t: number): void {
  const base = lua.lua_gettop(L);
  lua.lua_checkstack(L, 10);

  lua.lua_newtable(L);
  const backing = lua.lua_gettop(L);
  lua.lua_pushnil(L);
  while (lua.lua_next(L, t)) {
    lua.lua_pushvalue(L, -2);
    lua.lua_insert(L, -2);
    lua.lua_rawset(L, backing);
  }
  lua.lua_pushnil(L);
  while (lua.lua_next(L, backing)) {
    lua.lua_pop(L, 1);
    if (!isMetaField(L, -1)) {
      lua.lua_pushvalue(L, -1);
      lua.lua_pushnil(L);
      lua.lua_rawset(L, t);
    }
  }

  const hasOriginal = lua.lua_getmetatable(L, t);
  if (!hasOriginal) {
    lua.lua_pushnil(L);
  }
  const original = lua.lua_gettop(L);

  lua.lua_createtable(L, 0, 6);
  const guard = lua.lua_gettop(L);
  lua.lua_pushlightuserdata(L, BACKING_KEY);
  lua.lua_pushvalue(L, backing);
  lua.lua_rawset(L, guard);

  if (hasOriginal) {
    lua.lua_pushlightuserdata(L, ORIGINAL_KEY);
    lua.lua_pushvalue(L, original);
    lua.lua_rawset(L, guard);

    lua.lua_pushnil(L);
    while (lua.lua_next(L, original)) {
      const owned =
        lua.lua_type(L, -2) === lua.LUA_TSTRING && GUARD_FIELDS.has(lua.lua_tojsstring(L, -2) ?? '');
      if (owned) {
        lua.lua_pop(L, 1);
      } else {
        lua.lua_pushvalue(L, -2);
        lua.lua_insert(L, -2);
        lua.lua_rawset(L, guard);
      }
    }
  }

  pushString(L, '__index');
  lua.lua_pushvalue(L, backing);
  lua.lua_pushvalue(L, original);
  lua.lua_pushjsclosure(L, guardIndex, 2);
  lua.lua_rawset(L, guard);

  pushString(L, '__newindex');
  lua.lua_pushjsfunction(L, guardNewIndex);
  lua.lua_rawset(L, guard);

  pushString(L, '__len');
  lua.lua_pushvalue(L, backing);
  lua.lua_pushjsclosure(L, guardLen, 1);
  lua.lua_rawset(L, guard);

  pushString(L, '__pairs');
  lua.lua_pushvalue(L, backing);
  lua.lua_pushjsclosure(L, guardPairs, 1);
  lua.lua_rawset(L, guard);

  lua.lua_setmetatable(L, t);
  lua.lua_settop(L, base);
}

function thaw(L: LuaState, t: number): void {
  const base = lua.lua_gettop(L);
  lua.lua_checkstack(L, 6);

  pushGuardField(L, t, BACKING_KEY);
  const backing = lua.lua_gettop(L);
  pushGuardField(L, t, ORIGINAL_KEY);
  const original = lua.lua_gettop(L);

  lua.lua_pushnil(L);
  while (lua.lua_next(L, backing)) {
    lua.lua_pushvalue(L, -2);
    lua.lua_insert(L, -2);
    lua.lua_rawset(L, t);
  }

  lua.lua_pushvalue(L, original);
  lua.lua_setmetatable(L, t);
  lua.lua_settop(L, base);
}

/** Set or clear the readonly flag of the table at `idx`. No-op when unchanged. */
export function setReadonlyAt(L: LuaState, idx: number, enabled: boolean): void {
  const t = lua.lua_absindex(L, idx);
  if (isReadonlyAt(L, t) === enabled) {
    return;
  }
  if (enabled) {
    freeze(L, t);
  } else {
    thaw(L, t);
  }
}
