/**
 * luavm-bridge: Base library guards
 *
 * Replaces the raw access functions of the base library with versions that
 * see through readonly shells, and makes `load` default to the calling
 * thread's environment. Each guard is a closure whose first upvalue is the
 * function it replaces.
 */

import { READONLY_TABLE_MESSAGE } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaCFunction, LuaState } from '../runtime/lua.js';
import { lua, lauxlib, luaString, pushRegistryGlobals, pushString, raiseAt } from '../runtime/lua.js';
import { isReadonlyAt, pushContents, pushVisibleMetatable } from '../readonly/readonly-table.js';
import { pushEnvironment } from '../sandbox/environment.js';

/** Call the replaced function with the guard's arguments, returning all its results. */
function delegate(L: LuaState): number {
  lua.lua_pushvalue(L, lua.lua_upvalueindex(1));
  lua.lua_insert(L, 1);
  lua.lua_call(L, lua.lua_gettop(L) - 1, lua.LUA_MULTRET);
  return lua.lua_gettop(L);
}

function readonlyArgument(L: LuaState): boolean {
  return lua.lua_istable(L, 1) && isReadonlyAt(L, 1);
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

function guardedRawset(L: LuaState): number {
  if (readonlyArgument(L)) {
    return raiseAt(L, READONLY_TABLE_MESSAGE);
  }
  return delegate(L);
}

function guardedRawget(L: LuaState): number {
  if (!readonlyArgument(L)) {
    return delegate(L);
  }
  lauxlib.luaL_checkany(L, 2);
  lua.lua_settop(L, 2);
  pushContents(L, 1);
  lua.lua_pushvalue(L, 2);
  lua.lua_rawget(L, -2);
  return 1;
}

function guardedRawlen(L: LuaState): number {
  if (!readonlyArgument(L)) {
    return delegate(L);
  }
  pushContents(L, 1);
  lua.lua_pushinteger(L, lua.lua_rawlen(L, -1));
  return 1;
}

function guardedNext(L: LuaState): number {
  if (!readonlyArgument(L)) {
    return delegate(L);
  }
  lua.lua_settop(L, 2);
  pushContents(L, 1);
  lua.lua_pushvalue(L, 2);
  if (lua.lua_next(L, 3)) {
    return 2;
  }
  lua.lua_pushnil(L);
  return 1;
}

function guardedSetmetatable(L: LuaState): number {
  if (readonlyArgument(L)) {
    return raiseAt(L, READONLY_TABLE_MESSAGE);
  }
  return delegate(L);
}

function guardedGetmetatable(L: LuaState): number {
  if (!readonlyArgument(L)) {
    return delegate(L);
  }
  lua.lua_settop(L, 1);
  if (!pushVisibleMetatable(L, 1)) {
    lua.lua_pushnil(L);
    return 1;
  }
  pushString(L, '__metatable');
  lua.lua_rawget(L, -2);
  if (lua.lua_isnil(L, -1)) {
    lua.lua_pop(L, 1);
  }
  return 1;
}

/** `load` that gives chunks the calling thread's environment unless one is passed. */
function guardedLoad(ctx: VmContext): LuaCFunction {
  return (L: LuaState): number => {
    if (lua.lua_gettop(L) < 4) {
      lua.lua_settop(L, 3);
      pushEnvironment(ctx, L, L);
    }
    return delegate(L);
  };
}

// ---------------------------------------------------------------------------
// Installation
// ---------------------------------------------------------------------------

const RAW_GUARDS: ReadonlyArray<readonly [string, LuaCFunction]> = [
  ['rawset', guardedRawset],
  ['rawget', guardedRawget],
  ['rawlen', guardedRawlen],
  ['next', guardedNext],
  ['setmetatable', guardedSetmetatable],
  ['getmetatable', guardedGetmetatable],
];

/** Wrap field `name` of the table at `t` with `guard`. Absent fields stay absent. */
function wrapField(L: LuaState, t: number, name: string, guard: LuaCFunction): void {
  const key = luaString(name);
  lua.lua_getfield(L, t, key);
  if (!lua.lua_isfunction(L, -1)) {
    lua.lua_pop(L, 1);
    return;
  }
  lua.lua_pushjsclosure(L, guard, 1);
  lua.lua_setfield(L, t, key);
}

/** Install the guards over the base library in the VM's global table. */
export function installBaseGuards(ctx: VmContext, L: LuaState): void {
  lua.lua_checkstack(L, 4);
  pushRegistryGlobals(L);
  const g = lua.lua_gettop(L);
  for (const [name, guard] of RAW_GUARDS) {
    wrapField(L, g, name, guard);
  }
  wrapField(L, g, 'load', guardedLoad(ctx));
  lua.lua_pop(L, 1);
}
