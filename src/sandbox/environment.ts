/**
 * luavm-bridge: Per-thread environments
 *
 * A thread normally reads and writes the VM's global table. A sandboxed
 * thread gets a private environment whose lookups fall back to a copy of the
 * bindings it inherited, taken when it was sandboxed: its global writes stay
 * invisible to its creator and the creator's later writes stay invisible to
 * it. Library tables are shared, not copied. Host
 * functions see it through `vm.globals()`; chunks compiled while the thread
 * runs get it as their `_ENV`.
 */

import type { ThreadRecord, VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { lua, dropRef, popRef, pushRef, pushRegistryGlobals, pushString } from '../runtime/lua.js';
import { pushContents, pushVisibleMetatable } from '../readonly/readonly-table.js';

/** Environment levels followed through `__index` when copying bindings. */
const MAX_ENV_DEPTH = 16;

/** Registry ref of the environment code on a thread with `record` sees, or null for the VM globals. */
function environmentRef(record: ThreadRecord | undefined): number | null {
  if (record === undefined) {
    return null;
  }
  return record.envRef ?? record.baseEnvRef;
}

/** Copy an optional registry ref so the copy can be dropped independently. */
function copyRef(L: LuaState, ref: number | null): number | null {
  if (ref === null) {
    return null;
  }
  pushRef(L, ref);
  return popRef(L);
}

/** Push the environment seen by code running on `thread` onto `L`. */
export function pushEnvironment(ctx: VmContext, L: LuaState, thread: LuaState): void {
  const ref = environmentRef(ctx.state.threads.get(thread));
  if (ref === null) {
    pushRegistryGlobals(L);
  } else {
    pushRef(L, ref);
  }
}

/**
 * Bind the chunk on top of `L` to the private environment of `thread`.
 * Chunks for threads without one keep the VM globals.
 */
export function bindChunkEnvironment(ctx: VmContext, L: LuaState, thread: LuaState): void {
  const ref = environmentRef(ctx.state.threads.get(thread));
  if (ref === null) {
    return;
  }
  pushRef(L, ref);
  if (lua.lua_setupvalue(L, -2, 1) === null) {
    lua.lua_pop(L, 1);
  }
}

/** Record for a thread created while `creator` was running. */
export function inheritRecord(ctx: VmContext, L: LuaState, creator: LuaState): ThreadRecord {
  const parent = ctx.state.threads.get(creator);
  return {
    sandboxed: ctx.state.sandbox !== null || (parent?.sandboxed ?? false),
    isolated: false,
    baseEnvRef: copyRef(L, environmentRef(parent)),
    envRef: null,
  };
}

/** Record for a fresh VM thread replacing one described by `record`. */
export function cloneRecord(L: LuaState, record: ThreadRecord): ThreadRecord {
  const clone: ThreadRecord = {
    sandboxed: record.sandboxed,
    isolated: false,
    baseEnvRef: copyRef(L, record.baseEnvRef),
    envRef: null,
  };
  if (record.isolated) {
    isolateRecord(L, clone);
  }
  return clone;
}

/**
 * Replace the environment on top of `L` with a table of every binding visible
 * through it, following `__index` tables. Nearer levels shadow farther ones.
 */
function snapshotEnvironment(L: LuaState): void {
  lua.lua_checkstack(L, 8);
  const env = lua.lua_gettop(L);
  lua.lua_createtable(L, 0, 0);
  const snapshot = lua.lua_gettop(L);

  lua.lua_pushvalue(L, env);
  for (let depth = 0; depth < MAX_ENV_DEPTH && lua.lua_istable(L, -1); depth++) {
    const level = lua.lua_gettop(L);
    pushContents(L, level);
    const contents = lua.lua_gettop(L);
    lua.lua_pushnil(L);
    while (lua.lua_next(L, contents)) {
      lua.lua_pushvalue(L, -2);
      lua.lua_rawget(L, snapshot);
      const shadowed = !lua.lua_isnil(L, -1);
      lua.lua_pop(L, 1);
      if (shadowed) {
        lua.lua_pop(L, 1);
      } else {
        lua.lua_pushvalue(L, -2);
        lua.lua_insert(L, -2);
        lua.lua_rawset(L, snapshot);
      }
    }
    lua.lua_pop(L, 1);

    if (pushVisibleMetatable(L, level)) {
      pushString(L, '__index');
      lua.lua_rawget(L, -2);
      lua.lua_remove(L, -2);
    } else {
      lua.lua_pushnil(L);
    }
    lua.lua_remove(L, level);
  }

  lua.lua_settop(L, snapshot);
  lua.lua_remove(L, env);
}

/**
 * Give `record` a new private environment falling back to a copy of the
 * bindings it inherits. Replaces an existing private environment.
 */
export function isolateRecord(L: LuaState, record: ThreadRecord): void {
  lua.lua_checkstack(L, 4);
  lua.lua_createtable(L, 0, 0);
  lua.lua_createtable(L, 0, 1);
  pushString(L, '__index');
  if (record.baseEnvRef === null) {
    pushRegistryGlobals(L);
  } else {
    pushRef(L, record.baseEnvRef);
  }
  snapshotEnvironment(L);
  lua.lua_rawset(L, -3);
  lua.lua_setmetatable(L, -2);

  if (record.envRef !== null) {
    dropRef(L, record.envRef);
  }
  record.envRef = popRef(L);
  record.isolated = true;
  record.sandboxed = true;
}

/** Drop the registry refs a record owns. */
export function releaseRecord(L: LuaState, record: ThreadRecord): void {
  if (record.baseEnvRef !== null) {
    dropRef(L, record.baseEnvRef);
    record.baseEnvRef = null;
  }
  if (record.envRef !== null) {
    dropRef(L, record.envRef);
    record.envRef = null;
  }
}
