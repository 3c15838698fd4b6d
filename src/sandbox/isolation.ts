/**
 * luavm-bridge: Global sandbox mode
 *
 * Enabling freezes the library tables bound in the globals and the globals
 * table itself, then installs a fresh environment falling back to the frozen
 * globals as the VM's global table. Scripts loaded afterwards write into
 * that environment. Disabling restores the original global table, which
 * drops every global written while sandboxed, and unfreezes exactly the
 * tables enabling froze.
 */

import type { Result } from '../types.js';
import type { VmError } from '../errors.js';
import type { SandboxSnapshot, VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import {
  lua,
  dropRef,
  makeRef,
  pointerAt,
  pushRef,
  pushRegistryGlobals,
  pushString,
} from '../runtime/lua.js';
import { activeState, closedError } from '../runtime/protected-call.js';
import { isReadonlyAt, pushContents, setReadonlyAt } from '../readonly/readonly-table.js';

// ---------------------------------------------------------------------------
// Safeenv flag
// ---------------------------------------------------------------------------

function identityAt(L: LuaState, idx: number): object | null {
  const target = lua.lua_topointer(L, idx);
  return typeof target === 'object' && target !== null ? target : null;
}

export function isSafeEnvAt(ctx: VmContext, L: LuaState, idx: number): boolean {
  const target = identityAt(L, idx);
  return target !== null && ctx.state.safeEnvTables.has(target);
}

/** Set or clear the safeenv flag. It never affects readonly state. */
export function setSafeEnvAt(ctx: VmContext, L: LuaState, idx: number, enabled: boolean): void {
  const target = identityAt(L, idx);
  if (target === null) {
    return;
  }
  if (enabled) {
    ctx.state.safeEnvTables.add(target);
  } else {
    ctx.state.safeEnvTables.delete(target);
  }
}

// ---------------------------------------------------------------------------
// Enable / disable
// ---------------------------------------------------------------------------

/** Refs of the tables directly bound in the globals at `g` that are not yet readonly. */
function collectLibraryTables(L: LuaState, g: number): number[] {
  const refs: number[] = [];
  const seen = new Set<number>();
  pushContents(L, g);
  const contents = lua.lua_gettop(L);
  lua.lua_pushnil(L);
  while (lua.lua_next(L, contents)) {
    if (lua.lua_istable(L, -1) && !lua.lua_rawequal(L, -1, g) && !isReadonlyAt(L, -1)) {
      const pointer = pointerAt(L, -1) ?? 0;
      if (!seen.has(pointer)) {
        seen.add(pointer);
        refs.push(makeRef(L, -1));
      }
    }
    lua.lua_pop(L, 1);
  }
  lua.lua_pop(L, 1);
  return refs;
}

function enableSandbox(ctx: VmContext): Result<void, VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  const { state } = ctx;
  if (state.sandbox !== null) {
    return { ok: true, value: undefined };
  }

  const L = activeState(ctx);
  const base = lua.lua_gettop(L);
  lua.lua_checkstack(L, 10);
  pushRegistryGlobals(L);
  const g = lua.lua_gettop(L);

  const markedRefs = collectLibraryTables(L, g);
  for (const ref of markedRefs) {
    pushRef(L, ref);
    setReadonlyAt(L, -1, true);
    lua.lua_pop(L, 1);
  }
  if (!isReadonlyAt(L, g)) {
    markedRefs.push(makeRef(L, g));
    setReadonlyAt(L, g, true);
  }

  lua.lua_createtable(L, 0, 0);
  const proxy = lua.lua_gettop(L);
  lua.lua_createtable(L, 0, 1);
  pushString(L, '__index');
  lua.lua_pushvalue(L, g);
  lua.lua_rawset(L, -3);
  lua.lua_setmetatable(L, proxy);
  setSafeEnvAt(ctx, L, proxy, true);

  const snapshot: SandboxSnapshot = {
    globalsRef: makeRef(L, g),
    proxyRef: makeRef(L, proxy),
    markedRefs,
  };
  lua.lua_pushvalue(L, proxy);
  lua.lua_rawseti(L, lua.LUA_REGISTRYINDEX, lua.LUA_RIDX_GLOBALS);
  lua.lua_settop(L, base);

  state.sandbox = snapshot;
  return { ok: true, value: undefined };
}

function disableSandbox(ctx: VmContext): Result<void, VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }
  const { state } = ctx;
  const snapshot = state.sandbox;
  if (snapshot === null) {
    return { ok: true, value: undefined };
  }

  const L = activeState(ctx);
  lua.lua_checkstack(L, 4);
  pushRef(L, snapshot.globalsRef);
  lua.lua_rawseti(L, lua.LUA_REGISTRYINDEX, lua.LUA_RIDX_GLOBALS);

  for (const ref of snapshot.markedRefs) {
    pushRef(L, ref);
    setReadonlyAt(L, -1, false);
    lua.lua_pop(L, 1);
    dropRef(L, ref);
  }

  pushRef(L, snapshot.proxyRef);
  setSafeEnvAt(ctx, L, -1, false);
  lua.lua_pop(L, 1);
  dropRef(L, snapshot.proxyRef);
  dropRef(L, snapshot.globalsRef);

  state.sandbox = null;
  return { ok: true, value: undefined };
}

/** Apply `enabled` to global sandbox mode. Repeating the current mode is a no-op. */
export function setSandbox(ctx: VmContext, enabled: boolean): Result<void, VmError> {
  return enabled ? enableSandbox(ctx) : disableSandbox(ctx);
}
