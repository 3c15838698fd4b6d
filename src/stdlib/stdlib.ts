/**
 * luavm-bridge: Standard library selection
 *
 * Opens the base library plus the requested optional libraries into a new
 * state, installs the bridge's guards over them, and in safe mode strips
 * what can reach the host file system or process.
 */

import type { StdLibName } from '../types.js';
import { UNSAFE_STD_LIBS } from '../types.js';
import { ContractViolation } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaCFunction, LuaState } from '../runtime/lua.js';
import { lua, lauxlib, lualib, luaString, pushRegistryGlobals } from '../runtime/lua.js';
import { createPackageOpener } from '../loader/require.js';
import { installCoroutineGuards } from '../threads/coroutine-guards.js';
import { installBaseGuards } from './base-guards.js';

/** `os` functions kept in safe mode. */
const SAFE_OS_FIELDS: ReadonlySet<string> = new Set(['clock', 'date', 'difftime', 'time']);

/** Base functions that read host files, removed in safe mode. */
const UNSAFE_BASE_FIELDS: readonly string[] = ['dofile', 'loadfile'];

/** Opening order; independent of the order the options list libraries in. */
const OPEN_ORDER: readonly StdLibName[] = [
  'coroutine',
  'table',
  'string',
  'utf8',
  'math',
  'os',
  'debug',
  'package',
];

const FENGARI_OPENERS: Readonly<Record<Exclude<StdLibName, 'package'>, LuaCFunction>> = {
  coroutine: lualib.luaopen_coroutine,
  table: lualib.luaopen_table,
  string: lualib.luaopen_string,
  utf8: lualib.luaopen_utf8,
  math: lualib.luaopen_math,
  os: lualib.luaopen_os,
  debug: lualib.luaopen_debug,
};

/** Throw ContractViolation for a library that safe mode refuses. */
export function assertLibrariesAllowed(libs: readonly StdLibName[], safeMode: boolean): void {
  if (!safeMode) {
    return;
  }
  for (const lib of libs) {
    if (UNSAFE_STD_LIBS.includes(lib)) {
      throw new ContractViolation(`the '${lib}' library cannot be opened in safe mode`);
    }
  }
}

/** Remove every field of the table on top of `L` not in `keep`. */
function retainFields(L: LuaState, keep: ReadonlySet<string>): void {
  const t = lua.lua_absindex(L, -1);
  const doomed: string[] = [];
  lua.lua_pushnil(L);
  while (lua.lua_next(L, t)) {
    lua.lua_pop(L, 1);
    if (lua.lua_type(L, -1) === lua.LUA_TSTRING) {
      const key = lua.lua_tojsstring(L, -1) ?? '';
      if (!keep.has(key)) {
        doomed.push(key);
      }
    }
  }
  for (const key of doomed) {
    lua.lua_pushnil(L);
    lua.lua_setfield(L, t, luaString(key));
  }
}

function removeGlobals(L: LuaState, names: readonly string[]): void {
  pushRegistryGlobals(L);
  for (const name of names) {
    lua.lua_pushnil(L);
    lua.lua_setfield(L, -2, luaString(name));
  }
  lua.lua_pop(L, 1);
}

function openerFor(ctx: VmContext, lib: StdLibName): LuaCFunction {
  return lib === 'package' ? createPackageOpener(ctx) : FENGARI_OPENERS[lib];
}

/** Open the base library and `ctx.state.options.stdLibs` on the main thread. */
export function openStandardLibraries(ctx: VmContext): void {
  const { L, options } = ctx.state;
  lua.lua_checkstack(L, 8);

  lauxlib.luaL_requiref(L, luaString('_G'), lualib.luaopen_base, true);
  lua.lua_pop(L, 1);
  installBaseGuards(ctx, L);
  if (options.safeMode) {
    removeGlobals(L, UNSAFE_BASE_FIELDS);
  }

  for (const lib of OPEN_ORDER) {
    if (!options.stdLibs.includes(lib)) {
      continue;
    }
    lauxlib.luaL_requiref(L, luaString(lib), openerFor(ctx, lib), true);
    if (lib === 'coroutine') {
      installCoroutineGuards(ctx, L);
    } else if (lib === 'os' && options.safeMode) {
      retainFields(L, SAFE_OS_FIELDS);
    }
    lua.lua_pop(L, 1);
  }
}
