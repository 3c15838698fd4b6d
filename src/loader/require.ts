/**
 * luavm-bridge: Module loading
 *
 * The `package` library and `require`. Lookup order:
 *
 *   1. `package.loaded[name]` (libraries and modules already required)
 *   2. `package.preload[name]`
 *   3. source templates in `package.path`
 *   4. native templates in `package.cpath` (refused in safe mode)
 *
 * File modules are cached by absolute path, so each file runs at most once
 * per VM however it is named.
 */

import { readFileSync } from 'node:fs';
import { SAFE_MODE_DYLIB_MESSAGE, messageOf, moduleNotFoundMessage } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaCFunction, LuaState } from '../runtime/lua.js';
import {
  lua,
  lauxlib,
  errorText,
  luaString,
  makeRef,
  pushRef,
  pushRegistryGlobals,
  pushString,
  raiseAt,
  to_jsstring,
  to_luastring,
} from '../runtime/lua.js';
import { bindChunkEnvironment } from '../sandbox/environment.js';
import { pushValue } from '../values/marshal.js';
import { resolveModule } from './module-resolver.js';
import { loadNativeModule } from './native-loader.js';

const LOADED_KEY = '_LOADED';
const PRELOAD_KEY = '_PRELOAD';

/** Directory separator, path separator, placeholder, exec dir and ignore mark. */
const PACKAGE_CONFIG = '/\n;\n?\n!\n-\n';

// ---------------------------------------------------------------------------
// Helpers (run inside require, so they may raise)
// ---------------------------------------------------------------------------

/** Read string field `key` of the package table. */
function searchPath(ctx: VmContext, L: LuaState, key: 'path' | 'cpath'): string {
  const ref = ctx.state.packageRef;
  if (ref === null) {
    return '';
  }
  pushRef(L, ref);
  lua.lua_getfield(L, -1, luaString(key));
  if (lua.lua_type(L, -1) !== lua.LUA_TSTRING) {
    return raiseAt(L, `'package.${key}' must be a string`);
  }
  const value = lua.lua_tojsstring(L, -1) ?? '';
  lua.lua_pop(L, 2);
  return value;
}

/** Store the value on top of the stack as `package.loaded[name]`, keeping it there. */
function markLoaded(L: LuaState, name: string): void {
  lauxlib.luaL_getsubtable(L, lua.LUA_REGISTRYINDEX, luaString(LOADED_KEY));
  lua.lua_pushvalue(L, -2);
  lua.lua_setfield(L, -2, to_luastring(name));
  lua.lua_pop(L, 1);
}

/** Replace a nil module result on top of the stack with `true`. */
function normalizeResult(L: LuaState): void {
  if (lua.lua_isnil(L, -1)) {
    lua.lua_pop(L, 1);
    lua.lua_pushboolean(L, true);
  }
}

/** Push the cached result for `path` and return true, or return false. */
function pushCached(ctx: VmContext, L: LuaState, path: string): boolean {
  const ref = ctx.state.moduleCache.get(path);
  if (ref === undefined) {
    return false;
  }
  pushRef(L, ref);
  return true;
}

/** Compile and run the source module at `path`, leaving its result on the stack. */
function runSourceModule(ctx: VmContext, L: LuaState, name: string, path: string): void {
  const { state } = ctx;
  if (state.modulesLoading.has(path)) {
    raiseAt(L, `loop or previous error loading module '${name}'`);
  }

  let code: Uint8Array | null = null;
  let readFailure = '';
  try {
    code = new Uint8Array(readFileSync(path));
  } catch (err: unknown) {
    readFailure = messageOf(err);
  }
  if (code === null) {
    return raiseAt(L, `error loading module '${name}' from file '${path}':\n\t${readFailure}`);
  }

  const status = lauxlib.luaL_loadbufferx(L, code, code.length, to_luastring(`@${path}`), null);
  if (status !== lua.LUA_OK) {
    const message = errorText(L, -1);
    lua.lua_pop(L, 1);
    return raiseAt(L, `error loading module '${name}' from file '${path}':\n\t${message}`);
  }
  bindChunkEnvironment(ctx, L, L);
  pushString(L, name);
  pushString(L, path);

  state.modulesLoading.add(path);
  const outcome = lua.lua_pcall(L, 2, 1, 0);
  state.modulesLoading.delete(path);
  if (outcome !== lua.LUA_OK) {
    lua.lua_error(L);
  }
}

function notFound(L: LuaState, name: string, lines: readonly string[]): never {
  return raiseAt(L, `${moduleNotFoundMessage(name)}:${lines.map((line) => `\n\t${line}`).join('')}`);
}

// ---------------------------------------------------------------------------
// require
// ---------------------------------------------------------------------------

function createRequireFunction(ctx: VmContext): LuaCFunction {
  return (L: LuaState): number => {
    const name = to_jsstring(lauxlib.luaL_checkstring(L, 1));
    lua.lua_settop(L, 1);
    lua.lua_checkstack(L, 8);

    lauxlib.luaL_getsubtable(L, lua.LUA_REGISTRYINDEX, luaString(LOADED_KEY));
    lua.lua_getfield(L, -1, to_luastring(name));
    if (lua.lua_toboolean(L, -1)) {
      return 1;
    }
    lua.lua_settop(L, 1);

    const lines: string[] = [];

    lauxlib.luaL_getsubtable(L, lua.LUA_REGISTRYINDEX, luaString(PRELOAD_KEY));
    lua.lua_getfield(L, -1, to_luastring(name));
    if (lua.lua_isfunction(L, -1)) {
      pushString(L, name);
      pushString(L, ':preload:');
      lua.lua_call(L, 2, 1);
      normalizeResult(L);
      markLoaded(L, name);
      return 1;
    }
    lua.lua_settop(L, 1);
    lines.push(`no field package.preload['${name}']`);

    const source = resolveModule(name, searchPath(ctx, L, 'path'));
    if (source.path !== null) {
      if (!pushCached(ctx, L, source.path)) {
        runSourceModule(ctx, L, name, source.path);
        normalizeResult(L);
        ctx.state.moduleCache.set(source.path, makeRef(L, -1));
      }
      markLoaded(L, name);
      return 1;
    }
    lines.push(...source.probed.map((candidate) => `no file '${candidate}'`));

    const native = resolveModule(name, searchPath(ctx, L, 'cpath'));
    lines.push(...native.probed.map((candidate) => `no file '${candidate}'`));
    if (native.path === null) {
      return notFound(L, name, lines);
    }
    if (ctx.state.options.safeMode) {
      lines.push(SAFE_MODE_DYLIB_MESSAGE);
      return notFound(L, name, lines);
    }

    if (!pushCached(ctx, L, native.path)) {
      const opened = loadNativeModule(ctx, L, name, native.path);
      if (!opened.ok) {
        return raiseAt(
          L,
          `error loading module '${name}' from file '${native.path}':\n\t${opened.message}`,
        );
      }
      pushValue(ctx, L, opened.value);
      normalizeResult(L);
      ctx.state.moduleCache.set(native.path, makeRef(L, -1));
    }
    markLoaded(L, name);
    return 1;
  };
}

// ---------------------------------------------------------------------------
// package library
// ---------------------------------------------------------------------------

/**
 * Opener for the `package` library, for use with `luaL_requiref`.
 * Also binds the global `require`.
 */
export function createPackageOpener(ctx: VmContext): LuaCFunction {
  return (L: LuaState): number => {
    const { options } = ctx.state;
    lua.lua_checkstack(L, 6);
    lua.lua_createtable(L, 0, 8);
    const pkg = lua.lua_gettop(L);

    pushString(L, options.packagePath);
    lua.lua_setfield(L, pkg, luaString('path'));
    pushString(L, options.packageCPath);
    lua.lua_setfield(L, pkg, luaString('cpath'));
    pushString(L, PACKAGE_CONFIG);
    lua.lua_setfield(L, pkg, luaString('config'));

    lauxlib.luaL_getsubtable(L, lua.LUA_REGISTRYINDEX, luaString(LOADED_KEY));
    lua.lua_setfield(L, pkg, luaString('loaded'));
    lauxlib.luaL_getsubtable(L, lua.LUA_REGISTRYINDEX, luaString(PRELOAD_KEY));
    lua.lua_setfield(L, pkg, luaString('preload'));

    pushRegistryGlobals(L);
    lua.lua_pushjsfunction(L, createRequireFunction(ctx));
    lua.lua_setfield(L, -2, luaString('require'));
    lua.lua_pop(L, 1);

    ctx.state.packageRef = makeRef(L, pkg);
    return 1;
  };
}

/** Drop cached module results. Called before the VM closes. */
export function clearModuleCache(ctx: VmContext): void {
  const { state } = ctx;
  for (const ref of state.moduleCache.values()) {
    lauxlib.luaL_unref(state.L, lua.LUA_REGISTRYINDEX, ref);
  }
  state.moduleCache.clear();
  state.modulesLoading.clear();
}
