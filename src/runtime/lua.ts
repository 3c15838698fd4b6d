/**
 * luavm-bridge: fengari access layer
 *
 * Single import point for the fengari API plus the small stack helpers every
 * other module shares: registry refs, error raising, message extraction and
 * address-like pointers.
 */

import fengari from 'fengari';
import type { VmContext } from '../internal-types.js';

export const { lua, lauxlib, lualib, to_luastring, to_jsstring } = fengari;

export type LuaState = fengari.lua_State;
export type LuaCFunction = fengari.lua_CFunction;
export type LuaHook = fengari.lua_Hook;
export type LuaDebug = fengari.lua.lua_Debug;

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

/** Convert a JS string to a fengari string, caching short literals. */
export function luaString(value: string): Uint8Array {
  return to_luastring(value, true);
}

/** Push a JS string. */
export function pushString(L: LuaState, value: string): void {
  lua.lua_pushstring(L, to_luastring(value));
}

// ---------------------------------------------------------------------------
// Pointers
// ---------------------------------------------------------------------------

const pointers = new WeakMap<object, number>();
let nextPointer = 1;

/**
 * Address-like identifier of a fengari object. Stable while the object lives;
 * a fresh object never reuses a retired number.
 */
export function pointerFor(target: unknown): number | null {
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    return null;
  }
  const known = pointers.get(target);
  if (known !== undefined) {
    return known;
  }
  const pointer = nextPointer;
  nextPointer += 1;
  pointers.set(target, pointer);
  return pointer;
}

/** Pointer of the value at `idx`, or null for non-reference values. */
export function pointerAt(L: LuaState, idx: number): number | null {
  return pointerFor(lua.lua_topointer(L, idx));
}

// ---------------------------------------------------------------------------
// Registry refs
// ---------------------------------------------------------------------------

/** Pin a copy of the value at `idx` in the registry. */
export function makeRef(L: LuaState, idx: number): number {
  lua.lua_pushvalue(L, idx);
  return lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX);
}

/** Pin the value on top of the stack, popping it. */
export function popRef(L: LuaState): number {
  return lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX);
}

export function pushRef(L: LuaState, ref: number): void {
  lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, ref);
}

export function dropRef(L: LuaState, ref: number): void {
  lauxlib.luaL_unref(L, lua.LUA_REGISTRYINDEX, ref);
}

/** Push the table currently installed as the global environment. */
export function pushRegistryGlobals(L: LuaState): void {
  lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, lua.LUA_RIDX_GLOBALS);
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Raise `message` unchanged as a Lua error. */
export function raise(L: LuaState, message: string): never {
  pushString(L, message);
  return lua.lua_error(L);
}

/** Raise `message` prefixed with the position of the calling script line. */
export function raiseAt(L: LuaState, message: string): never {
  lauxlib.luaL_where(L, 1);
  pushString(L, message);
  lua.lua_concat(L, 2);
  return lua.lua_error(L);
}

/** Text of an error object without invoking metamethods. */
export function errorText(L: LuaState, idx: number): string {
  const type = lua.lua_type(L, idx);
  if (type === lua.LUA_TSTRING || type === lua.LUA_TNUMBER) {
    return lua.lua_tojsstring(L, idx) ?? '';
  }
  if (type === lua.LUA_TNIL) {
    return 'nil';
  }
  return `(error object is a ${to_jsstring(lua.lua_typename(L, type))} value)`;
}

// ---------------------------------------------------------------------------
// Context lookup
// ---------------------------------------------------------------------------

const contexts = new WeakMap<object, VmContext>();

/** Associate a VM context with every thread of its fengari state. */
export function bindContext(ctx: VmContext): void {
  contexts.set(ctx.state.L.l_G, ctx);
}

/** Context owning `L`, for callbacks fengari invokes without a closure. */
export function contextOf(L: LuaState): VmContext | undefined {
  return contexts.get(L.l_G);
}
