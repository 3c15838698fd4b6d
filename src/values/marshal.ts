/**
 * luavm-bridge: Value marshalling
 *
 * Moves LuaValues across the stack boundary. Primitives are copied; tables,
 * functions and threads become handles; userdata becomes an opaque marker.
 */

import type { LuaValue, LuaOpaque, LuaTable, LuaFunction, LuaThread } from '../types.js';
import { ContractViolation } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { lua, pointerAt, pushRef, pushString } from '../runtime/lua.js';
import { liveSlot, slotOf } from './handle-registry.js';
import { createTableHandle } from './table.js';
import { createFunctionHandle } from './function.js';
import { createThreadHandle } from './thread.js';

const MIN_INTEGER = -2_147_483_648;
const MAX_INTEGER = 2_147_483_647;

function isOpaque(value: object & LuaValue): value is LuaOpaque {
  return value.kind === 'lightuserdata' || value.kind === 'userdata';
}

function isHandle(value: object): value is LuaTable | LuaFunction | LuaThread {
  return slotOf(value) !== undefined;
}

/** Whether `value` fits the VM's integer subtype. */
export function isVmInteger(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_INTEGER && value <= MAX_INTEGER;
}

/** Throw ContractViolation if `value` cannot be pushed into `ctx`. */
export function assertPushable(ctx: VmContext, value: LuaValue): void {
  if (value === null || typeof value !== 'object') {
    return;
  }
  if (isOpaque(value)) {
    throw new ContractViolation(`${value.kind} values cannot be passed back into the VM`);
  }
  liveSlot(ctx, value);
}

/** Push `value` onto `L`. Callers check pushability first. */
export function pushValue(ctx: VmContext, L: LuaState, value: LuaValue): void {
  if (value === null) {
    lua.lua_pushnil(L);
    return;
  }
  switch (typeof value) {
    case 'boolean':
      lua.lua_pushboolean(L, value);
      return;
    case 'number':
      if (isVmInteger(value)) {
        lua.lua_pushinteger(L, value);
      } else {
        lua.lua_pushnumber(L, value);
      }
      return;
    case 'string':
      pushString(L, value);
      return;
    default:
      if (isOpaque(value)) {
        throw new ContractViolation(`${value.kind} values cannot be passed back into the VM`);
      }
      pushRef(L, liveSlot(ctx, value).ref);
  }
}

/** Read the value at `idx` of `L` without popping it. */
export function readValue(ctx: VmContext, L: LuaState, idx: number): LuaValue {
  const type = lua.lua_type(L, idx);
  switch (type) {
    case lua.LUA_TNONE:
    case lua.LUA_TNIL:
      return null;
    case lua.LUA_TBOOLEAN:
      return lua.lua_toboolean(L, idx);
    case lua.LUA_TNUMBER:
      return lua.lua_tonumber(L, idx);
    case lua.LUA_TSTRING:
      return lua.lua_tojsstring(L, idx) ?? '';
    case lua.LUA_TTABLE:
      return createTableHandle(ctx, L, idx);
    case lua.LUA_TFUNCTION:
      return createFunctionHandle(ctx, L, idx);
    case lua.LUA_TTHREAD:
      return createThreadHandle(ctx, L, idx);
    case lua.LUA_TLIGHTUSERDATA:
      return { kind: 'lightuserdata', pointer: pointerAt(L, idx) ?? 0 };
    default:
      return { kind: 'userdata', pointer: pointerAt(L, idx) ?? 0 };
  }
}

/** Read stack slots `from..to` inclusive. */
export function readValues(ctx: VmContext, L: LuaState, from: number, to: number): LuaValue[] {
  const values: LuaValue[] = [];
  for (let idx = from; idx <= to; idx++) {
    values.push(readValue(ctx, L, idx));
  }
  return values;
}

/** Narrow an untyped host value (a native module result) to a LuaValue. */
export function toLuaValue(ctx: VmContext, value: unknown): LuaValue | undefined {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && isHandle(value)) {
    assertPushable(ctx, value);
    return value;
  }
  return undefined;
}
