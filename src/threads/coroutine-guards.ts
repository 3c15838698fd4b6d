/**
 * luavm-bridge: Coroutine library guards
 *
 * `coroutine.create` and `coroutine.wrap` create threads through the bridge
 * so they inherit the creator's sandbox state, get the interrupt hook and
 * fire creation events. `coroutine.resume` re-applies the hook, which may
 * have been registered after the thread was created.
 */

import type { VmContext } from '../internal-types.js';
import type { LuaCFunction, LuaState } from '../runtime/lua.js';
import { lua, lauxlib, errorText, luaString, pushString, raise } from '../runtime/lua.js';
import { applyInterruptHook } from '../resources/interrupt-hook.js';
import { inheritRecord } from '../sandbox/environment.js';
import { adoptThread } from './lifecycle.js';

/** Builds `wrap` from the guarded `create` and `resume`. */
const WRAP_SOURCE = `
local create, resume, error = ...
local function finish(ok, ...)
  if ok then
    return ...
  end
  error((...), 0)
end
return function(f)
  local co = create(f)
  return function(...)
    return finish(resume(co, ...))
  end
end
`;

function guardedCreate(ctx: VmContext): LuaCFunction {
  return (L: LuaState): number => {
    lauxlib.luaL_checktype(L, 1, lua.LUA_TFUNCTION);
    lua.lua_settop(L, 1);
    const thread = lua.lua_newthread(L);
    lua.lua_pushvalue(L, 1);
    lua.lua_xmove(L, thread, 1);
    const failure = adoptThread(ctx, L, thread, inheritRecord(ctx, L, L));
    if (failure !== null) {
      return raise(L, failure);
    }
    return 1;
  };
}

/** `resume` closure. Upvalue: the library's resume. */
function guardedResume(ctx: VmContext): LuaCFunction {
  return (L: LuaState): number => {
    const target = lua.lua_tothread(L, 1);
    if (target !== null) {
      applyInterruptHook(ctx, target);
    }
    lua.lua_pushvalue(L, lua.lua_upvalueindex(1));
    lua.lua_insert(L, 1);
    lua.lua_call(L, lua.lua_gettop(L) - 1, lua.LUA_MULTRET);
    return lua.lua_gettop(L);
  };
}

/** Install the guards into the coroutine table on top of `L`. */
export function installCoroutineGuards(ctx: VmContext, L: LuaState): void {
  const lib = lua.lua_absindex(L, -1);
  lua.lua_checkstack(L, 6);

  lua.lua_pushjsfunction(L, guardedCreate(ctx));
  lua.lua_setfield(L, lib, luaString('create'));

  lua.lua_getfield(L, lib, luaString('resume'));
  lua.lua_pushjsclosure(L, guardedResume(ctx), 1);
  lua.lua_setfield(L, lib, luaString('resume'));

  const source = luaString(WRAP_SOURCE);
  if (lauxlib.luaL_loadbufferx(L, source, source.length, luaString('=coroutine.wrap'), null) !== lua.LUA_OK) {
    throw new Error(errorText(L, -1));
  }
  lua.lua_getfield(L, lib, luaString('create'));
  lua.lua_getfield(L, lib, luaString('resume'));
  lua.lua_pushglobaltable(L);
  pushString(L, 'error');
  lua.lua_rawget(L, -2);
  lua.lua_remove(L, -2);
  lua.lua_call(L, 3, 1);
  lua.lua_setfield(L, lib, luaString('wrap'));
}
