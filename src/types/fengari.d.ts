/**
 * Type declarations for the subset of fengari's C-style API used by the
 * bridge. fengari ships no typings of its own.
 */

declare module 'fengari' {
  namespace fengari {
    /** fengari strings are UTF-8 byte arrays. */
    type luastring = Uint8Array;

    /** A Lua thread (the main state or a coroutine). */
    interface lua_State {
      readonly l_G: object;
    }

    type lua_CFunction = (L: lua_State) => number;
    type lua_Hook = (L: lua_State, ar: lua.lua_Debug) => void;

    namespace lua {
      class lua_Debug {
        event: number;
      }

      const LUA_OK: number;
      const LUA_YIELD: number;

      const LUA_TNONE: number;
      const LUA_TNIL: number;
      const LUA_TBOOLEAN: number;
      const LUA_TLIGHTUSERDATA: number;
      const LUA_TNUMBER: number;
      const LUA_TSTRING: number;
      const LUA_TTABLE: number;
      const LUA_TFUNCTION: number;
      const LUA_TTHREAD: number;

      const LUA_MULTRET: number;
      const LUA_REGISTRYINDEX: number;
      const LUA_RIDX_GLOBALS: number;

      const LUA_HOOKCOUNT: number;
      const LUA_MASKCALL: number;
      const LUA_MASKCOUNT: number;

      const LUA_GCCOLLECT: number;

      function lua_absindex(L: lua_State, idx: number): number;
      function lua_gettop(L: lua_State): number;
      function lua_settop(L: lua_State, idx: number): void;
      function lua_pop(L: lua_State, n: number): void;
      function lua_pushvalue(L: lua_State, idx: number): void;
      function lua_insert(L: lua_State, idx: number): void;
      function lua_remove(L: lua_State, idx: number): void;
      function lua_checkstack(L: lua_State, n: number): boolean;
      function lua_xmove(from: lua_State, to: lua_State, n: number): void;

      function lua_type(L: lua_State, idx: number): number;
      function lua_typename(L: lua_State, t: number): luastring;
      function lua_concat(L: lua_State, n: number): void;
      function lua_isnil(L: lua_State, idx: number): boolean;
      function lua_istable(L: lua_State, idx: number): boolean;
      function lua_isfunction(L: lua_State, idx: number): boolean;
      function lua_rawequal(L: lua_State, idx1: number, idx2: number): boolean;

      function lua_toboolean(L: lua_State, idx: number): boolean;
      function lua_tonumber(L: lua_State, idx: number): number;
      function lua_tojsstring(L: lua_State, idx: number): string | null;
      function lua_tothread(L: lua_State, idx: number): lua_State | null;
      function lua_topointer(L: lua_State, idx: number): unknown;

      function lua_pushnil(L: lua_State): void;
      function lua_pushboolean(L: lua_State, b: boolean): void;
      function lua_pushinteger(L: lua_State, n: number): void;
      function lua_pushnumber(L: lua_State, n: number): void;
      function lua_pushstring(L: lua_State, s: luastring): luastring;
      function lua_pushlightuserdata(L: lua_State, p: unknown): void;
      function lua_pushjsfunction(L: lua_State, fn: lua_CFunction): void;
      function lua_pushjsclosure(L: lua_State, fn: lua_CFunction, n: number): void;
      function lua_pushglobaltable(L: lua_State): void;

      function lua_createtable(L: lua_State, narr: number, nrec: number): void;
      function lua_newtable(L: lua_State): void;
      function lua_newthread(L: lua_State): lua_State;

      function lua_gettable(L: lua_State, idx: number): number;
      function lua_getfield(L: lua_State, idx: number, k: luastring): number;
      function lua_geti(L: lua_State, idx: number, n: number): number;
      function lua_rawget(L: lua_State, idx: number): number;
      function lua_rawgeti(L: lua_State, idx: number, n: number): number;
      function lua_settable(L: lua_State, idx: number): void;
      function lua_setfield(L: lua_State, idx: number, k: luastring): void;
      function lua_seti(L: lua_State, idx: number, n: number): void;
      function lua_rawset(L: lua_State, idx: number): void;
      function lua_rawseti(L: lua_State, idx: number, n: number): void;
      function lua_rawlen(L: lua_State, idx: number): number;
      function lua_next(L: lua_State, idx: number): boolean;
      function lua_getmetatable(L: lua_State, idx: number): boolean;
      function lua_setmetatable(L: lua_State, idx: number): void;
      function lua_setupvalue(L: lua_State, funcindex: number, n: number): luastring | null;
      function lua_upvalueindex(i: number): number;

      function lua_call(L: lua_State, nargs: number, nresults: number): void;
      function lua_pcall(L: lua_State, nargs: number, nresults: number, errfunc: number): number;
      function lua_error(L: lua_State): never;
      function lua_resume(L: lua_State, from: lua_State | null, nargs: number): number;
      function lua_yield(L: lua_State, nresults: number): number;
      function lua_isyieldable(L: lua_State): boolean;
      function lua_status(L: lua_State): number;
      function lua_getstack(L: lua_State, level: number, ar: lua_Debug): number;

      function lua_sethook(L: lua_State, func: lua_Hook | null, mask: number, count: number): void;
      function lua_gc(L: lua_State, what: number, data: number): number;
    }

    namespace lauxlib {

      function luaL_newstate(): lua_State;
      function luaL_loadbufferx(
        L: lua_State,
        buff: luastring,
        sz: number,
        name: luastring,
        mode: luastring | null,
      ): number;
      function luaL_ref(L: lua_State, t: number): number;
      function luaL_unref(L: lua_State, t: number, ref: number): void;
      function luaL_where(L: lua_State, lvl: number): void;
      function luaL_len(L: lua_State, idx: number): number;
      function luaL_checktype(L: lua_State, arg: number, t: number): void;
      function luaL_checkany(L: lua_State, arg: number): void;
      function luaL_checkstring(L: lua_State, arg: number): luastring;
      function luaL_getsubtable(L: lua_State, idx: number, fname: luastring): boolean;
      function luaL_requiref(L: lua_State, modname: luastring, openf: lua_CFunction, glb: boolean): void;
    }

    namespace lualib {
      const luaopen_base: lua_CFunction;
      const luaopen_coroutine: lua_CFunction;
      const luaopen_table: lua_CFunction;
      const luaopen_string: lua_CFunction;
      const luaopen_utf8: lua_CFunction;
      const luaopen_math: lua_CFunction;
      const luaopen_os: lua_CFunction;
      const luaopen_debug: lua_CFunction;
    }

    function to_luastring(str: string, cache?: boolean): luastring;
    function to_jsstring(value: luastring, from?: number, to?: number): string;
  }

  export = fengari;
}
