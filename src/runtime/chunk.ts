/**
 * luavm-bridge: Chunk compilation
 *
 * Compiles source text into a function. A chunk compiled while a thread with
 * a private environment is current gets that environment as its `_ENV`.
 */

import type { ChunkOptions, LuaFunction, LuaValue, Result } from '../types.js';
import type { VmError } from '../errors.js';
import { syntaxError } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import { lua, lauxlib, errorText, to_luastring } from './lua.js';
import { activeState, closedError } from './protected-call.js';
import { bindChunkEnvironment } from '../sandbox/environment.js';
import { createFunctionHandle } from '../values/function.js';

/** Chunk name fengari reports in error positions. */
function chunkName(source: string, options: ChunkOptions | undefined): Uint8Array {
  return to_luastring(options?.name === undefined ? source : `=${options.name}`);
}

/** Compile `source` without running it. */
export function loadChunk(
  ctx: VmContext,
  source: string,
  options?: ChunkOptions,
): Result<LuaFunction, VmError> {
  const closed = closedError(ctx);
  if (closed !== null) {
    return { ok: false, error: closed };
  }

  const L = activeState(ctx);
  const code = to_luastring(source);
  lua.lua_checkstack(L, 2);
  const status = lauxlib.luaL_loadbufferx(L, code, code.length, chunkName(source, options), null);
  if (status !== lua.LUA_OK) {
    const message = errorText(L, -1);
    lua.lua_pop(L, 1);
    return { ok: false, error: syntaxError(message) };
  }

  bindChunkEnvironment(ctx, L, ctx.state.current);
  const fn = createFunctionHandle(ctx, L, -1);
  lua.lua_pop(L, 1);
  return { ok: true, value: fn };
}

/** Compile and run `source`, returning every value it returns. */
export function execChunk(
  ctx: VmContext,
  source: string,
  options?: ChunkOptions,
): Result<LuaValue[], VmError> {
  const loaded = loadChunk(ctx, source, options);
  if (!loaded.ok) {
    return loaded;
  }
  const fn = loaded.value;
  const result = fn.call();
  fn.release();
  return result;
}
