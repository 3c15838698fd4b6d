/**
 * luavm-bridge: Native module loader
 *
 * A native module is a CommonJS file exporting `luaopen_<name>` (dots in
 * the module name become underscores). The opener receives the VM and
 * returns the module value. Refused in safe mode before this loader runs.
 */

import { createRequire } from 'node:module';
import type { LuaValue } from '../types.js';
import { messageOf } from '../errors.js';
import type { VmContext } from '../internal-types.js';
import type { LuaState } from '../runtime/lua.js';
import { toLuaValue } from '../values/marshal.js';

const requireNative = createRequire(import.meta.url);

/** Outcome of opening a native module. */
type NativeLoadResult =
  | { readonly ok: true; readonly value: LuaValue }
  | { readonly ok: false; readonly message: string };

/** Name of the export a native module must provide for `name`. */
function openerName(name: string): string {
  return `luaopen_${name.split('.').join('_')}`;
}

/** Load the file at `path` and run its opener with `L` as the current thread. */
export function loadNativeModule(
  ctx: VmContext,
  L: LuaState,
  name: string,
  path: string,
): NativeLoadResult {
  let exported: unknown;
  try {
    exported = requireNative(path);
  } catch (err: unknown) {
    return { ok: false, message: messageOf(err) };
  }

  const symbol = openerName(name);
  const opener: unknown =
    typeof exported === 'object' && exported !== null ? Reflect.get(exported, symbol) : undefined;
  if (typeof opener !== 'function') {
    return { ok: false, message: `no function '${symbol}' in '${path}'` };
  }

  const { state } = ctx;
  const previous = state.current;
  state.current = L;
  let returned: unknown;
  try {
    returned = Reflect.apply(opener, undefined, [ctx.vm]);
  } catch (err: unknown) {
    return { ok: false, message: messageOf(err) };
  } finally {
    state.current = previous;
  }

  let value: LuaValue | undefined;
  try {
    value = toLuaValue(ctx, returned);
  } catch (err: unknown) {
    return { ok: false, message: messageOf(err) };
  }
  if (value === undefined) {
    return { ok: false, message: `'${symbol}' returned a value that cannot enter the VM` };
  }
  return { ok: true, value };
}
