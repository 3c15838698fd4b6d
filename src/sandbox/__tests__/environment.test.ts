import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLuaVm } from '../../vm.js';
import type { LuaVm } from '../../types.js';
import { asThread, compile, globalOf, unwrap } from '../../__tests__/fixtures.js';

describe('thread environments', () => {
  let vm: LuaVm;

  beforeEach(() => {
    vm = createLuaVm();
  });

  afterEach(() => {
    vm.close();
  });

  it('records the sandbox flag at creation', () => {
    const before = unwrap(vm.createThread(compile(vm, 'return 1')));
    unwrap(vm.sandbox(true));
    const during = unwrap(vm.createThread(compile(vm, 'return 1')));
    const [scripted] = unwrap(vm.exec('return coroutine.create(function() end)'));
    unwrap(vm.sandbox(false));

    expect(before.isSandboxed()).toBe(false);
    expect(during.isSandboxed()).toBe(true);
    expect(asThread(scripted).isSandboxed()).toBe(true);
  });

  it('keeps global writes of a sandboxed thread private', () => {
    const thread = unwrap(
      vm.createThread(compile(vm, "return load('private = 10 return private, type(print)')()")),
    );
    unwrap(thread.sandbox());

    expect(thread.isSandboxed()).toBe(true);
    expect(unwrap(thread.resume())).toEqual([10, 'function']);
    expect(globalOf(vm, 'private')).toBeNull();
  });

  it('shows the thread environment to host functions and their chunks', () => {
    const seen: unknown[] = [];
    const probe = vm.createFunction((self) => {
      unwrap(self.globals().set('fromHost', 'a'));
      unwrap(self.exec("fromChunk = 'b'"));
      seen.push(...unwrap(self.exec('return fromHost, fromChunk')));
    });
    unwrap(vm.globals().set('probe', probe));

    const thread = unwrap(vm.createThread(compile(vm, 'probe()')));
    unwrap(thread.sandbox());
    unwrap(thread.resume());

    expect(seen).toEqual(['a', 'b']);
    expect(unwrap(vm.exec('return fromHost, fromChunk'))).toEqual([null, null]);
  });

  it('hides creator writes made after the thread was sandboxed', () => {
    const seen: unknown[] = [];
    const read = vm.createFunction((self) => {
      seen.push(unwrap(self.globals().get('shared')));
    });
    unwrap(vm.globals().set('read', read));
    unwrap(vm.exec('shared = 1'));

    const thread = unwrap(vm.createThread(compile(vm, 'read() coroutine.yield() read()')));
    unwrap(thread.sandbox());
    unwrap(vm.exec('shared = 2'));
    unwrap(thread.resume());
    unwrap(vm.exec('shared = 3'));
    unwrap(thread.resume());

    expect(seen).toEqual([1, 1]);
    expect(globalOf(vm, 'shared')).toBe(3);
  });

  it('copies the bindings of a sandboxed VM into the thread environment', () => {
    unwrap(vm.exec('before = "kept"'));
    unwrap(vm.sandbox(true));
    unwrap(vm.exec('during = "seen"'));
    const thread = unwrap(
      vm.createThread(compile(vm, "return load('return before, during, later, type(string.upper)')()")),
    );
    unwrap(thread.sandbox());
    unwrap(vm.exec('later = "hidden"'));

    expect(unwrap(thread.resume())).toEqual(['kept', 'seen', null, 'function']);
  });

  it('hands the environment down to threads created inside', () => {
    const thread = unwrap(
      vm.createThread(
        compile(
          vm,
          `
          load('shared = 5')()
          local co = coroutine.create(function()
            return load('return shared')()
          end)
          local _, value = coroutine.resume(co)
          return value
        `,
        ),
      ),
    );
    unwrap(thread.sandbox());
    expect(unwrap(thread.resume())).toEqual([5]);
    expect(globalOf(vm, 'shared')).toBeNull();
  });

  it('keeps the sandbox flag but not the environment across a reset', () => {
    const thread = unwrap(vm.createThread(compile(vm, "load('stash = 1')()")));
    unwrap(thread.sandbox());
    unwrap(thread.resume());
    expect(thread.status()).toBe('finished');

    unwrap(thread.reset(compile(vm, "return load('return stash')()")));
    expect(thread.isSandboxed()).toBe(true);
    expect(unwrap(thread.resume())).toEqual([null]);
  });

  it('treats a second sandbox() as a no-op', () => {
    const thread = unwrap(
      vm.createThread(
        compile(vm, "load('n = (n or 0) + 1')() coroutine.yield() return load('return n')()"),
      ),
    );
    unwrap(thread.sandbox());
    unwrap(thread.resume());
    unwrap(thread.sandbox());
    expect(unwrap(thread.resume())).toEqual([1]);
  });
});
