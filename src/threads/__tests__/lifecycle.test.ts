import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLuaVm } from '../../vm.js';
import type { LuaValue, LuaVm, Result, ThreadStatus } from '../../types.js';
import type { VmError } from '../../errors.js';
import { ContractViolation } from '../../errors.js';
import { asThread, compile, failure, failureMessage, unwrap } from '../../__tests__/fixtures.js';

describe('thread lifecycle', () => {
  let vm: LuaVm;

  beforeEach(() => {
    vm = createLuaVm();
  });

  afterEach(() => {
    vm.close();
  });

  describe('resume', () => {
    it('passes values in and out across yields', () => {
      const thread = unwrap(
        vm.createThread(
          compile(vm, 'local a, b = ... local c = coroutine.yield(a + b) return c * 2, "end"'),
        ),
      );
      expect(thread.status()).toBe('resumable');
      expect(unwrap(thread.resume(1, 2))).toEqual([3]);
      expect(thread.status()).toBe('resumable');
      expect(unwrap(thread.resume(5))).toEqual([10, 'end']);
      expect(thread.status()).toBe('finished');
    });

    it('reports a script error and moves to the error state', () => {
      const thread = unwrap(vm.createThread(compile(vm, "error('bad state', 0)")));
      expect(failureMessage(thread.resume())).toBe('bad state');
      expect(thread.status()).toBe('error');
    });

    it('refuses finished and errored threads', () => {
      const done = unwrap(vm.createThread(compile(vm, 'return 1')));
      unwrap(done.resume());
      expect(failure(done.resume())).toEqual({ code: 'COROUTINE_UNRESUMABLE', status: 'finished' });

      const broken = unwrap(vm.createThread(compile(vm, "error('x')")));
      broken.resume();
      expect(failure(broken.resume())).toEqual({ code: 'COROUTINE_UNRESUMABLE', status: 'error' });
    });

    it('hands out handles to threads created by scripts', () => {
      const [value] = unwrap(
        vm.exec('return coroutine.create(function(x) coroutine.yield(x) return x + 1 end)'),
      );
      const thread = asThread(value);
      expect(unwrap(thread.resume(4))).toEqual([4]);
      expect(unwrap(thread.resume())).toEqual([5]);
      expect(vm.pointerOf(thread)).toBe(thread.pointer);
    });

    it('supports coroutine.wrap', () => {
      const result = unwrap(
        vm.exec(`
          local gen = coroutine.wrap(function() coroutine.yield(1) coroutine.yield(2) end)
          return gen(), gen()
        `),
      );
      expect(result).toEqual([1, 2]);
      expect(failureMessage(vm.exec("coroutine.wrap(function() error('inner', 0) end)()"))).toBe(
        'inner',
      );
    });
  });

  describe('status', () => {
    it('reports running and normal from inside the VM', () => {
      const statuses: ThreadStatus[] = [];
      const probe = vm.createFunction((_self, ...threads) => {
        for (const thread of threads) {
          statuses.push(asThread(thread).status());
        }
      });
      unwrap(vm.globals().set('probe', probe));

      const outer = unwrap(
        vm.createThread(
          compile(
            vm,
            `
            local outer = coroutine.running()
            probe(outer)
            local inner = coroutine.create(function() probe(outer, coroutine.running()) end)
            coroutine.resume(inner)
          `,
          ),
        ),
      );
      unwrap(outer.resume());
      expect(statuses).toEqual(['running', 'normal', 'running']);
    });
  });

  describe('reset', () => {
    it('rebinds a finished thread in place', () => {
      const thread = unwrap(vm.createThread(compile(vm, 'return 1')));
      const pointer = thread.pointer;
      unwrap(thread.resume());

      unwrap(thread.reset(compile(vm, 'return ... + 1')));
      expect(thread.status()).toBe('resumable');
      expect(thread.pointer).toBe(pointer);
      expect(unwrap(thread.resume(9))).toEqual([10]);
    });

    it('rebinds a thread that never started', () => {
      const thread = unwrap(vm.createThread(compile(vm, 'return "old"')));
      unwrap(thread.reset(compile(vm, 'return "new"')));
      expect(unwrap(thread.resume())).toEqual(['new']);
    });

    it('replaces an errored thread with a fresh one', () => {
      const thread = unwrap(vm.createThread(compile(vm, "error('x')")));
      const pointer = thread.pointer;
      thread.resume();

      unwrap(thread.reset(compile(vm, 'return 2')));
      expect(thread.pointer).not.toBe(pointer);
      expect(thread.status()).toBe('resumable');
      expect(unwrap(thread.resume())).toEqual([2]);
    });

    it('replaces a suspended thread with a fresh one', () => {
      const thread = unwrap(vm.createThread(compile(vm, 'coroutine.yield(1) return 2')));
      unwrap(thread.resume());

      unwrap(thread.reset(compile(vm, 'return 3')));
      expect(unwrap(thread.resume())).toEqual([3]);
      expect(thread.status()).toBe('finished');
    });

    it('refuses to reset a running thread', () => {
      const outcomes: Array<Result<void, VmError>> = [];
      const replacement = compile(vm, 'return 0');
      const probe = vm.createFunction((_self, thread: LuaValue) => {
        outcomes.push(asThread(thread).reset(replacement));
      });
      unwrap(vm.globals().set('probe', probe));

      const thread = unwrap(vm.createThread(compile(vm, 'probe(coroutine.running()) return 1')));
      expect(unwrap(thread.resume())).toEqual([1]);
      expect(outcomes).toEqual([
        { ok: false, error: { code: 'RUNTIME_ERROR', message: 'cannot reset a running thread' } },
      ]);
    });
  });

  describe('closed instance', () => {
    it('returns INSTANCE_CLOSED from resume and throws from status', () => {
      const body = compile(vm, 'return 1');
      const thread = unwrap(vm.createThread(body));
      vm.close();
      expect(failure(thread.resume())).toEqual({ code: 'INSTANCE_CLOSED', instanceId: vm.id });
      expect(failure(vm.createThread(body))).toEqual({
        code: 'INSTANCE_CLOSED',
        instanceId: vm.id,
      });
      expect(() => thread.status()).toThrow(ContractViolation);
    });
  });
});
