/* LifecycleManager
 *
 * Owns the ordered list of singleton instances the container created and is
 * responsible for cleaning up. Order is construction order: an instance is
 * tracked when its cell commits, which happens after every singleton its chain
 * referenced has committed. Disposing in reverse therefore tears a dependent
 * down before anything it was built from.
 *
 *  - track(): called by the resolvers once an instance is final
 *  - release(): dispose one instance now (replace / refresh / unregister)
 *  - disposeAll(): shutdown; reverse order, sequential, every hook attempted
 *  - runConfigure*(): the configure phase; a singleton is committed by the
 *    resolver only after these return
 *
 * Instances whose hook is `false` (value bindings, opt-outs) stay in the list
 * so ordering is still visible through `size`, but are skipped when disposing.
 */

import { DisposalError, toError, type DisposalFailure } from '../errors/errors.js';
import type { DisposeHook } from '../types/types.js';
import type { Binding } from './binding-registry.js';
import type { AsyncRefResolver, ChainExecutor, RefResolver } from './executor.js';
import { isThenable } from './executor.js';

type Tracked = {
  readonly name: string;
  readonly instance: unknown;
  readonly hook: DisposeHook | undefined;
};

/**
 * Work out how to clean up `instance`. Returns undefined when there is nothing
 * to call.
 */
function disposerFor(instance: unknown, hook: DisposeHook | undefined): (() => unknown) | undefined {
  if (hook === false) return undefined;
  if (typeof hook === 'function') return () => Reflect.apply(hook, undefined, [instance]);

  const isObj = (typeof instance === 'object' && instance !== null) || typeof instance === 'function';

  if (typeof hook === 'string') {
    return () => {
      const method: unknown = isObj ? Reflect.get(instance, hook) : undefined;
      if (typeof method !== 'function') {
        throw new TypeError(`dispose method '${hook}' not found on instance`);
      }
      return Reflect.apply(method, instance, []);
    };
  }

  if (!isObj) return undefined;
  const dispose: unknown = Reflect.get(instance, 'dispose');
  if (typeof dispose === 'function') return () => Reflect.apply(dispose, instance, []);
  const close: unknown = Reflect.get(instance, 'close');
  if (typeof close === 'function') return () => Reflect.apply(close, instance, []);
  return undefined;
}

export class LifecycleManager {
  private tracked: Tracked[] = [];

  constructor(private readonly executor: ChainExecutor) {}

  /** Number of tracked instances, disposable or not. */
  get size(): number {
    return this.tracked.length;
  }

  /** Tracked binding names in construction order. */
  order(): string[] {
    return this.tracked.map((t) => t.name);
  }

  track(name: string, instance: unknown, hook: DisposeHook | undefined): void {
    this.tracked.push({ name, instance, hook });
  }

  /**
   * Stop tracking `instance` and dispose it.
   *
   * @returns a promise when the hook is asynchronous
   * @throws DisposalError when the hook fails (sync hooks throw, async hooks reject)
   */
  release(name: string, instance: unknown): void | Promise<void> {
    const idx = this.tracked.findIndex((t) => t.name === name && t.instance === instance);
    if (idx === -1) return;
    const [entry] = this.tracked.splice(idx, 1);

    const disposer = disposerFor(entry.instance, entry.hook);
    if (!disposer) return;

    let result: unknown;
    try {
      result = disposer();
    } catch (error) {
      throw new DisposalError([{ name, error: toError(error) }]);
    }
    if (isThenable(result)) {
      return Promise.resolve(result).then(
        () => undefined,
        (error: unknown) => {
          throw new DisposalError([{ name, error: toError(error) }]);
        }
      );
    }
  }

  /**
   * Dispose every tracked instance in reverse construction order.
   *
   * Hooks run one at a time; an asynchronous hook is awaited before the next
   * one starts. Failures are collected, never short-circuit.
   *
   * @throws DisposalError listing exactly the hooks that failed
   */
  async disposeAll(): Promise<void> {
    const entries = this.tracked;
    this.tracked = [];
    const failures: DisposalFailure[] = [];

    for (let i = entries.length - 1; i >= 0; i--) {
      const { name, instance, hook } = entries[i];
      const disposer = disposerFor(instance, hook);
      if (!disposer) continue;
      try {
        const result = disposer();
        if (isThenable(result)) await result;
      } catch (error) {
        failures.push({ name, error: toError(error) });
      }
    }

    if (failures.length > 0) throw new DisposalError(failures);
  }

  // ----- configure phase -----

  runConfigureSync(binding: Binding, instance: unknown, resolveRef: RefResolver): void {
    if (binding.configure.length === 0) return;
    this.executor.configureSync(binding, instance, resolveRef);
  }

  async runConfigureAsync(
    binding: Binding,
    instance: unknown,
    resolveRef: AsyncRefResolver
  ): Promise<void> {
    if (binding.configure.length === 0) return;
    await this.executor.configureAsync(binding, instance, resolveRef);
  }
}
