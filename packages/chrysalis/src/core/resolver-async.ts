/* ResolverAsync
 *
 * Asynchronous resolution helper used by Container. Responsibilities:
 *  - Collapse concurrent singleton creation so the chain of a binding runs at
 *    most once per version (Cell.promise deduplication).
 *  - Await steps and configure closures that return promises.
 *  - Detect cycles on the current call via its ResolutionContext, and across
 *    calls by walking the wait-for chain before awaiting someone else's
 *    creation.
 *  - Keep the set of in-flight work (singleton creations and every top-level
 *    call, prototypes included) so shutdown() can wait for it.
 *
 * Promise deduplication:
 *  - The first caller installs `cell.promise` synchronously, before anything
 *    awaits, so a second caller interleaved at any later point finds it.
 *  - Waiters record the cell in `ctx.waitingOn` while they await; the owner
 *    of a creation is `cell.owner`. Following owner → waitingOn → owner...
 *    back to the waiter means the two calls need each other.
 *  - On failure the cell returns to uninstantiated and every waiter sees the
 *    same error; the next call retries.
 */

import { CircularDependencyError } from '../errors/errors.js';
import { CellState, type RefArg } from '../types/types.js';
import type { Binding } from './binding-registry.js';
import type { Cell } from './cell-store.js';
import type { Container } from './container.js';
import type { ResolutionContext } from './context.js';
import { SCOPE_MASK, SCOPE_PROTOTYPE } from './flags.js';
import type { BindingName } from './key.js';
import { reentrantCycle, restingState } from './resolver-sync.js';

export class ResolverAsync {
  private readonly inflight = new Set<Promise<unknown>>();

  constructor(private readonly container: Container) {}

  /** Number of tracked creations and top-level calls still running. */
  get pending(): number {
    return this.inflight.size;
  }

  /**
   * Resolve `name` on the call described by `ctx`.
   *
   * @throws UnknownBindingError, CircularDependencyError, ConstructionError,
   *         ConfigurationError
   */
  async resolve(name: BindingName, ctx: ResolutionContext): Promise<unknown> {
    if (ctx.has(name)) throw new CircularDependencyError(ctx.cycleTo(name));

    const { registry, cells, executor, lifecycle } = this.container;
    const binding = registry.lookup(name, ctx.chain());
    const resolveRef = (arg: RefArg) => this.resolveRef(arg, ctx);

    if ((binding.flags & SCOPE_MASK) === SCOPE_PROTOTYPE) {
      ctx.enter(name);
      try {
        const value = await executor.runAsync(binding, resolveRef);
        await lifecycle.runConfigureAsync(binding, value, resolveRef);
        return value;
      } finally {
        ctx.leave();
      }
    }

    const hit = cells.lookup(name, binding.version);
    if (hit) return hit.instance;

    const cell = cells.ensure(name);

    // Someone else is already building it: wait, unless that waits on us.
    if (cell.promise) {
      ctx.assertCanAwait(cell);
      ctx.waitingOn = cell;
      try {
        return await cell.promise;
      } finally {
        ctx.waitingOn = undefined;
      }
    }

    const cycle = reentrantCycle(cell, ctx);
    if (cycle) throw new CircularDependencyError(cycle);

    ctx.enter(name);
    cell.owner = ctx;
    cell.state = CellState.UnderConstruction;
    const promise = this.track(this.build(binding, cell, resolveRef));
    cell.promise = promise;

    try {
      return await promise;
    } finally {
      ctx.leave();
    }
  }

  /**
   * Register `promise` as in-flight work until it settles. Returns the same
   * promise.
   */
  track<T>(promise: Promise<T>): Promise<T> {
    this.inflight.add(promise);
    const done = () => {
      this.inflight.delete(promise);
    };
    void promise.then(done, done);
    return promise;
  }

  /**
   * Wait until no tracked work is running. Creations started while
   * waiting (nested resolutions of the ones being waited on) are waited on
   * too. Failures are left to the callers that started them.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
  }

  private async build(
    binding: Binding,
    cell: Cell,
    resolveRef: (arg: RefArg) => Promise<unknown>
  ): Promise<unknown> {
    const { executor, lifecycle } = this.container;
    try {
      const value = await executor.runAsync(binding, resolveRef);
      cell.state = CellState.Configuring;
      await lifecycle.runConfigureAsync(binding, value, resolveRef);
      this.container.settle(cell, binding, value);
      return value;
    } catch (e) {
      cell.state = restingState(cell);
      throw e;
    } finally {
      cell.promise = undefined;
      cell.owner = undefined;
    }
  }

  private async resolveRef(arg: RefArg, ctx: ResolutionContext): Promise<unknown> {
    if (arg.optional && !this.container.registry.has(arg.name)) return undefined;
    return this.resolve(arg.name, ctx);
  }
}
