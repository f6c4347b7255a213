/* ResolverSync
 *
 * Synchronous resolution helper used by Container. Responsibilities:
 *  - Reject a name already being built on this call with
 *    CircularDependencyError (also covers configure-phase back references).
 *  - Prototype: run chain + configure on every call, never cache.
 *  - Singleton: serve the cached instance for the binding's current version,
 *    otherwise build, configure, and only then commit to the cell.
 *  - Refuse to race an async creation already in flight for the same cell.
 *
 * Notes:
 *  - The Binding is read once per resolution; a replace() issued from inside a
 *    step cannot mix chains. The container decides at commit time whether the
 *    finished instance may still be cached (see Container.settle()).
 *  - A failed creation leaves the cell without an instance, so the next
 *    resolution retries from scratch.
 */

import { CircularDependencyError, ConstructionError } from '../errors/errors.js';
import { CellState, type RefArg } from '../types/types.js';
import type { Cell } from './cell-store.js';
import type { Container } from './container.js';
import type { ResolutionContext } from './context.js';
import { FLAG_HAS_INSTANCE, SCOPE_MASK, SCOPE_PROTOTYPE } from './flags.js';
import type { BindingName } from './key.js';

/**
 * A creation of `cell` running synchronously on another call can only mean a
 * step re-entered the container for the binding it is building. Returns the
 * cycle path in that case.
 */
export function reentrantCycle(cell: Cell, ctx: ResolutionContext): string[] | undefined {
  const owner = cell.owner;
  if (owner === undefined || owner === ctx || cell.promise) return undefined;
  if (cell.state !== CellState.UnderConstruction && cell.state !== CellState.Configuring) {
    return undefined;
  }
  const at = owner.stack.indexOf(cell.name);
  return [...owner.stack.slice(at === -1 ? 0 : at), ...ctx.chain(), cell.name];
}

/** State a cell falls back to after a failed or abandoned creation. */
export function restingState(cell: Cell) {
  return cell.flags & FLAG_HAS_INSTANCE ? CellState.Cached : CellState.Uninstantiated;
}

export class ResolverSync {
  constructor(private readonly container: Container) {}

  /**
   * Resolve `name` on the call described by `ctx`.
   *
   * @throws UnknownBindingError, CircularDependencyError, ConstructionError,
   *         ConfigurationError
   */
  resolve(name: BindingName, ctx: ResolutionContext): unknown {
    if (ctx.has(name)) throw new CircularDependencyError(ctx.cycleTo(name));

    const { registry, cells, executor, lifecycle } = this.container;
    const binding = registry.lookup(name, ctx.chain());
    const resolveRef = (arg: RefArg) => this.resolveRef(arg, ctx);

    // Prototype: fresh every call
    if ((binding.flags & SCOPE_MASK) === SCOPE_PROTOTYPE) {
      ctx.enter(name);
      try {
        const value = executor.runSync(binding, resolveRef);
        lifecycle.runConfigureSync(binding, value, resolveRef);
        return value;
      } finally {
        ctx.leave();
      }
    }

    // Fast path: cached for the current version
    const hit = cells.lookup(name, binding.version);
    if (hit) return hit.instance;

    const cell = cells.ensure(name);
    if (cell.promise) {
      throw new ConstructionError(
        name,
        'resolve()',
        new Error('an asynchronous creation of this binding is in flight; use resolveAsync()')
      );
    }
    const cycle = reentrantCycle(cell, ctx);
    if (cycle) throw new CircularDependencyError(cycle);

    ctx.enter(name);
    cell.owner = ctx;
    cell.state = CellState.UnderConstruction;
    try {
      const value = executor.runSync(binding, resolveRef);
      cell.state = CellState.Configuring;
      lifecycle.runConfigureSync(binding, value, resolveRef);
      this.container.settle(cell, binding, value);
      return value;
    } catch (e) {
      cell.state = restingState(cell);
      throw e;
    } finally {
      cell.owner = undefined;
      ctx.leave();
    }
  }

  private resolveRef(arg: RefArg, ctx: ResolutionContext): unknown {
    if (arg.optional && !this.container.registry.has(arg.name)) return undefined;
    return this.resolve(arg.name, ctx);
  }
}
