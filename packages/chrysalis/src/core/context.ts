/* ResolutionContext
 *
 * Per-call bookkeeping for one external resolve()/resolveAsync() invocation.
 *
 *  - `stack` holds the names currently being built on this call, outermost
 *    first. A name already on the stack means the chain needs itself.
 *  - `waitingOn` is the singleton cell whose in-flight creation (owned by a
 *    different call) this call is awaiting, if any. Chasing
 *    `cell.owner.waitingOn.owner...` gives the wait-for chain used to turn a
 *    cross-call cycle into a CircularDependencyError instead of a deadlock.
 *
 * Contexts are created at the facade and discarded when the call returns or
 * throws; nothing keeps a reference past that point except cells whose
 * creation the context started.
 */

import { CircularDependencyError } from '../errors/errors.js';
import type { Cell } from './cell-store.js';
import type { BindingName } from './key.js';

export class ResolutionContext {
  readonly stack: BindingName[] = [];
  waitingOn: Cell | undefined = undefined;

  has(name: BindingName): boolean {
    return this.stack.includes(name);
  }

  enter(name: BindingName): void {
    if (this.stack.includes(name)) throw new CircularDependencyError(this.cycleTo(name));
    this.stack.push(name);
  }

  leave(): void {
    this.stack.pop();
  }

  /**
   * Names from the first occurrence of `name` to the top of the stack, closed
   * with `name` itself: `['a', 'b', 'a']`.
   */
  cycleTo(name: BindingName): string[] {
    const start = this.stack.indexOf(name);
    const path = start === -1 ? [...this.stack] : this.stack.slice(start);
    return [...path, name];
  }

  /** Snapshot of the stack, for error messages. */
  chain(): string[] {
    return [...this.stack];
  }

  /**
   * Throw if awaiting `cell` would make this call wait on itself.
   */
  assertCanAwait(cell: Cell): void {
    const path: string[] = [...this.stack, cell.name];
    const seen = new Set<ResolutionContext>();
    let current: Cell | undefined = cell;
    let owner = cell.owner;
    while (current !== undefined && owner !== undefined && !seen.has(owner)) {
      if (owner === this) throw new CircularDependencyError(path);
      seen.add(owner);
      const at = owner.stack.indexOf(current.name);
      if (at !== -1) path.push(...owner.stack.slice(at + 1));
      current = owner.waitingOn;
      if (current !== undefined) path.push(current.name);
      owner = current?.owner;
    }
  }
}
