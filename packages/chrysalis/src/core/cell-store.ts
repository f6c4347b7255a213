/*
 * CellStore
 * ---------
 * The indirection layer between a singleton binding name and its live
 * instance. Exactly one Cell exists per singleton name; it is created lazily
 * on first resolution and owned exclusively by the container.
 *
 * Dependents never hold a cell. They receive the instance the cell held at
 * the moment they resolved it, so a replacement only changes what the
 * container hands out from then on.
 *
 * A cell remembers which binding version produced its instance. An instance
 * whose version no longer matches the binding is never served.
 */
import { CellState, type CellStateType } from '../types/types.js';
import type { ResolutionContext } from './context.js';
import { FLAG_HAS_INSTANCE } from './flags.js';
import type { BindingName } from './key.js';

export type Cell = {
  name: BindingName;
  state: CellStateType;
  instance?: unknown;
  /** Binding version that produced `instance`. */
  version: number;
  /** Shared in-flight creation for async singletons. */
  promise?: Promise<unknown>;
  /** Call that started `promise`. */
  owner?: ResolutionContext;
  flags: number;
};

export class CellStore {
  private readonly cells = new Map<BindingName, Cell>();

  get size(): number {
    return this.cells.size;
  }

  get(name: BindingName): Cell | undefined {
    return this.cells.get(name);
  }

  /**
   * Return the cell for `name`, creating an empty one on first use.
   */
  ensure(name: BindingName): Cell {
    let cell = this.cells.get(name);
    if (cell === undefined) {
      cell = { name, state: CellState.Uninstantiated, version: -1, flags: 0 };
      this.cells.set(name, cell);
    }
    return cell;
  }

  /**
   * Cached instance for `name` if one exists for exactly `version`.
   */
  lookup(name: BindingName, version: number): { instance: unknown } | undefined {
    const cell = this.cells.get(name);
    if (cell === undefined || !(cell.flags & FLAG_HAS_INSTANCE) || cell.version !== version) {
      return undefined;
    }
    return { instance: cell.instance };
  }

  /** False once `cell` has been evicted. */
  isAttached(cell: Cell): boolean {
    return this.cells.get(cell.name) === cell;
  }

  commit(cell: Cell, instance: unknown, version: number): void {
    cell.instance = instance;
    cell.version = version;
    cell.flags |= FLAG_HAS_INSTANCE;
    cell.state = CellState.Cached;
  }

  /**
   * Detach the cell for `name` and return its cached instance, if any. The
   * caller is responsible for disposing it.
   *
   * The next resolution starts from a fresh cell, so a creation still in
   * flight on the detached one can no longer commit or be awaited.
   */
  evict(name: BindingName): { instance: unknown } | undefined {
    const cell = this.cells.get(name);
    if (cell === undefined) return undefined;
    this.cells.delete(name);
    if (!(cell.flags & FLAG_HAS_INSTANCE)) return undefined;
    const instance = cell.instance;
    cell.instance = undefined;
    cell.flags &= ~FLAG_HAS_INSTANCE;
    cell.state = CellState.Disposed;
    return { instance };
  }

  *values(): IterableIterator<Cell> {
    yield* this.cells.values();
  }

  clear(): void {
    this.cells.clear();
  }
}
