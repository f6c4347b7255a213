import { describe, expect, it } from 'vitest';

import type { Cell } from '../src/core/cell-store.js';
import { ResolutionContext } from '../src/core/context.js';
import type { BindingName } from '../src/core/key.js';
import { CircularDependencyError } from '../src/errors/errors.js';
import { CellState } from '../src/types/types.js';

const n = (s: string) => s as BindingName;
const cellOf = (name: string, owner?: ResolutionContext): Cell => ({
  name: n(name),
  state: CellState.UnderConstruction,
  version: -1,
  flags: 0,
  owner,
});

describe('ResolutionContext', () => {
  it('tracks the names being built', () => {
    const ctx = new ResolutionContext();
    ctx.enter(n('a'));
    ctx.enter(n('b'));

    expect(ctx.has(n('a'))).toBe(true);
    expect(ctx.chain()).toEqual(['a', 'b']);

    ctx.leave();
    expect(ctx.chain()).toEqual(['a']);
  });

  it('rejects re-entering a name with the cycle path', () => {
    const ctx = new ResolutionContext();
    ctx.enter(n('root'));
    ctx.enter(n('a'));
    ctx.enter(n('b'));

    try {
      ctx.enter(n('a'));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CircularDependencyError);
      if (e instanceof CircularDependencyError) expect(e.cycle).toEqual(['a', 'b', 'a']);
    }
  });

  it('allows awaiting a creation owned by an unrelated call', () => {
    const other = new ResolutionContext();
    other.enter(n('db'));
    const ctx = new ResolutionContext();
    ctx.enter(n('service'));

    expect(() => ctx.assertCanAwait(cellOf('db', other))).not.toThrow();
  });

  it('detects two calls waiting on each other', () => {
    // Call 1 builds a and waits on b; call 2 builds b and now wants a.
    const one = new ResolutionContext();
    const two = new ResolutionContext();
    one.enter(n('a'));
    two.enter(n('b'));
    const cellA = cellOf('a', one);
    const cellB = cellOf('b', two);
    one.waitingOn = cellB;

    try {
      two.assertCanAwait(cellA);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CircularDependencyError);
      if (e instanceof CircularDependencyError) expect(e.cycle).toEqual(['b', 'a', 'b']);
    }
  });
});
