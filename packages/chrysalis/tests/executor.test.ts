import { describe, expect, it, vi } from 'vitest';

import { BindingRegistry, type Binding } from '../src/core/binding-registry.js';
import { ChainExecutor, isThenable } from '../src/core/executor.js';
import type { BindingName } from '../src/core/key.js';
import { ConfigurationError, ConstructionError, UnknownBindingError } from '../src/errors/errors.js';
import { configure, construct, invoke, literal, produce, ref } from '../src/steps/steps.js';
import { Scope, type ChainStep, type ConfigureStep, type RefArg } from '../src/types/types.js';

let seq = 0;
function bindingOf(chain: ChainStep[], configureSteps: ConfigureStep[] = []): Binding {
  const registry = new BindingRegistry('Test');
  return registry.register(`b${++seq}` as BindingName, Scope.Prototype, {
    chain,
    configure: configureSteps,
    dispose: undefined,
  });
}

class Point {
  x = 0;
  constructor(
    public label: string = '',
    public other?: unknown
  ) {}
  setX(x: number): void {
    this.x = x;
  }
  getX(): number {
    return this.x;
  }
  async load(): Promise<void> {
    this.x = 99;
  }
  async snapshot(): Promise<{ x: number }> {
    return { x: this.x };
  }
}

const noRefs = (arg: RefArg): unknown => {
  throw new Error(`unexpected ref ${arg.name}`);
};

describe('ChainExecutor (sync)', () => {
  const executor = new ChainExecutor();

  it('keeps the receiver after a void invoke and moves on after a returning one', () => {
    const stay = executor.runSync(bindingOf([construct(Point), invoke('setX', 7)]), noRefs);
    expect(stay).toBeInstanceOf(Point);
    expect(stay).toMatchObject({ x: 7 });

    const moved = executor.runSync(
      bindingOf([construct(Point), invoke('setX', 7), invoke('getX')]),
      noRefs
    );
    expect(moved).toBe(7);
  });

  it('passes literals through and resolves refs in argument order', () => {
    const seen: string[] = [];
    const resolveRef = (arg: RefArg) => {
      seen.push(arg.name);
      return `<${arg.name}>`;
    };
    const value = executor.runSync(
      bindingOf([construct(Point, ref('label'), ref('other')), invoke('setX', literal(3))]),
      resolveRef
    );

    expect(seen).toEqual(['label', 'other']);
    expect(value).toMatchObject({ label: '<label>', other: '<other>', x: 3 });
  });

  it('produce() calls a factory with resolved arguments', () => {
    const calls: number[][] = [];
    const add = (a: number, b: number) => {
      calls.push([a, b]);
      return a + b;
    };
    expect(executor.runSync(bindingOf([produce(add, 2, 3)]), noRefs)).toBe(5);
    expect(calls).toEqual([[2, 3]]);
  });

  it('wraps a failing step in ConstructionError naming the step', () => {
    const boom = new Error('boom');
    const binding = bindingOf([
      construct(Point),
      produce(function explode() {
        throw boom;
      }),
    ]);

    try {
      executor.runSync(binding, noRefs);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConstructionError);
      if (!(e instanceof ConstructionError)) return;
      expect(e.step).toBe('#1 produce(explode)');
      expect(e.bindingName).toBe(binding.name);
      expect(e.cause).toBe(boom);
    }
  });

  it('rejects invoking a missing method', () => {
    const binding = bindingOf([construct(Point), invoke('nope')]);
    expect(() => executor.runSync(binding, noRefs)).toThrow(ConstructionError);
  });

  it('rejects invoking on a primitive chain value', () => {
    const binding = bindingOf([produce(() => 5), invoke('toFixed')]);
    expect(() => executor.runSync(binding, noRefs)).toThrow(ConstructionError);
  });

  it('lets errors from reference resolution through unchanged', () => {
    const unknown = new UnknownBindingError('db', []);
    const binding = bindingOf([construct(Point, ref('db'))]);

    expect(() =>
      executor.runSync(binding, () => {
        throw unknown;
      })
    ).toThrow(unknown);
  });

  it('refuses a promise on the sync path', () => {
    const binding = bindingOf([produce(async () => new Point())]);

    try {
      executor.runSync(binding, noRefs);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConstructionError);
      if (!(e instanceof ConstructionError)) return;
      expect(e.cause).toBeInstanceOf(Error);
      expect(String(e.cause)).toContain('resolveAsync()');
    }
  });

  it('reports every chain execution to the instrumentation hook', () => {
    const hook = vi.fn();
    const instrumented = new ChainExecutor(hook);
    const ok = bindingOf([construct(Point)]);
    const failing = bindingOf([
      produce(() => {
        throw new Error('x');
      }),
    ]);

    instrumented.runSync(ok, noRefs);
    expect(() => instrumented.runSync(failing, noRefs)).toThrow(ConstructionError);

    expect(hook).toHaveBeenCalledTimes(2);
    expect(hook).toHaveBeenNthCalledWith(1, ok.name, expect.any(Number));
    expect(hook).toHaveBeenNthCalledWith(2, failing.name, expect.any(Number));
  });

  it('keeps the chain outcome when the instrumentation hook throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const instrumented = new ChainExecutor(() => {
      throw new Error('telemetry down');
    });
    const ok = bindingOf([produce(() => 5)]);
    const failing = bindingOf([
      produce(() => {
        throw new Error('x');
      }),
    ]);

    expect(instrumented.runSync(ok, noRefs)).toBe(5);
    expect(() => instrumented.runSync(failing, noRefs)).toThrow(ConstructionError);
    await expect(instrumented.runAsync(ok, async () => undefined)).resolves.toBe(5);
    await expect(instrumented.runAsync(failing, async () => undefined)).rejects.toBeInstanceOf(
      ConstructionError
    );
    expect(warn).toHaveBeenCalledTimes(4);
  });
});

describe('ChainExecutor (async)', () => {
  const executor = new ChainExecutor();

  it('awaits produce() results and async void methods', async () => {
    const value = await executor.runAsync(
      bindingOf([produce(async () => new Point('async')), invoke('load')]),
      async () => undefined
    );

    expect(value).toBeInstanceOf(Point);
    expect(value).toMatchObject({ label: 'async', x: 99 });
  });

  it('moves on to an awaited non-void result', async () => {
    const value = await executor.runAsync(
      bindingOf([construct(Point), invoke('setX', 4), invoke('snapshot')]),
      async () => undefined
    );
    expect(value).toEqual({ x: 4 });
  });

  it('resolves refs one at a time', async () => {
    const events: string[] = [];
    const resolveRef = async (arg: RefArg) => {
      events.push(`start:${arg.name}`);
      await new Promise((r) => setTimeout(r, arg.name === 'slow' ? 10 : 0));
      events.push(`end:${arg.name}`);
      return arg.name;
    };

    await executor.runAsync(bindingOf([construct(Point, ref('slow'), ref('fast'))]), resolveRef);

    expect(events).toEqual(['start:slow', 'end:slow', 'start:fast', 'end:fast']);
  });

  it('wraps rejected steps in ConstructionError', async () => {
    const binding = bindingOf([
      produce(async () => {
        throw new Error('late');
      }),
    ]);

    await expect(executor.runAsync(binding, async () => undefined)).rejects.toBeInstanceOf(
      ConstructionError
    );
  });
});

describe('ChainExecutor configure phase', () => {
  const executor = new ChainExecutor();

  it('hands the instance and the resolved target to each closure in order', () => {
    const calls: string[] = [];
    const binding = bindingOf(
      [construct(Point)],
      [
        configure<Point, string>('first', (self, other) => {
          calls.push(`${other}:${self.x}`);
          self.setX(1);
        }),
        configure<Point, string>('second', (self, other) => {
          calls.push(`${other}:${self.x}`);
        }),
      ]
    );

    executor.configureSync(binding, new Point(), (arg) => arg.name);

    expect(calls).toEqual(['first:0', 'second:1']);
  });

  it('wraps a throwing closure in ConfigurationError', () => {
    const boom = new Error('boom');
    const binding = bindingOf(
      [construct(Point)],
      [
        configure('registry', () => {
          throw boom;
        }),
      ]
    );

    try {
      executor.configureSync(binding, new Point(), () => ({}));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (!(e instanceof ConfigurationError)) return;
      expect(e.target).toBe('registry');
      expect(e.cause).toBe(boom);
    }
  });

  it('keeps the kind of a failing target resolution', () => {
    const unknown = new UnknownBindingError('registry', []);
    const binding = bindingOf([construct(Point)], [configure('registry', () => undefined)]);

    expect(() =>
      executor.configureSync(binding, new Point(), () => {
        throw unknown;
      })
    ).toThrow(unknown);
  });

  it('refuses an async closure on the sync path and awaits it on the async path', async () => {
    const binding = bindingOf(
      [construct(Point)],
      [
        configure<Point>('registry', async (self) => {
          self.setX(5);
        }),
      ]
    );

    expect(() => executor.configureSync(binding, new Point(), () => ({}))).toThrow(
      ConfigurationError
    );

    const point = new Point();
    await executor.configureAsync(binding, point, async () => ({}));
    expect(point.x).toBe(5);
  });

  it('wraps a rejected async closure in ConfigurationError', async () => {
    const binding = bindingOf(
      [construct(Point)],
      [
        configure('registry', async () => {
          throw new Error('late');
        }),
      ]
    );

    await expect(
      executor.configureAsync(binding, new Point(), async () => ({}))
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('isThenable()', () => {
  it('recognizes promise-like values', () => {
    expect(isThenable(Promise.resolve(1))).toBe(true);
    expect(isThenable({ then: () => undefined })).toBe(true);
    expect(isThenable({ then: 1 })).toBe(false);
    expect(isThenable(null)).toBe(false);
    expect(isThenable(5)).toBe(false);
  });
});
