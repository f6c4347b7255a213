import { beforeEach, describe, expect, it } from 'vitest';

import { Container } from '../src/core/container.js';
import { Binding } from '../src/decorators/binding.js';
import { Inject } from '../src/decorators/inject.js';
import {
  DuplicateBindingError,
  InvalidBindingError,
  MissingBindingDecoratorError,
  MissingInjectDecoratorError,
} from '../src/errors/errors.js';
import { StaticBindingRegistry } from '../src/registry/static-registry.js';
import { configure, construct, invoke, produce } from '../src/steps/steps.js';
import { Scope } from '../src/types/types.js';

class Widget {}

const reasonOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (e) {
    if (e instanceof InvalidBindingError) return e.reason;
    throw e;
  }
  return undefined;
};

describe('Container validation', () => {
  beforeEach(() => {
    StaticBindingRegistry.resetForTests();
  });

  describe('configuration', () => {
    it('rejects a malformed config', () => {
      expect(() => new Container('orders' as never)).toThrow(InvalidBindingError);
      expect(reasonOf(() => new Container({ name: ' ' }))).toBe("'name' must be a non-empty string.");
      expect(reasonOf(() => new Container({ bindings: {} as never }))).toBe("'bindings' must be an array.");
      expect(reasonOf(() => new Container({ replacePolicy: 'lazy' as never }))).toBe(
        "'replacePolicy' must be 'immediate' or 'deferred', got lazy."
      );
      expect(reasonOf(() => new Container({ onConstruct: 'log' as never }))).toBe(
        "'onConstruct' must be a function."
      );
    });

    it('rejects binding entries that are neither classes nor declarations', () => {
      expect(reasonOf(() => new Container({ bindings: [null as never] }))).toBe(
        'bindings[0] must be a @Binding() class or a { name, chain } declaration.'
      );
    });
  });

  describe('register()', () => {
    it('rejects a duplicate name and leaves the first binding in place', () => {
      const container = new Container({ name: 'Shop' });
      container.register('widget', { chain: [construct(Widget)] });

      let err: unknown;
      try {
        container.register('widget', { chain: [produce(() => 'other')] });
      } catch (e) {
        err = e;
      }

      expect(err).toBeInstanceOf(DuplicateBindingError);
      if (err instanceof DuplicateBindingError) {
        expect(err.bindingName).toBe('widget');
        expect(err.containerName).toBe('Shop');
      }
      expect(container.resolve('widget')).toBeInstanceOf(Widget);
    });

    it('rejects empty names', () => {
      const container = new Container();

      expect(reasonOf(() => container.register('', { chain: [construct(Widget)] }))).toBe(
        'register() expects a non-empty binding name or key.'
      );
      expect(reasonOf(() => container.resolve('  '))).toBe(
        'resolve() expects a non-empty binding name or key.'
      );
    });

    it('rejects missing or empty chains', () => {
      const container = new Container();

      expect(reasonOf(() => container.register('w', undefined as never))).toBe(
        "register('w') needs options with a 'chain'."
      );
      expect(reasonOf(() => container.register('w', { chain: [] }))).toBe(
        "register('w'): 'chain' must be a non-empty array of steps."
      );
      expect(container.has('w')).toBe(false);
    });

    it('rejects configure steps in the chain and chain steps in the configure list', () => {
      const container = new Container();
      const wire = configure('other', () => undefined);

      expect(reasonOf(() => container.register('w', { chain: [construct(Widget), wire as never] }))).toBe(
        "register('w'): chain[1] is a configure() step; put it in the 'configure' list."
      );
      expect(
        reasonOf(() =>
          container.register('w', { chain: [construct(Widget)], configure: [construct(Widget) as never] })
        )
      ).toBe("register('w'): configure[0] must be built with configure().");
    });

    it('rejects a chain that starts with invoke()', () => {
      const container = new Container();

      expect(reasonOf(() => container.register('w', { chain: [invoke('start')] }))).toBe(
        "register('w'): chain must start with construct() or produce()."
      );
    });

    it('rejects values that are not steps', () => {
      const container = new Container();

      expect(reasonOf(() => container.register('w', { chain: [{ kind: 'build' } as never] }))).toBe(
        "register('w'): chain[0] is not a step; build steps with construct(), produce() or invoke()."
      );
    });

    it('rejects unknown scopes and eager prototypes', () => {
      const container = new Container();

      expect(
        reasonOf(() => container.register('w', { scope: 'request' as never, chain: [construct(Widget)] }))
      ).toBe("'request' is not a scope (binding 'w').");
      expect(
        reasonOf(() =>
          container.register('w', { scope: Scope.Prototype, eager: true, chain: [construct(Widget)] })
        )
      ).toBe("prototype binding 'w' cannot be eager.");
    });

    it('rejects malformed dispose hooks', () => {
      const container = new Container();

      expect(
        reasonOf(() => container.register('w', { chain: [construct(Widget)], dispose: 42 as never }))
      ).toBe("'dispose' must be a method name, a function or false, got 42.");
      expect(reasonOf(() => container.registerValue('v', 1, { dispose: '' }))).toBe(
        "'dispose' must be a method name, a function or false, got ."
      );
    });

    it('rejects an unknown replace policy', () => {
      const container = new Container();
      container.register('w', { chain: [construct(Widget)] });

      expect(
        reasonOf(() => container.replace('w', { chain: [construct(Widget)], policy: 'later' as never }))
      ).toBe("unknown replace policy 'later'.");
    });
  });

  describe('decorated classes', () => {
    it('requires @Binding()', () => {
      class Plain {}

      expect(() => new Container({ bindings: [Plain] })).toThrow(MissingBindingDecoratorError);
    });

    it('requires @Inject() on every constructor parameter', () => {
      class Dep {}

      @Binding({ name: 'needy' })
      class Needy {
        constructor(
          public readonly first: Dep,
          @Inject('dep') public readonly second: Dep
        ) {}
      }

      let err: unknown;
      try {
        new Container().register(Needy);
      } catch (e) {
        err = e;
      }

      expect(err).toBeInstanceOf(MissingInjectDecoratorError);
      if (err instanceof MissingInjectDecoratorError) {
        expect(err.className).toBe('Needy');
        expect(err.parameterIndex).toBe(0);
      }
    });
  });
});
