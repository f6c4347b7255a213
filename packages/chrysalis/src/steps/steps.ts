/*
 * Step constructors
 * -----------------
 * Small helpers that build the frozen step and argument objects a binding's
 * chain is made of. They do no resolution themselves; the executor walks the
 * resulting arrays.
 *
 *   container.register('service', {
 *     chain: [
 *       construct(Service, ref('counter')),
 *       invoke('setLimit', 10),       // void → chain stays on the Service
 *       invoke('handle'),             // returns a Handle → chain moves on
 *     ],
 *     configure: [configure('registry', (handle, registry) => registry.add(handle))],
 *   });
 */
import { toBindingName, type BindingRef } from '../core/key.js';
import { InvalidBindingError } from '../errors/errors.js';
import {
  ARG,
  type ConfigureStep,
  type Constructor,
  type ConstructStep,
  type Factory,
  type InvokeStep,
  type LiteralArg,
  type ProduceStep,
  type RefArg,
  type Step,
} from '../types/types.js';

const nameOf = (target: BindingRef, helper: string) => {
  const name = toBindingName(target);
  if (name === undefined) {
    throw new InvalidBindingError(`${helper}() expects a non-empty binding name or key.`);
  }
  return name;
};

/**
 * Reference another binding as a step argument.
 *
 * @example
 * ```typescript
 * construct(OrderProcessor, ref('gateway'), ref('logger', { optional: true }))
 * ```
 */
export function ref<T = unknown>(target: BindingRef<T>, opts?: { optional?: boolean }): RefArg {
  return Object.freeze({
    [ARG]: 'ref' as const,
    name: nameOf(target, 'ref'),
    optional: opts?.optional ?? false,
  });
}

/**
 * Pass a value through untouched, even one that would otherwise be read as a
 * reference marker.
 */
export function literal(value: unknown): LiteralArg {
  return Object.freeze({ [ARG]: 'literal' as const, value });
}

export function isRefArg(x: unknown): x is RefArg {
  return typeof x === 'object' && x !== null && ARG in x && x[ARG] === 'ref';
}

export function isLiteralArg(x: unknown): x is LiteralArg {
  return typeof x === 'object' && x !== null && ARG in x && x[ARG] === 'literal';
}

/**
 * Build a new instance of `type` with the resolved `args`.
 */
export function construct(type: Constructor, ...args: unknown[]): ConstructStep {
  return Object.freeze({ kind: 'construct' as const, type, args: Object.freeze(args) });
}

/**
 * Call a plain factory function with the resolved `args`; its return value
 * becomes the chain value.
 */
export function produce(factory: Factory, ...args: unknown[]): ProduceStep {
  return Object.freeze({ kind: 'produce' as const, factory, args: Object.freeze(args) });
}

/**
 * Call `method` on the current chain value.
 */
export function invoke(method: string, ...args: unknown[]): InvokeStep {
  return Object.freeze({ kind: 'invoke' as const, method, args: Object.freeze(args) });
}

/**
 * Post-construction hook: resolve `target` and hand it, together with the
 * freshly built instance, to `apply`.
 */
export function configure<S = unknown, O = unknown>(
  target: BindingRef<O>,
  apply: (self: S, other: O) => void | Promise<void>
): ConfigureStep {
  const name = nameOf(target, 'configure');
  return Object.freeze({
    kind: 'configure' as const,
    target: ref(name),
    apply,
  });
}

/**
 * Short, stable description of a step for error messages,
 * e.g. `#2 invoke(setLimit)`.
 */
export function describeStep(step: Step, index: number): string {
  switch (step.kind) {
    case 'construct':
      return `#${index} construct(${step.type.name || 'anonymous'})`;
    case 'produce':
      return `#${index} produce(${step.factory.name || 'anonymous'})`;
    case 'invoke':
      return `#${index} invoke(${step.method})`;
    case 'configure':
      return `#${index} configure(${step.target.name})`;
  }
}
