/* ChainExecutor
 *
 * Runs a binding's chain and configure list. It is a pure function of
 * (binding, resolver): all knowledge of scopes, caching and cycles lives in
 * the resolvers, which hand in a callback for `ref()` arguments.
 *
 * Evaluation rules
 *  - Steps run strictly left to right; arguments of one step are resolved
 *    left to right before the step runs, also on the async path.
 *  - construct/produce set the chain value to what they return.
 *  - invoke calls a method on the chain value. `undefined` back means the
 *    method is void and the chain stays on the receiver; anything else
 *    becomes the new chain value.
 *  - configure steps resolve their target and call `apply(self, other)`.
 *
 * Errors
 *  - A throwing step aborts the chain and surfaces as ConstructionError with
 *    the step in its message; a throwing configure closure surfaces as
 *    ConfigurationError. Errors raised while resolving `ref()` arguments
 *    propagate unchanged so the caller sees the root kind (unknown binding,
 *    cycle, a dependency's own ConstructionError).
 *  - On the sync path a step that returns a promise is rejected with a
 *    ConstructionError pointing at resolveAsync(). The abandoned promise's
 *    eventual rejection is logged, not left unhandled.
 */

import { ConfigurationError, ConstructionError } from '../errors/errors.js';
import { describeStep, isLiteralArg, isRefArg } from '../steps/steps.js';
import type { ChainStep, InstantiateHook, RefArg } from '../types/types.js';
import type { Binding } from './binding-registry.js';

export type RefResolver = (arg: RefArg) => unknown;
export type AsyncRefResolver = (arg: RefArg) => Promise<unknown>;

const IS_DEV = process.env.NODE_ENV !== 'production';

/** Sentinel for "no step has produced a value yet". */
const UNSET: unique symbol = Symbol('chrysalis.unset');

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

const toNs = (ms: number) => Math.round(ms * 1_000_000);

export function isThenable(x: unknown): x is PromiseLike<unknown> {
  return (
    (typeof x === 'object' || typeof x === 'function') &&
    x !== null &&
    'then' in x &&
    typeof x.then === 'function'
  );
}

function isObjectLike(x: unknown): x is object {
  return (typeof x === 'object' && x !== null) || typeof x === 'function';
}

/**
 * Keep a promise the sync path refused from turning into an unhandled
 * rejection.
 */
function abandon(name: string, value: PromiseLike<unknown>): void {
  Promise.resolve(value).catch((error: unknown) => {
    if (IS_DEV) {
      console.warn(`[chrysalis] Promise returned to the sync path of '${name}' rejected:`, error);
    }
  });
}

const asyncOnly = (what: string) =>
  new Error(`${what} returned a Promise; resolve this binding with resolveAsync()`);

export class ChainExecutor {
  constructor(private readonly hook?: InstantiateHook) {}

  private instrumentSync<T>(name: string, execute: () => T): T {
    const hook = this.hook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      this.report(hook, name, start);
    }
  }

  private async instrumentAsync<T>(name: string, execute: () => Promise<T>): Promise<T> {
    const hook = this.hook;
    if (!hook) return await execute();

    const start = nowMs();
    try {
      return await execute();
    } finally {
      this.report(hook, name, start);
    }
  }

  /** A throwing hook never changes the outcome of the chain. */
  private report(hook: InstantiateHook, name: string, start: number): void {
    try {
      hook(name, toNs(nowMs() - start));
    } catch (error) {
      if (IS_DEV) console.warn(`[chrysalis] onConstruct hook threw for '${name}':`, error);
    }
  }

  // ----- main chain -----

  runSync(binding: Binding, resolveRef: RefResolver): unknown {
    return this.instrumentSync(binding.name, () => {
      let current: unknown = UNSET;
      for (let i = 0; i < binding.chain.length; i++) {
        const step = binding.chain[i];
        const args = step.args.map((arg) => this.argSync(arg, resolveRef));
        current = this.applySync(binding, step, i, current, args);
      }
      return current;
    });
  }

  async runAsync(binding: Binding, resolveRef: AsyncRefResolver): Promise<unknown> {
    return this.instrumentAsync(binding.name, async () => {
      let current: unknown = UNSET;
      for (let i = 0; i < binding.chain.length; i++) {
        const step = binding.chain[i];
        const args: unknown[] = [];
        for (const arg of step.args) args.push(await this.argAsync(arg, resolveRef));
        current = await this.applyAsync(binding, step, i, current, args);
      }
      return current;
    });
  }

  // ----- configure phase -----

  configureSync(binding: Binding, instance: unknown, resolveRef: RefResolver): void {
    for (const step of binding.configure) {
      const other = resolveRef(step.target);
      let result: unknown;
      try {
        result = Reflect.apply(step.apply, undefined, [instance, other]);
      } catch (e) {
        throw new ConfigurationError(binding.name, step.target.name, e);
      }
      if (isThenable(result)) {
        abandon(binding.name, result);
        throw new ConfigurationError(
          binding.name,
          step.target.name,
          asyncOnly(`configure('${step.target.name}')`)
        );
      }
    }
  }

  async configureAsync(
    binding: Binding,
    instance: unknown,
    resolveRef: AsyncRefResolver
  ): Promise<void> {
    for (const step of binding.configure) {
      const other = await resolveRef(step.target);
      try {
        await Reflect.apply(step.apply, undefined, [instance, other]);
      } catch (e) {
        throw new ConfigurationError(binding.name, step.target.name, e);
      }
    }
  }

  // ----- helpers -----

  private argSync(arg: unknown, resolveRef: RefResolver): unknown {
    if (isRefArg(arg)) return resolveRef(arg);
    if (isLiteralArg(arg)) return arg.value;
    return arg;
  }

  private async argAsync(arg: unknown, resolveRef: AsyncRefResolver): Promise<unknown> {
    if (isRefArg(arg)) return resolveRef(arg);
    if (isLiteralArg(arg)) return arg.value;
    return arg;
  }

  private applySync(
    binding: Binding,
    step: ChainStep,
    index: number,
    current: unknown,
    args: unknown[]
  ): unknown {
    try {
      const result = this.call(binding, step, current, args);
      if (isThenable(result.value)) {
        abandon(binding.name, result.value);
        throw asyncOnly(describeStep(step, index));
      }
      return result.keep ? current : result.value;
    } catch (e) {
      throw new ConstructionError(binding.name, describeStep(step, index), e);
    }
  }

  private async applyAsync(
    binding: Binding,
    step: ChainStep,
    index: number,
    current: unknown,
    args: unknown[]
  ): Promise<unknown> {
    try {
      const result = this.call(binding, step, current, args);
      const value: unknown = await result.value;
      // A void async method resolves to undefined: stay on the receiver.
      return result.keep || (step.kind === 'invoke' && value === undefined) ? current : value;
    } catch (e) {
      throw new ConstructionError(binding.name, describeStep(step, index), e);
    }
  }

  /**
   * Execute one step. `keep` tells the caller to leave the chain value on
   * the receiver.
   */
  private call(
    binding: Binding,
    step: ChainStep,
    current: unknown,
    args: unknown[]
  ): { value: unknown; keep: boolean } {
    switch (step.kind) {
      case 'construct': {
        const value: unknown = Reflect.construct(step.type, args);
        return { value, keep: false };
      }
      case 'produce': {
        const value: unknown = Reflect.apply(step.factory, undefined, args);
        return { value, keep: false };
      }
      case 'invoke': {
        if (current === UNSET) {
          throw new TypeError(
            `invoke(${step.method}) needs a value; start the chain of '${binding.name}' with construct() or produce()`
          );
        }
        if (!isObjectLike(current)) {
          throw new TypeError(`Cannot invoke '${step.method}' on a ${typeof current} value`);
        }
        const method: unknown = Reflect.get(current, step.method);
        if (typeof method !== 'function') {
          throw new TypeError(`'${step.method}' is not a method of the chain value`);
        }
        const value: unknown = Reflect.apply(method, current, args);
        return { value, keep: value === undefined };
      }
    }
  }
}
