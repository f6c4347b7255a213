import { SCOPE_PROTOTYPE, SCOPE_SINGLETON } from '../core/flags.js';
import type { BindingName, BindingRef } from '../core/key.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * Parameters are typed `never` so that any class, whatever its constructor
 * parameters, is assignable; arguments are supplied by the chain at runtime.
 *
 * @template T - Type produced by the constructor
 */
export type Constructor<T = unknown> = new (...args: never[]) => T;

/**
 * Plain factory function accepted by `produce()` steps.
 */
export type Factory<T = unknown> = (...args: never[]) => T;

/**
 * Supported scopes for registered bindings.
 *
 *   - **Singleton**: constructed once, cached, disposed at shutdown
 *   - **Prototype**: constructed on every resolution, never cached or disposed
 *
 * @example
 * ```typescript
 * container.register('logger', {
 *   scope: Scope.Prototype,
 *   chain: [construct(Logger, 'app.log')],
 * });
 * ```
 */
export const Scope = {
  /** Single cached instance per container (default) */
  Singleton: 'singleton',
  /** Fresh instance for every resolution - never cached */
  Prototype: 'prototype',
} as const;

export type ScopeType = (typeof Scope)[keyof typeof Scope];
export type Scope = ScopeType;

/**
 * Convert a scope string to its bit flag.
 *
 * Called once per registration; resolution code checks `flags & SCOPE_MASK`.
 *
 * @internal
 */
export function scopeToFlag(scope: ScopeType): number {
  return scope === 'prototype' ? SCOPE_PROTOTYPE : SCOPE_SINGLETON;
}

/**
 * Cutover policy used by `replace()`.
 *
 *   - **Immediate**: dispose the cached instance now; the next resolution
 *     rebuilds from the new chain.
 *   - **Deferred**: stage the new chain; the old instance keeps being served
 *     until `refresh()` promotes it.
 */
export const ReplacePolicy = {
  Immediate: 'immediate',
  Deferred: 'deferred',
} as const;

export type ReplacePolicyType = (typeof ReplacePolicy)[keyof typeof ReplacePolicy];
export type ReplacePolicy = ReplacePolicyType;

/**
 * States a singleton cell moves through.
 *
 * `under-construction` and `configuring` only exist during one resolution;
 * `disposed` is terminal for the instance but the cell starts over from
 * `uninstantiated` on the next resolution.
 */
export const CellState = {
  Uninstantiated: 'uninstantiated',
  UnderConstruction: 'under-construction',
  Configuring: 'configuring',
  Cached: 'cached',
  Disposed: 'disposed',
} as const;

export type CellStateType = (typeof CellState)[keyof typeof CellState];

/**
 * Brand carried by argument markers so they can never be confused with
 * literal arguments.
 */
export const ARG: unique symbol = Symbol('chrysalis.arg');

/**
 * Reference to another binding, resolved when the step runs.
 */
export interface RefArg {
  readonly [ARG]: 'ref';
  readonly name: BindingName;
  /** Unregistered optional references resolve to `undefined`. */
  readonly optional: boolean;
}

/**
 * Explicit literal, passed through untouched (even if it looks like a ref).
 */
export interface LiteralArg {
  readonly [ARG]: 'literal';
  readonly value: unknown;
}

/** `new Type(...args)` */
export interface ConstructStep {
  readonly kind: 'construct';
  readonly type: Constructor;
  readonly args: readonly unknown[];
}

/** `factory(...args)` */
export interface ProduceStep {
  readonly kind: 'produce';
  readonly factory: Factory;
  readonly args: readonly unknown[];
}

/**
 * `current[method](...args)`; an `undefined` return keeps the receiver as the
 * chain value, anything else replaces it.
 */
export interface InvokeStep {
  readonly kind: 'invoke';
  readonly method: string;
  readonly args: readonly unknown[];
}

export type ConfigureApply = (self: never, other: never) => void | Promise<void>;

/**
 * Post-construction step: resolves `target` and hands both values to `apply`.
 * Only legal in a binding's `configure` list.
 */
export interface ConfigureStep {
  readonly kind: 'configure';
  readonly target: RefArg;
  readonly apply: ConfigureApply;
}

export type ChainStep = ConstructStep | ProduceStep | InvokeStep;
export type Step = ChainStep | ConfigureStep;

/**
 * How a singleton instance is cleaned up:
 *   - method name: `instance[name]()`
 *   - closure: `hook(instance)`
 *   - `false`: never disposed by the container
 *
 * When omitted, an instance exposing `dispose()` or `close()` is disposed
 * through it.
 */
export type DisposeHook = string | ((instance: never) => void | Promise<void>) | false;

/**
 * Options accepted by `register()`.
 */
export interface BindingOptions {
  /** @default Scope.Singleton */
  scope?: ScopeType;
  /** Ordered construction steps; must contain at least one step. */
  chain: readonly ChainStep[];
  /** Steps run after the chain, before the instance is cached. */
  configure?: readonly ConfigureStep[];
  dispose?: DisposeHook;
  /** Construct as soon as registered (singletons only). */
  eager?: boolean;
}

/**
 * Options accepted by `replace()`. The scope of a binding never changes.
 */
export interface ReplacementOptions {
  chain: readonly ChainStep[];
  configure?: readonly ConfigureStep[];
  dispose?: DisposeHook;
  /** Overrides ContainerConfig.replacePolicy for this call. */
  policy?: ReplacePolicyType;
}

/**
 * Binding declared inline in ContainerConfig.bindings.
 */
export interface BindingDeclaration extends BindingOptions {
  name: BindingRef;
}

export type InstantiateHook = (name: string, durationNs: number) => void;

/**
 * Container configuration passed to the constructor.
 */
export interface ContainerConfig {
  /**
   * Optional name for diagnostics and error messages.
   *
   * @default 'Container'
   */
  name?: string;

  /**
   * Bindings registered at construction, in order. Eager bindings among them
   * are constructed once the whole list is registered.
   *
   * Can be:
   * - Class constructor decorated with @Binding()
   * - Declaration object `{ name, chain, ... }`
   */
  bindings?: Array<Constructor | BindingDeclaration>;

  /**
   * Default cutover policy for `replace()`.
   *
   * @default 'immediate'
   */
  replacePolicy?: ReplacePolicyType;

  /**
   * Optional hook invoked after each chain execution.
   *
   * Receives the binding name and the execution duration in nanoseconds.
   * Useful for profiling or custom telemetry.
   */
  onConstruct?: InstantiateHook;
}

/**
 * Metadata produced by the `@Binding()` decorator.
 *
 * All metadata objects are frozen outside production.
 */
export interface BindingMetadata {
  name: BindingName;
  scope: ScopeType;
  dispose?: DisposeHook;
  eager: boolean;
}

/**
 * Immutable class definition captured during decorator evaluation.
 */
export interface StaticBindingDefinition {
  readonly ctor: Constructor;
  readonly metadata: BindingMetadata;
  /**
   * Constructor parameters in order. Undefined entries are parameters that
   * lack an `@Inject()` decorator.
   */
  readonly params: readonly (RefArg | undefined)[];
}
