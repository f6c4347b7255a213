import {
  ContainerShuttingDownError,
  InvalidBindingError,
  MissingBindingDecoratorError,
  MissingInjectDecoratorError,
} from '../errors/errors.js';
import { StaticBindingRegistry } from '../registry/static-registry.js';
import { construct, produce } from '../steps/steps.js';
import {
  ReplacePolicy,
  Scope,
  type BindingDeclaration,
  type BindingOptions,
  type ChainStep,
  type ConfigureStep,
  type Constructor,
  type ContainerConfig,
  type DisposeHook,
  type InstantiateHook,
  type RefArg,
  type ReplacementOptions,
  type ReplacePolicyType,
  type ScopeType,
} from '../types/types.js';
import { BindingRegistry, type Binding, type BindingDefinition } from './binding-registry.js';
import { CellStore, type Cell } from './cell-store.js';
import { ResolutionContext } from './context.js';
import { ChainExecutor } from './executor.js';
import { FLAG_EAGER, FLAG_HAS_INSTANCE, FLAG_VALUE } from './flags.js';
import { toBindingName, type BindingName, type BindingRef } from './key.js';
import { LifecycleManager } from './lifecycle.js';
import { ResolverAsync } from './resolver-async.js';
import { restingState, ResolverSync } from './resolver-sync.js';

/**
 * Development mode flag for conditional validation.
 * In production, step shape validation and warnings are skipped.
 */
const IS_DEV = process.env.NODE_ENV !== 'production';

const CHAIN_KINDS = new Set(['construct', 'produce', 'invoke']);
const SCOPES = new Set<string>([Scope.Singleton, Scope.Prototype]);
const POLICIES = new Set<string>([ReplacePolicy.Immediate, ReplacePolicy.Deferred]);

function warn(message: string): void {
  if (IS_DEV) console.warn(`[chrysalis] ${message}`);
}

const isObject = (x: unknown): x is object => typeof x === 'object' && x !== null;

type FrozenConfig = Readonly<{
  name: string;
  bindings: ReadonlyArray<Constructor | BindingDeclaration> | undefined;
  replacePolicy: ReplacePolicyType;
  onConstruct: InstantiateHook | undefined;
}>;

/*
 * Container: chained-factory DI container.
 *
 * Bindings map a name to an ordered chain of steps; resolution runs the chain
 * (once for singletons, every time for prototypes), runs the configure phase,
 * and caches singletons in one cell per name. replace() swaps a binding's
 * chain at runtime under an Immediate or Deferred cutover; holders of an
 * instance resolved earlier keep it. shutdown() waits for in-flight
 * creations and disposes singletons in reverse construction order.
 */
export class Container {
  // Core composition: small responsibilities delegated to focused helpers
  readonly registry: BindingRegistry;
  readonly cells: CellStore;
  readonly executor: ChainExecutor;
  readonly lifecycle: LifecycleManager;
  readonly resolverSync: ResolverSync;
  readonly resolverAsync: ResolverAsync;

  private readonly name: string;
  private readonly replacePolicy: ReplacePolicyType;

  private shuttingDown = false;
  private shutdownPromise: Promise<void> | undefined;

  constructor(config?: ContainerConfig) {
    const cfg = this.validateAndFreezeConfig(config);

    this.name = cfg.name;
    this.replacePolicy = cfg.replacePolicy;

    this.registry = new BindingRegistry(this.name);
    this.cells = new CellStore();
    this.executor = new ChainExecutor(cfg.onConstruct);
    this.lifecycle = new LifecycleManager(this.executor);
    this.resolverSync = new ResolverSync(this);
    this.resolverAsync = new ResolverAsync(this);

    this.registry.init();
    if (cfg.bindings) this.fastInit(cfg.bindings);
  }

  /**
   * Validate configuration and return a frozen copy.
   *
   * @throws InvalidBindingError for a malformed config
   */
  private validateAndFreezeConfig(config?: ContainerConfig): FrozenConfig {
    if (config !== undefined && !isObject(config)) {
      throw new InvalidBindingError('container config must be an object.');
    }
    const name = config?.name ?? 'Container';
    if (typeof name !== 'string' || name.trim() === '') {
      throw new InvalidBindingError(`'name' must be a non-empty string.`);
    }
    const bindings = config?.bindings;
    if (bindings !== undefined && !Array.isArray(bindings)) {
      throw new InvalidBindingError(`'bindings' must be an array.`);
    }
    const replacePolicy = config?.replacePolicy ?? ReplacePolicy.Immediate;
    if (!POLICIES.has(replacePolicy)) {
      throw new InvalidBindingError(
        `'replacePolicy' must be 'immediate' or 'deferred', got ${String(replacePolicy)}.`
      );
    }
    const onConstruct = config?.onConstruct;
    if (onConstruct !== undefined && typeof onConstruct !== 'function') {
      throw new InvalidBindingError(`'onConstruct' must be a function.`);
    }
    return Object.freeze({
      name,
      bindings: bindings ? Object.freeze([...bindings]) : undefined,
      replacePolicy,
      onConstruct,
    });
  }

  /**
   * Register the configured bindings in order, then construct the eager
   * ones so they can reference bindings declared after them.
   */
  private fastInit(bindings: ReadonlyArray<Constructor | BindingDeclaration>): void {
    const eager: BindingName[] = [];
    for (let i = 0; i < bindings.length; i++) {
      const item = bindings[i];
      let name: BindingName | undefined;
      if (typeof item === 'function') {
        name = this.registerClass(item);
      } else if (isObject(item) && 'name' in item) {
        name = this.registerDeclaration(item.name, item);
      } else {
        throw new InvalidBindingError(
          `bindings[${i}] must be a @Binding() class or a { name, chain } declaration.`
        );
      }
      if (name !== undefined) eager.push(name);
    }
    for (const name of eager) this.resolverSync.resolve(name, new ResolutionContext());
  }

  // ----- public API -----

  getName(): string {
    return this.name;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Register a binding.
   *
   * Either a class decorated with @Binding(), or a name/key plus options.
   * Eager singletons are constructed before this returns.
   *
   * @throws DuplicateBindingError if the name is taken
   * @throws InvalidBindingError for malformed options
   * @throws MissingBindingDecoratorError / MissingInjectDecoratorError for
   *         incompletely decorated classes
   * @throws ContainerShuttingDownError after shutdown() began
   *
   * @example
   * ```typescript
   * container.register('counter', { chain: [construct(Counter)], dispose: 'flush' });
   * container.register(ServiceK, { chain: [construct(Service, ref('counter'))] });
   * container.register(DecoratedService);
   * ```
   */
  register(target: Constructor): void;
  register<T>(ref: BindingRef<T>, options: BindingOptions): void;
  register<T>(target: Constructor | BindingRef<T>, options?: BindingOptions): void {
    this.assertOpen('register');
    const eager =
      typeof target === 'function'
        ? this.registerClass(target)
        : this.registerDeclaration(target, options);
    if (eager !== undefined) this.resolverSync.resolve(eager, new ResolutionContext());
  }

  /**
   * Register a pre-built singleton. The container did not create it, so it is
   * not disposed unless a `dispose` hook is given.
   */
  registerValue<T>(ref: BindingRef<T>, value: T, opts?: { dispose?: DisposeHook }): void {
    this.assertOpen('registerValue');
    const name = this.nameOf(ref, 'registerValue');
    const dispose = opts?.dispose ?? false;
    if (IS_DEV) this.validateDispose(dispose);

    const provideValue = () => value;
    const binding = this.registry.register(
      name,
      Scope.Singleton,
      { chain: [produce(provideValue)], configure: [], dispose },
      FLAG_VALUE
    );
    this.settle(this.cells.ensure(name), binding, value);
  }

  /**
   * Swap the chain of a registered binding.
   *
   * Immediate (default): the cached instance is evicted and disposed, then the
   * new chain is installed; the next resolution builds from it. Deferred: the
   * new chain is staged and the old instance keeps being served until
   * refresh().
   *
   * Instances handed out before the call are never touched.
   *
   * @returns a promise when an asynchronous dispose hook ran
   * @throws UnknownBindingError if the name is not registered
   * @throws DisposalError if the evicted instance's hook failed (the new
   *         chain is installed regardless)
   */
  replace<T>(ref: BindingRef<T>, options: ReplacementOptions): void | Promise<void> {
    this.assertOpen('replace');
    const name = this.nameOf(ref, 'replace');
    this.registry.lookup(name);
    const definition = this.toDefinition(options, 'replace');
    const policy = options.policy ?? this.replacePolicy;
    if (IS_DEV && !POLICIES.has(policy)) {
      throw new InvalidBindingError(`unknown replace policy '${String(policy)}'.`);
    }

    if (policy === ReplacePolicy.Deferred) {
      if (this.registry.stage(name, definition)) {
        warn(`A staged replacement of '${name}' was overwritten before refresh().`);
      }
      return;
    }

    return this.evictThen(name, () => {
      this.registry.replace(name, definition);
    });
  }

  /**
   * Promote a staged (Deferred) replacement, if any, and evict the cached
   * instance so the next resolution rebuilds.
   */
  refresh<T>(ref: BindingRef<T>): void | Promise<void> {
    this.assertOpen('refresh');
    const name = this.nameOf(ref, 'refresh');
    this.registry.lookup(name);
    return this.evictThen(name, () => {
      this.registry.promote(name);
    });
  }

  /**
   * Remove a binding and dispose its live instance.
   */
  unregister<T>(ref: BindingRef<T>): void | Promise<void> {
    this.assertOpen('unregister');
    const name = this.nameOf(ref, 'unregister');
    this.registry.lookup(name);
    return this.evictThen(name, () => {
      this.registry.unregister(name);
    });
  }

  /**
   * Resolve a binding synchronously.
   *
   * @throws UnknownBindingError, CircularDependencyError, ConstructionError,
   *         ConfigurationError, ContainerShuttingDownError
   */
  resolve<T = unknown>(ref: BindingRef<T>): T {
    this.assertOpen('resolve');
    const name = this.nameOf(ref, 'resolve');
    return this.resolverSync.resolve(name, new ResolutionContext()) as T;
  }

  /**
   * Resolve a binding, awaiting steps and configure closures that return
   * promises. Concurrent first resolutions of a singleton share one creation.
   */
  async resolveAsync<T = unknown>(ref: BindingRef<T>): Promise<T> {
    this.assertOpen('resolveAsync');
    const name = this.nameOf(ref, 'resolveAsync');
    const pending = this.resolverAsync.resolve(name, new ResolutionContext());
    return (await this.resolverAsync.track(pending)) as T;
  }

  has<T>(ref: BindingRef<T>): boolean {
    const name = toBindingName(ref);
    return name !== undefined && this.registry.has(name);
  }

  /**
   * Like resolve(), but returns undefined when the binding is not registered.
   * Every other failure still throws.
   */
  tryResolve<T = unknown>(ref: BindingRef<T>): T | undefined {
    this.assertOpen('tryResolve');
    const name = this.nameOf(ref, 'tryResolve');
    if (!this.registry.has(name)) return undefined;
    return this.resolverSync.resolve(name, new ResolutionContext()) as T;
  }

  /**
   * Registered binding names (sorted alphabetically).
   */
  getRegisteredNames(): string[] {
    return this.registry.names();
  }

  /**
   * Singleton instances currently cached, by binding name.
   */
  getSingletons(): Map<string, unknown> {
    const out = new Map<string, unknown>();
    for (const cell of this.cells.values()) {
      if (cell.flags & FLAG_HAS_INSTANCE) out.set(cell.name, cell.instance);
    }
    return out;
  }

  /**
   * Shut the container down.
   *
   * The container stops accepting calls at once, waits for resolveAsync()
   * calls and singleton creations in flight to settle, then disposes every
   * tracked instance in reverse construction order. Repeated calls return the same promise.
   *
   * @throws DisposalError listing every hook that failed
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    this.shuttingDown = true;
    this.shutdownPromise = this.runShutdown();
    return this.shutdownPromise;
  }

  // ----- internal (used by the resolvers) -----

  /**
   * @internal Record a finished singleton creation. The instance is tracked
   * for disposal either way, but only cached when its binding is still the
   * current version and its cell was not evicted meanwhile.
   */
  settle(cell: Cell, binding: Binding, instance: unknown): void {
    this.lifecycle.track(binding.name, instance, binding.dispose);
    const current = this.registry.find(binding.name);
    if (current?.version === binding.version && this.cells.isAttached(cell)) {
      this.cells.commit(cell, instance, binding.version);
      return;
    }
    cell.state = restingState(cell);
    warn(
      `'${binding.name}' was replaced or unregistered while it was being created; the instance was returned but not cached.`
    );
  }

  // ----- private -----

  private async runShutdown(): Promise<void> {
    try {
      await this.resolverAsync.drain();
      await this.lifecycle.disposeAll();
    } finally {
      this.cells.clear();
      this.registry.teardown();
    }
  }

  private assertOpen(operation: string): void {
    if (this.shuttingDown) throw new ContainerShuttingDownError(this.name, operation);
  }

  private nameOf(ref: unknown, operation: string): BindingName {
    const name = toBindingName(ref);
    if (name === undefined) {
      throw new InvalidBindingError(`${operation}() expects a non-empty binding name or key.`);
    }
    return name;
  }

  /**
   * Evict the cell of `name`, start disposing its instance, then run
   * `install` whether or not the hook failed.
   */
  private evictThen(name: BindingName, install: () => void): void | Promise<void> {
    const evicted = this.cells.evict(name);
    let outcome: void | Promise<void>;
    try {
      outcome = evicted ? this.lifecycle.release(name, evicted.instance) : undefined;
    } finally {
      install();
    }
    return outcome;
  }

  /**
   * @returns the name when the binding is eager
   */
  private registerClass(ctor: Constructor): BindingName | undefined {
    const def = StaticBindingRegistry.getDefinition(ctor);
    if (!def) throw new MissingBindingDecoratorError(ctor.name || 'anonymous');

    const args: RefArg[] = [];
    for (let i = 0; i < def.params.length; i++) {
      const param = def.params[i];
      if (param === undefined) throw new MissingInjectDecoratorError(ctor.name, i);
      args.push(param);
    }

    const { name, scope, dispose, eager } = def.metadata;
    return this.registerDeclaration(name, { scope, dispose, eager, chain: [construct(def.ctor, ...args)] });
  }

  /**
   * @returns the name when the binding is eager
   */
  private registerDeclaration(ref: unknown, options: BindingOptions | undefined): BindingName | undefined {
    const name = this.nameOf(ref, 'register');
    if (!isObject(options)) {
      throw new InvalidBindingError(`register('${name}') needs options with a 'chain'.`);
    }
    const scope: ScopeType = options.scope ?? Scope.Singleton;
    if (!SCOPES.has(scope)) {
      throw new InvalidBindingError(`'${String(scope)}' is not a scope (binding '${name}').`);
    }
    const eager = options.eager ?? false;
    if (eager && scope === Scope.Prototype) {
      throw new InvalidBindingError(`prototype binding '${name}' cannot be eager.`);
    }

    const definition = this.toDefinition(options, `register('${name}')`);
    this.registry.register(name, scope, definition, eager ? FLAG_EAGER : 0);
    return eager ? name : undefined;
  }

  /**
   * Validate chain/configure/dispose and normalize them into a definition.
   */
  private toDefinition(
    options: BindingOptions | ReplacementOptions,
    where: string
  ): BindingDefinition {
    if (!isObject(options)) throw new InvalidBindingError(`${where} needs options with a 'chain'.`);

    const chain: readonly ChainStep[] = options.chain;
    if (!Array.isArray(chain) || chain.length === 0) {
      throw new InvalidBindingError(`${where}: 'chain' must be a non-empty array of steps.`);
    }
    for (let i = 0; i < chain.length; i++) {
      const step: unknown = chain[i];
      const kind = isObject(step) && 'kind' in step ? step.kind : undefined;
      if (kind === 'configure') {
        throw new InvalidBindingError(
          `${where}: chain[${i}] is a configure() step; put it in the 'configure' list.`
        );
      }
      if (IS_DEV && (typeof kind !== 'string' || !CHAIN_KINDS.has(kind))) {
        throw new InvalidBindingError(
          `${where}: chain[${i}] is not a step; build steps with construct(), produce() or invoke().`
        );
      }
    }
    if (chain[0].kind === 'invoke') {
      throw new InvalidBindingError(`${where}: chain must start with construct() or produce().`);
    }

    const configure: readonly ConfigureStep[] = options.configure ?? [];
    if (IS_DEV) {
      if (!Array.isArray(configure)) {
        throw new InvalidBindingError(`${where}: 'configure' must be an array of configure() steps.`);
      }
      configure.forEach((step: unknown, i) => {
        if (!isObject(step) || !('kind' in step) || step.kind !== 'configure') {
          throw new InvalidBindingError(`${where}: configure[${i}] must be built with configure().`);
        }
      });
      this.validateDispose(options.dispose);
    }

    return { chain, configure, dispose: options.dispose };
  }

  private validateDispose(dispose: unknown): void {
    if (dispose === undefined || dispose === false || typeof dispose === 'function') return;
    if (typeof dispose === 'string' && dispose.length > 0) return;
    throw new InvalidBindingError(
      `'dispose' must be a method name, a function or false, got ${String(dispose)}.`
    );
  }
}
