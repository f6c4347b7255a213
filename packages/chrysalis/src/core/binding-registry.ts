/*
 * BindingRegistry
 * ---------------
 * Authoritative map from binding name to its current Binding value.
 *
 * Responsibilities
 *  - enforce name uniqueness at register()
 *  - hand out the current Binding by name (lookup) with a helpful error
 *  - swap a binding's definition atomically (replace) or stage one for a
 *    later cutover (stage / promote)
 *  - remove bindings (unregister)
 *
 * Design notes
 *  - Binding values are frozen and never mutated. replace() builds a new
 *    Binding with a fresh version and swaps the map entry, so a resolution
 *    that already read the old value keeps a consistent chain.
 *  - Versions come from one counter per registry. A name that is
 *    unregistered and registered again never reuses a version, which keeps
 *    stale cells from matching.
 *  - The registry never constructs objects and never touches cells.
 */
import { DuplicateBindingError, UnknownBindingError } from '../errors/errors.js';
import {
  scopeToFlag,
  type ChainStep,
  type ConfigureStep,
  type DisposeHook,
  type ScopeType,
} from '../types/types.js';
import { FLAG_HAS_CONFIGURE, SCOPE_MASK } from './flags.js';
import type { BindingName } from './key.js';

/**
 * The replaceable part of a binding.
 */
export type BindingDefinition = {
  readonly chain: readonly ChainStep[];
  readonly configure: readonly ConfigureStep[];
  readonly dispose: DisposeHook | undefined;
};

/**
 * Registered binding.
 *
 * Notes on fields:
 *  - flags: scope bit + configure/eager/value bits (see flags.ts)
 *  - version: identifies this exact definition; bumps on every replace
 */
export type Binding = BindingDefinition & {
  readonly name: BindingName;
  readonly scope: ScopeType;
  readonly flags: number;
  readonly version: number;
};

export class BindingRegistry {
  private readonly bindings = new Map<BindingName, Binding>();

  /** Deferred replacements waiting for refresh(). */
  private readonly staged = new Map<BindingName, BindingDefinition>();

  private versionCounter = 0;
  private active = false;

  constructor(private readonly containerName: string) {}

  /**
   * Number of registered bindings.
   */
  get size(): number {
    return this.bindings.size;
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Called once by the container on construction. */
  init(): void {
    this.active = true;
  }

  /** Called once by the container at the end of shutdown. */
  teardown(): void {
    this.bindings.clear();
    this.staged.clear();
    this.active = false;
  }

  /**
   * Register a new binding.
   *
   * @throws DuplicateBindingError if `name` is already registered
   */
  register(
    name: BindingName,
    scope: ScopeType,
    definition: BindingDefinition,
    extraFlags = 0
  ): Binding {
    if (this.bindings.has(name)) {
      throw new DuplicateBindingError(name, this.containerName);
    }
    const binding = this.build(name, scope, definition, extraFlags);
    this.bindings.set(name, binding);
    return binding;
  }

  /**
   * Current binding for `name`.
   *
   * @param chain - names being resolved on the current call, for diagnostics
   * @throws UnknownBindingError if `name` is not registered
   */
  lookup(name: BindingName, chain?: string[]): Binding {
    const binding = this.bindings.get(name);
    if (binding === undefined) throw new UnknownBindingError(name, this.names(), chain);
    return binding;
  }

  find(name: BindingName): Binding | undefined {
    return this.bindings.get(name);
  }

  has(name: BindingName): boolean {
    return this.bindings.has(name);
  }

  /**
   * Swap the definition of `name`, keeping its scope. Clears any staged
   * definition.
   *
   * @returns the previous and the new binding
   * @throws UnknownBindingError if `name` is not registered
   */
  replace(name: BindingName, definition: BindingDefinition): { previous: Binding; next: Binding } {
    const previous = this.lookup(name);
    const next = this.build(name, previous.scope, definition, previous.flags & ~SCOPE_MASK);
    this.bindings.set(name, next);
    this.staged.delete(name);
    return { previous, next };
  }

  /**
   * Stage a definition for a later promote().
   *
   * @returns true when an earlier staged definition was overwritten
   * @throws UnknownBindingError if `name` is not registered
   */
  stage(name: BindingName, definition: BindingDefinition): boolean {
    this.lookup(name);
    const overwritten = this.staged.has(name);
    this.staged.set(name, definition);
    return overwritten;
  }

  hasStaged(name: BindingName): boolean {
    return this.staged.has(name);
  }

  /**
   * Install the staged definition of `name`, if any.
   *
   * @returns the new binding, or undefined when nothing was staged
   * @throws UnknownBindingError if `name` is not registered
   */
  promote(name: BindingName): Binding | undefined {
    this.lookup(name);
    const definition = this.staged.get(name);
    if (definition === undefined) return undefined;
    return this.replace(name, definition).next;
  }

  /**
   * Remove `name` together with any staged definition.
   *
   * @throws UnknownBindingError if `name` is not registered
   */
  unregister(name: BindingName): Binding {
    const binding = this.lookup(name);
    this.bindings.delete(name);
    this.staged.delete(name);
    return binding;
  }

  /**
   * Registered names, sorted.
   */
  names(): BindingName[] {
    return Array.from(this.bindings.keys()).sort();
  }

  private build(
    name: BindingName,
    scope: ScopeType,
    definition: BindingDefinition,
    extraFlags: number
  ): Binding {
    const configureFlag = definition.configure.length > 0 ? FLAG_HAS_CONFIGURE : 0;
    return Object.freeze({
      name,
      scope,
      chain: Object.freeze([...definition.chain]),
      configure: Object.freeze([...definition.configure]),
      dispose: definition.dispose,
      flags: scopeToFlag(scope) | (extraFlags & ~FLAG_HAS_CONFIGURE) | configureFlag,
      version: ++this.versionCounter,
    });
  }
}
