import type { BindingName } from '../core/key.js';
import { Scope, type BindingMetadata, type Constructor, type RefArg, type StaticBindingDefinition } from '../types/types.js';

/**
 * Sentinel for classes with zero constructor references.
 */
const EMPTY_PARAMS: readonly (RefArg | undefined)[] = Object.freeze([]);

/**
 * Mutable record storing decorator metadata for a single class.
 *
 * Fields:
 * - metadata: binding name, scope, dispose hook from @Binding()
 * - links: parameter index → reference from @Inject()
 * - cachedDef: precomputed StaticBindingDefinition
 * - decorated: false while only @Inject() has run for this class
 */
type MutableRecord = {
  metadata: BindingMetadata;
  links: Map<number, RefArg>;
  cachedDef?: StaticBindingDefinition;
  decorated: boolean;
};

type RegistryBag = {
  records: WeakMap<Constructor, MutableRecord>;
};

/**
 * Global symbol for storing the static registry on globalThis.
 *
 * Keeps a single registry per process even if the module is loaded twice
 * (two copies in node_modules, mixed bundling).
 */
const GLOBAL_SYMBOL = Symbol.for('chrysalis.staticBindingRegistry');

function createBag(): RegistryBag {
  return { records: new WeakMap() };
}

function isRegistryBag(value: unknown): value is RegistryBag {
  return (
    typeof value === 'object' &&
    value !== null &&
    'records' in value &&
    value.records instanceof WeakMap
  );
}

function ensureBag(): RegistryBag {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isRegistryBag(existing)) return existing;
  const fresh = createBag();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Global registry for decorator-based binding metadata.
 *
 * Architecture:
 * - Decorators call registerBinding() / registerInject() at module load time
 * - Container calls getDefinition() when a decorated class is registered
 * - Definitions are computed lazily and cached until the record changes
 */
export class StaticBindingRegistry {
  /**
   * Record metadata from @Binding(). Re-registration (hot reload) replaces
   * the metadata and drops the cached definition.
   */
  static registerBinding(target: Constructor, metadata: BindingMetadata): void {
    const bag = ensureBag();
    const rec = bag.records.get(target);
    if (!rec) {
      bag.records.set(target, { metadata, links: new Map(), decorated: true });
      return;
    }
    rec.metadata = metadata;
    rec.decorated = true;
    rec.cachedDef = undefined;
  }

  /**
   * Record a constructor parameter reference from @Inject().
   *
   * Parameter decorators run before the class decorator, so the first call
   * for a class creates a placeholder record that @Binding() completes.
   */
  static registerInject(target: Constructor, parameterIndex: number, arg: RefArg): void {
    const bag = ensureBag();
    let rec = bag.records.get(target);
    if (!rec) {
      rec = {
        metadata: { name: target.name as BindingName, scope: Scope.Singleton, eager: false },
        links: new Map(),
        decorated: false,
      };
      bag.records.set(target, rec);
    }
    rec.links.set(parameterIndex, arg);
    rec.cachedDef = undefined;
  }

  /**
   * Definition for a class decorated with @Binding(), or undefined.
   */
  static getDefinition(ctor: Constructor): StaticBindingDefinition | undefined {
    const rec = ensureBag().records.get(ctor);
    if (!rec || !rec.decorated) return undefined;
    return rec.cachedDef ?? (rec.cachedDef = this.buildDef(ctor, rec));
  }

  /**
   * ⚠️ For test environments only. Drops every recorded class.
   */
  static resetForTests(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createBag());
  }

  // ---- internals ----

  /**
   * Parameters array of length max(declared arity, highest @Inject index + 1);
   * holes are parameters without @Inject().
   *
   *   constructor(@Inject(A) a: A, b: B, @Inject(C) c: C)
   *   → [ref(A), undefined, ref(C)]
   */
  private static buildDef(ctor: Constructor, rec: MutableRecord): StaticBindingDefinition {
    let params = EMPTY_PARAMS;
    let max = ctor.length - 1;
    for (const i of rec.links.keys()) if (i > max) max = i;
    if (max >= 0) {
      const out: (RefArg | undefined)[] = [];
      for (let i = 0; i <= max; i++) out.push(rec.links.get(i));
      params = Object.freeze(out);
    }
    return Object.freeze({ ctor, metadata: rec.metadata, params });
  }
}
