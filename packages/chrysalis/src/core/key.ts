/**
 * Branded type for binding names.
 * Prevents accidental use of arbitrary strings where a validated name is expected.
 */
export type BindingName = string & { __brand: 'BindingName' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates keys with their resolved value type without runtime overhead.
 */
declare const KEY_BRAND: unique symbol;

/**
 * Type-safe binding key.
 *
 * A key is a thin, frozen handle around a binding name that carries the
 * resolved value type at compile time. Anywhere a key is accepted, the plain
 * string name is accepted as well.
 *
 * @template T - The type of value this key resolves to
 */
export interface Key<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'key';

  /** Binding name the key points at */
  readonly name: BindingName;

  /** Human-readable label for diagnostics (defaults to the name) */
  readonly label: string;

  /** Phantom type brand - associates key with its value type */
  readonly [KEY_BRAND]: T;
}

/**
 * Anything that names a binding: a typed key or its raw string name.
 */
export type BindingRef<T = unknown> = Key<T> | string;

/**
 * Create a typed binding key.
 *
 * Two keys created with the same name refer to the
 * same binding: the name is the identity.
 *
 * @example
 * ```typescript
 * const CounterK = key<Counter>('counter');
 * container.register(CounterK, { chain: [construct(Counter)] });
 * const counter = container.resolve(CounterK); // Counter
 * ```
 */
export function key<T = unknown>(name: string, label?: string): Key<T> {
  const k = Object.freeze({
    kind: 'key',
    name: name as BindingName,
    label: label ?? name,
  });
  return k as Key<T>;
}

/**
 * Runtime type guard to check if a value is a valid Key.
 */
export function isKey(x: unknown): x is Key<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    'kind' in x &&
    x.kind === 'key' &&
    'name' in x &&
    typeof x.name === 'string' &&
    'label' in x &&
    typeof x.label === 'string'
  );
}

/**
 * Normalize a key or raw string into a binding name.
 *
 * Returns `undefined` for anything that cannot name a binding (empty strings,
 * non-string values) so callers can raise their own validation error.
 */
export function toBindingName(ref: unknown): BindingName | undefined {
  if (isKey(ref)) return ref.name.trim().length > 0 ? ref.name : undefined;
  if (typeof ref === 'string' && ref.trim().length > 0) return ref as BindingName;
  return undefined;
}
