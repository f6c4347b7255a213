import { key, type Key } from '../core/key.js';

/**
 * Create several keys at once under a shared prefix. Each key is named
 * `${prefix}.${member}`.
 *
 * The values of `shape` are only read for their types.
 *
 * @example
 * ```typescript
 * const Billing = createKeyGroup('billing', {
 *   gateway: null as unknown as PaymentGateway,
 *   ledger: null as unknown as Ledger,
 * });
 * // Billing.gateway: Key<PaymentGateway>, named 'billing.gateway'
 * ```
 */
export function createKeyGroup<T extends Record<string, unknown>>(
  prefix: string,
  shape: T
): { [K in keyof T & string]: Key<T[K]> } {
  const result = {} as { [K in keyof T & string]: Key<T[K]> };

  (Object.keys(shape) as Array<keyof T & string>).forEach((member) => {
    result[member] = key<T[typeof member]>(`${prefix}.${member}`, member);
  });

  return result;
}
