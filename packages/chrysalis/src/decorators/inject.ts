import type { BindingRef } from '../core/key.js';
import { StaticBindingRegistry } from '../registry/static-registry.js';
import { ref } from '../steps/steps.js';
import type { Constructor } from '../types/types.js';

/**
 * Parameter decorator for constructor references.
 *
 * Every constructor parameter of a @Binding() class needs one; the container
 * builds the class with `construct(Class, ...refs)` in parameter order.
 * emitDecoratorMetadata is not used, so nothing is inferred from types.
 *
 * @example
 * ```typescript
 * @Binding({ name: 'checkout' })
 * class Checkout {
 *   constructor(
 *     @Inject(GatewayK) private gateway: Gateway,
 *     @Inject('audit', { optional: true }) private audit?: AuditLog
 *   ) {}
 * }
 * ```
 */
export function Inject<T>(target: BindingRef<T>, opts?: { optional?: boolean }) {
  const arg = ref(target, opts);
  return (ctor: Constructor, _propertyKey: string | symbol | undefined, parameterIndex: number): void => {
    StaticBindingRegistry.registerInject(ctor, parameterIndex, arg);
  };
}
