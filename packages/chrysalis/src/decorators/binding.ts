import { toBindingName, type BindingRef } from '../core/key.js';
import { InvalidBindingError } from '../errors/errors.js';
import { StaticBindingRegistry } from '../registry/static-registry.js';
import { Scope, type BindingMetadata, type Constructor, type DisposeHook, type ScopeType } from '../types/types.js';

/**
 * Environment check for production mode.
 * Skips metadata freezing in production.
 */
const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

export interface BindingDecoratorOptions {
  /** Binding name or key this class is registered under (required) */
  name: BindingRef;
  /** @default Scope.Singleton */
  scope?: ScopeType;
  dispose?: DisposeHook;
  eager?: boolean;
}

/**
 * Marks a class as registrable with `container.register(Class)`.
 *
 * Records the binding name, scope and dispose hook in the
 * StaticBindingRegistry at module load time. Constructor parameters must
 * each carry an @Inject() decorator.
 *
 * @example
 * ```typescript
 * @Binding({ name: 'service' })
 * class Service {
 *   constructor(@Inject('counter') private counter: Counter) {}
 * }
 *
 * @Binding({ name: LoggerK, scope: Scope.Prototype })
 * class Logger {}
 * ```
 */
export function Binding(options: BindingDecoratorOptions) {
  const name = toBindingName(options?.name);
  if (name === undefined) {
    throw new InvalidBindingError(
      "@Binding() requires a name. Pass { name: 'service' } or { name: key<Service>('service') }."
    );
  }

  return (target: Constructor): void => {
    const metadata: BindingMetadata = {
      name,
      scope: options.scope ?? Scope.Singleton,
      dispose: options.dispose,
      eager: options.eager ?? false,
    };

    if (!isProd) Object.freeze(metadata);

    StaticBindingRegistry.registerBinding(target, metadata);
  };
}
