const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Normalize anything thrown by user code into an Error instance.
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

/**
 * `register()` called with a name that is already bound. The registry is left
 * unchanged.
 */
export class DuplicateBindingError extends Error {
  constructor(
    public bindingName: string,
    public containerName: string
  ) {
    const dev = [
      'Duplicate binding',
      '',
      `Binding '${bindingName}' is already registered in container '${containerName}'.`,
      '',
      'To fix this:',
      `  1. Use replace('${bindingName}', ...) to swap its chain at runtime`,
      `  2. Or unregister('${bindingName}') before registering it again`,
    ];
    super(format(`Binding '${bindingName}' is already registered.`, dev));
    this.name = 'DuplicateBindingError';
  }
}

/**
 * A name that was never registered (or has been unregistered) was referenced.
 */
export class UnknownBindingError extends Error {
  constructor(
    public bindingName: string,
    public available: string[],
    public dependencyChain?: string[]
  ) {
    const parts: string[] = [`Unknown binding '${bindingName}'.`, ''];

    if (dependencyChain && dependencyChain.length > 0) {
      parts.push('Dependency chain:', `  ${dependencyChain.join(' → ')} → ${bindingName}`, '');
    }

    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered bindings:');
      available.forEach((n) => parts.push(`  - ${n}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} bindings are registered.`, '');
    }

    parts.push(
      'To fix this:',
      `  1. Register '${bindingName}' before resolving it`,
      `  2. Check for typos in ref('${bindingName}') or key names`,
      `  3. Mark the reference optional: ref('${bindingName}', { optional: true })`
    );

    super(format(`Unknown binding '${bindingName}'.`, parts));
    this.name = 'UnknownBindingError';
  }
}

/**
 * A binding requires itself, directly or transitively, during one resolution.
 */
export class CircularDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Circular dependency detected: ${cycleStr}`, [
      'Circular dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other bindings.`,
      '',
      'Solutions:',
      `  1. Move one of the references into a configure() step of a different binding`,
      `  2. Extract the shared part into a separate binding`,
    ]);
    super(message);
    this.name = 'CircularDependencyError';
  }
}

/**
 * A configure-phase closure threw. The instance under construction is
 * discarded, not cached.
 */
export class ConfigurationError extends Error {
  constructor(
    public bindingName: string,
    public target: string,
    cause: unknown
  ) {
    const dev = [
      'Configuration failed',
      '',
      `configure('${target}') of binding '${bindingName}' threw. See 'cause' for details.`,
      `The instance of '${bindingName}' was discarded and will be rebuilt on the next resolution.`,
    ];
    super(format(`Configuration of '${bindingName}' failed.`, dev), { cause });
    this.name = 'ConfigurationError';
  }
}

/**
 * A construct/produce/invoke step threw. No partial object is exposed.
 */
export class ConstructionError extends Error {
  constructor(
    public bindingName: string,
    public step: string,
    cause: unknown
  ) {
    const dev = [
      'Construction failed',
      '',
      `Step ${step} of binding '${bindingName}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Construction of '${bindingName}' failed at ${step}.`, dev), { cause });
    this.name = 'ConstructionError';
  }
}

export interface DisposalFailure {
  name: string;
  error: Error;
}

/**
 * One or more dispose hooks threw. Every hook was still attempted; `failures`
 * lists exactly the ones that failed, in the order they ran.
 */
export class DisposalError extends Error {
  public errors: Error[];

  constructor(public failures: DisposalFailure[]) {
    const list = failures.map((f, i) => `  ${i + 1}. ${f.name}: ${f.error.message}`).join('\n');
    const dev = [
      'Disposal failed',
      '',
      `${failures.length} dispose hook(s) failed:`,
      list,
      '',
      'Check the `failures` property for the binding name and error of each failure.',
    ];
    super(format(`${failures.length} disposal error(s) occurred.`, dev));
    this.name = 'DisposalError';
    this.errors = failures.map((f) => f.error);
  }
}

/**
 * An operation was attempted after `shutdown()` began.
 */
export class ContainerShuttingDownError extends Error {
  constructor(
    public containerName: string,
    public operation: string
  ) {
    const dev = [
      `Container '${containerName}' is shutting down.`,
      '',
      `'${operation}' was called after shutdown() began. Shutdown is irreversible;`,
      'create a new container before registering or resolving again.',
    ];
    super(format(`Container '${containerName}' is shutting down.`, dev));
    this.name = 'ContainerShuttingDownError';
  }
}

/**
 * Input rejected by the facade before it reaches the registry.
 */
export class InvalidBindingError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid binding', '', `Invalid binding: ${reason}`];
    super(format(`Invalid binding: ${reason}`, dev));
    this.name = 'InvalidBindingError';
  }
}

export class MissingBindingDecoratorError extends Error {
  constructor(public className: string) {
    const dev = [
      'Missing @Binding decorator',
      '',
      `Class ${className} is not decorated with @Binding().`,
      `Decorate it with @Binding({ name: '...' }) or register it with an explicit chain.`,
    ];
    super(format(`Class ${className} must be decorated with @Binding().`, dev));
    this.name = 'MissingBindingDecoratorError';
  }
}

export class MissingInjectDecoratorError extends Error {
  constructor(
    public className: string,
    public parameterIndex: number
  ) {
    const dev = [
      'Missing @Inject decorator',
      '',
      `Parameter ${parameterIndex} of ${className} is missing an @Inject decorator.`,
      '',
      'Example:',
      `  @Binding({ name: '...' })`,
      `  class ${className} {`,
      `    constructor(@Inject('dependency') private dep: Dependency) {}`,
      `  }`,
    ];
    super(format(`Missing @Inject decorator at parameter ${parameterIndex} of ${className}.`, dev));
    this.name = 'MissingInjectDecoratorError';
  }
}
