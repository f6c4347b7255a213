export { Container } from './core/container.js';
export { createKeyGroup } from './api/key-utils.js';
export { isKey, key, type BindingName, type BindingRef, type Key } from './core/key.js';

export { construct, configure, invoke, literal, produce, ref } from './steps/steps.js';

export { Binding, type BindingDecoratorOptions } from './decorators/binding.js';
export { Inject } from './decorators/inject.js';
export { StaticBindingRegistry } from './registry/static-registry.js';

export { CellState, ReplacePolicy, Scope } from './types/types.js';
export type {
  BindingDeclaration,
  BindingMetadata,
  BindingOptions,
  CellStateType,
  ChainStep,
  ConfigureStep,
  ConstructStep,
  Constructor,
  ContainerConfig,
  DisposeHook,
  Factory,
  InstantiateHook,
  InvokeStep,
  LiteralArg,
  ProduceStep,
  RefArg,
  ReplacementOptions,
  ReplacePolicyType,
  ScopeType,
  StaticBindingDefinition,
  Step,
} from './types/types.js';

// Errors
export {
  CircularDependencyError,
  ConfigurationError,
  ConstructionError,
  ContainerShuttingDownError,
  DisposalError,
  DuplicateBindingError,
  InvalidBindingError,
  MissingBindingDecoratorError,
  MissingInjectDecoratorError,
  UnknownBindingError,
  type DisposalFailure,
} from './errors/errors.js';
