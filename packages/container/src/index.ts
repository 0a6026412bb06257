export { Container } from './core/container.js';
export { LifetimeScope } from './core/scope.js';
export { ContainerModule, createContainer, defineModule } from './api/module.js';
export type { Module } from './api/module.js';
export { createOpenTokenGroup, createTokenGroup } from './api/token-utils.js';

export { Abstract, Implements, Inject, InjectProperty } from './decorators/index.js';
export { StaticServiceRegistry } from './registry/static-registry.js';

export * from './core/token.js';
export { isOpenClass, openClass } from './core/generics.js';
export type { OpenClass } from './core/generics.js';

export { Lifetime, isConstructor } from './types/types.js';
export type {
  AbstractConstructor,
  ConstructionPlan,
  Constructor,
  ContainerConfig,
  ContainerResolveOptions,
  ExplicitPlan,
  Factory,
  FactoryOptions,
  InterceptionContext,
  Interceptor,
  Key,
  LifetimeType,
  Overrides,
  OverwritePolicy,
  ParameterPlan,
  ParameterSpec,
  PropertyPlan,
  RegisterOptions,
  ResolveOptions,
  Resolver,
  TypeSource,
} from './types/types.js';

// Errors
export {
  CircularDependencyError,
  ConfigurationError,
  ConstructionError,
  FactoryExecutionError,
  LifetimeViolationError,
  NotRegisteredError,
  PropertyInjectionError,
  ScopeDisposedError,
  isContainerError,
} from './errors/errors.js';
