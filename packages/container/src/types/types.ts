import type { Module } from '../api/module.js';
import type { LifetimeScope } from '../core/scope.js';
import type { Collection, Descriptor, ServiceDescriptor } from '../core/token.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Constructor signature that also admits `abstract` classes. Abstract classes
 * may be used as service descriptors but never as implementations.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = any> = abstract new (...args: any[]) => T;

/**
 * Supported lifetimes for registrations.
 *
 *   - **Transient**: New instance for every resolution (default)
 *   - **Singleton**: One instance per container, shared by every scope
 *   - **Scoped**: One instance per lifetime scope
 *
 * Internally converted to bit flags once, at registration time.
 *
 * @example
 * ```typescript
 * container.register(SessionT, Session, Lifetime.Scoped);
 * container.register(ConfigT, Config, { lifetime: Lifetime.Singleton });
 * ```
 */
export const Lifetime = {
  /** Fresh instance for every resolution - never cached */
  Transient: 'transient',
  /** Single instance per container - shared across all resolutions */
  Singleton: 'singleton',
  /** Instance confined to a lifetime scope */
  Scoped: 'scoped',
} as const;

export type LifetimeType = (typeof Lifetime)[keyof typeof Lifetime];
export type Lifetime = LifetimeType;

/**
 * Convert a lifetime string to its bit flag value.
 *
 *   - 'singleton' → 0b00 (LIFETIME_SINGLETON)
 *   - 'scoped'    → 0b01 (LIFETIME_SCOPED)
 *   - 'transient' → 0b10 (LIFETIME_TRANSIENT)
 *
 * @internal
 */
export function lifetimeToFlag(lifetime: LifetimeType): number {
  switch (lifetime) {
    case 'singleton':
      return 0b00;
    case 'scoped':
      return 0b01;
    case 'transient':
      return 0b10;
  }
}

export function isLifetime(value: unknown): value is LifetimeType {
  return value === Lifetime.Transient || value === Lifetime.Singleton || value === Lifetime.Scoped;
}

/**
 * A function that can be called with `new`. Arrow functions and methods have
 * no prototype and are rejected.
 */
export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Key distinguishing several registrations of one service. Compared with
 * `Map` semantics (SameValueZero).
 */
export type Key = string | number | bigint | boolean | symbol | object;

/** Constructor arguments supplied by parameter name, used verbatim. */
export type Overrides = Readonly<Record<string, unknown>>;

/**
 * One constructor parameter of an explicit plan. A bare descriptor gets its
 * positional name ("0", "1", ...).
 */
export type ParameterSpec = Descriptor | { service: Descriptor; name?: string };

/**
 * Construction plan declared on a registration instead of (or on top of)
 * decorators. `inject` replaces decorated parameters; `properties` is merged
 * over decorated properties.
 */
export interface ExplicitPlan {
  inject?: readonly ParameterSpec[];
  properties?: Readonly<Record<string, Descriptor>>;
}

export interface RegisterOptions extends ExplicitPlan {
  lifetime?: LifetimeType;
  key?: Key | null;
}

export interface FactoryOptions {
  lifetime?: LifetimeType;
  key?: Key | null;
}

export interface ResolveOptions {
  key?: Key | null;
  overrides?: Overrides;
}

export interface ContainerResolveOptions extends ResolveOptions {
  scope?: LifetimeScope;
}

/**
 * Resolution capability handed to factories: the active scope when one is
 * in effect, the container otherwise.
 */
export interface Resolver {
  resolve<T>(service: Collection<T>, options?: ResolveOptions): T[];
  resolve<T>(service: ServiceDescriptor<T>, options?: ResolveOptions): T;
  resolveAll<T>(service: ServiceDescriptor<T>): T[];
  tryResolve<T>(service: ServiceDescriptor<T>, options?: ResolveOptions): T | undefined;
}

export type Factory<T = unknown> = (resolver: Resolver) => T;

export interface ParameterPlan {
  readonly index: number;
  readonly name: string;
  readonly service: Descriptor;
}

export interface PropertyPlan {
  readonly key: string | symbol;
  readonly service: Descriptor;
}

/**
 * Everything needed to build an instance, computed once per registration.
 *
 * `params` may contain holes for parameters nobody declared; those fail at
 * construction time unless an override names them.
 */
export interface ConstructionPlan {
  readonly params: readonly (ParameterPlan | undefined)[];
  readonly properties: readonly PropertyPlan[];
  readonly abstract: boolean;
}

export interface InterceptionContext {
  readonly service: string;
  readonly lifetime: LifetimeType;
  readonly key?: Key;
  readonly implementation?: Constructor;
}

/**
 * Post-construction transform. Receives every freshly built instance and
 * returns the value handed to callers (and cached).
 */
export type Interceptor = (instance: unknown, context: InterceptionContext) => unknown;

export type OverwritePolicy = 'allow' | 'warn' | 'error';

/**
 * Candidate classes for assembly scanning: any iterable, or a module
 * namespace object (`import * as services from './services.js'`).
 */
export type TypeSource = Iterable<unknown> | Readonly<Record<string, unknown>>;

export interface ContainerConfig {
  /**
   * Optional name for debugging and error messages.
   *
   * @default 'Container'
   */
  name?: string;

  /** Post-construction transforms, applied in order. */
  interceptors?: Interceptor[];

  /**
   * Optional hook invoked after an instance is built.
   *
   * Receives the service label and the construction duration in nanoseconds.
   * Errors thrown by the hook are logged with `console.warn` and do not
   * affect the resolution.
   */
  onInstantiate?: (service: string, durationNs: number) => void;

  /**
   * What to do when a registration replaces one for the same service and key.
   * - 'allow' (default): last write wins
   * - 'warn': last write wins, with a console warning
   * - 'error': throw ConfigurationError
   */
  overwritePolicy?: OverwritePolicy;

  /**
   * Reuse the registration synthesized for a closed generic service. When
   * false every lookup closes the open registration again, so closed
   * singletons and scoped instances are not shared between lookups.
   *
   * @default true
   */
  cacheClosedGenerics?: boolean;

  /**
   * Reject scoped services resolved while a singleton is being built.
   *
   * @default false
   */
  validateLifetimes?: boolean;

  /** Modules loaded, in order, when the container is created. */
  modules?: Module[];
}
