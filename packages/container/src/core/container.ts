import { ConfigurationError, NotRegisteredError, ScopeDisposedError } from '../errors/errors.js';
import { StaticServiceRegistry } from '../registry/static-registry.js';
import type { Module } from '../api/module.js';
import {
  isConstructor,
  isLifetime,
  Lifetime,
  type Constructor,
  type ContainerConfig,
  type ContainerResolveOptions,
  type Factory,
  type FactoryOptions,
  type Interceptor,
  type Key,
  type LifetimeType,
  type OverwritePolicy,
  type RegisterOptions,
  type Resolver,
  type TypeSource,
} from '../types/types.js';
import { Activator } from './activator.js';
import { FLAG_HAS_INSTANCE, LIFETIME_MASK, LIFETIME_SINGLETON } from './flags.js';
import { isOpenClass, type OpenClass } from './generics.js';
import {
  createRegistration,
  registrationLabel,
  RegistrationStore,
  type Registration,
  type RegistrationService,
} from './registration.js';
import { LifetimeResolver } from './resolver.js';
import { LifetimeScope } from './scope.js';
import {
  all,
  describeDescriptor,
  isCollection,
  isOpenToken,
  isServiceDescriptor,
  type Collection,
  type Descriptor,
  type OpenToken,
  type ServiceDescriptor,
} from './token.js';

const OVERWRITE_POLICIES: readonly OverwritePolicy[] = ['allow', 'warn', 'error'];

type NormalizedConfig = Readonly<{
  name: string;
  interceptors: readonly Interceptor[];
  onInstantiate?: (service: string, durationNs: number) => void;
  overwritePolicy: OverwritePolicy;
  cacheClosedGenerics: boolean;
  validateLifetimes: boolean;
  modules: readonly Module[];
}>;

/**
 * Normalize a key from the public API. `undefined` means unkeyed; `null`
 * is only meaningful at resolve time, where it also means unkeyed.
 */
function normalizeResolveKey(key: Key | null | undefined): Key | undefined {
  return key === null ? undefined : key;
}

function isIterable(x: object): x is Iterable<unknown> {
  return typeof (x as Partial<Iterable<unknown>>)[Symbol.iterator] === 'function';
}

/*
 * Container: registration store plus resolution engine.
 *
 * Registration and resolution are synchronous and run on the single
 * JavaScript thread, so a resolve call never interleaves with another call or
 * with a registration. Re-entrant calls made by factories share the
 * container's resolution stack.
 *
 * Lookup order for an unkeyed request:
 *  1. exact registration
 *  2. open-generic registration closed over the requested type arguments
 *  3. implicit Transient self-registration of a concrete class
 * A keyed request only ever matches its exact keyed registration.
 */
export class Container implements Resolver {
  readonly store: RegistrationStore;
  readonly activator: Activator;
  readonly resolver: LifetimeResolver;

  /** Registrations being built by the current resolve call, outermost first. */
  private readonly stack: Registration[] = [];
  private readonly loadedModules = new WeakSet<Module>();
  private readonly cfg: NormalizedConfig;

  constructor(config?: ContainerConfig) {
    this.cfg = this._validateAndFreezeConfig(config);

    this.store = new RegistrationStore(this.cfg.cacheClosedGenerics);
    this.activator = new Activator(this, {
      interceptors: this.cfg.interceptors,
      onInstantiate: this.cfg.onInstantiate,
    });
    this.resolver = new LifetimeResolver(this.activator, this.stack, {
      validateLifetimes: this.cfg.validateLifetimes,
    });

    for (const module of this.cfg.modules) this.registerModule(module);
  }

  getName(): string {
    return this.cfg.name;
  }

  // ----- registration -----

  /**
   * Map a service to an implementation class.
   *
   * `options` is a lifetime, or an object with the lifetime, a key and an
   * explicit construction plan. The default lifetime is Transient.
   *
   * @throws {ConfigurationError} on a null key, a non-class implementation, or
   *   an open/closed generic mismatch
   *
   * @example
   * ```typescript
   * container
   *   .register(LoggerT, ConsoleLogger, Lifetime.Singleton)
   *   .register(StorageT, DiskStorage, { key: 'disk' })
   *   .register(RepositoryT, RepositoryImpl, Lifetime.Scoped);
   * ```
   */
  register<T>(
    service: ServiceDescriptor<T>,
    implementation: Constructor<T>,
    options?: LifetimeType | RegisterOptions
  ): this;
  register(service: OpenToken, implementation: OpenClass, options?: LifetimeType | RegisterOptions): this;
  register(
    service: ServiceDescriptor | OpenToken,
    implementation: Constructor | OpenClass,
    options?: LifetimeType | RegisterOptions
  ): this {
    this._register(service, implementation, options);
    return this;
  }

  /**
   * Map a service to a factory. The factory receives the active scope when
   * one is in effect, the container otherwise.
   *
   * @example
   * ```typescript
   * container.registerFactory(ClockT, () => new SystemClock(), Lifetime.Singleton);
   * container.registerFactory(MailerT, (r) => new Mailer(r.resolve(ConfigT).smtp));
   * ```
   */
  registerFactory<T>(
    service: ServiceDescriptor<T>,
    factory: Factory<T>,
    options?: LifetimeType | FactoryOptions
  ): this {
    if (!isServiceDescriptor(service)) {
      throw new ConfigurationError(
        `registerFactory() expects a token or a class, got ${describeDescriptor(service)}`
      );
    }
    if (typeof factory !== 'function') {
      throw new ConfigurationError(`factory for '${describeDescriptor(service)}' must be a function`);
    }
    const { lifetime, key } = this._normalizeOptions(options);

    this._add(createRegistration({ service, key, lifetime, factory }));
    return this;
  }

  /**
   * Register a pre-built value as a realized singleton.
   *
   * @throws {ConfigurationError} if `instance` is null or undefined
   */
  registerInstance<T>(service: ServiceDescriptor<T>, instance: T, options?: { key?: Key | null }): this {
    if (!isServiceDescriptor(service)) {
      throw new ConfigurationError(
        `registerInstance() expects a token or a class, got ${describeDescriptor(service)}`
      );
    }
    if (instance === null || instance === undefined) {
      throw new ConfigurationError(`instance for '${describeDescriptor(service)}' must not be ${String(instance)}`);
    }
    const { key } = this._normalizeOptions(options);

    this._add(
      createRegistration({ service, key, lifetime: Lifetime.Singleton, instance, preset: true })
    );
    return this;
  }

  /**
   * Register every concrete class of `source` that passes `predicate` under
   * the services it declares with @Implements(). A service that already has
   * an unkeyed registration is left alone, so the first match wins.
   *
   * @param source - An iterable of candidates, or a module namespace object
   *
   * @example
   * ```typescript
   * import * as handlers from './handlers/index.js';
   * container.registerAssemblyTypes(handlers, (type) => type.name.endsWith('Handler'));
   * ```
   */
  registerAssemblyTypes(source: TypeSource, predicate: (type: Constructor) => boolean = () => true): this {
    if (typeof source !== 'object' || source === null) {
      throw new ConfigurationError('registerAssemblyTypes() expects an iterable or a module namespace');
    }
    const candidates = isIterable(source) ? Array.from(source) : Object.values(source);

    for (const candidate of candidates) {
      if (!isConstructor(candidate) || StaticServiceRegistry.isAbstract(candidate)) continue;
      if (!predicate(candidate)) continue;

      for (const service of StaticServiceRegistry.getImplementedServices(candidate)) {
        if (this.store.has(service)) continue;
        this._add(
          createRegistration({ service, lifetime: Lifetime.Transient, implementation: candidate })
        );
      }
    }
    return this;
  }

  /**
   * Apply a module's registrations. Loading the same module object twice is
   * a no-op.
   */
  registerModule(module: Module): this {
    if (typeof module !== 'object' || module === null || typeof module.load !== 'function') {
      throw new ConfigurationError('registerModule() expects an object with a load(container) method');
    }
    if (this.loadedModules.has(module)) return this;
    this.loadedModules.add(module);
    module.load(this);
    return this;
  }

  // ----- resolution -----

  /**
   * Begin a lifetime scope for Scoped registrations.
   *
   * @example
   * ```typescript
   * const scope = container.beginScope();
   * try {
   *   scope.resolve(UnitOfWorkT).commit();
   * } finally {
   *   scope.dispose();
   * }
   * ```
   */
  beginScope(): LifetimeScope {
    return new LifetimeScope(this);
  }

  /**
   * Resolve a service, or every registration of one with `all(T)`.
   *
   * @param options.key - Select a keyed registration; no fallback on a miss
   * @param options.overrides - Constructor arguments by parameter name,
   *   applied to the requested service only
   * @param options.scope - Scope for Scoped registrations
   *
   * @throws {NotRegisteredError} If nothing serves the service (and key)
   * @throws {LifetimeViolationError} If a Scoped service is resolved without a scope
   * @throws {CircularDependencyError} If the graph contains a cycle
   * @throws {ConstructionError} If the implementation cannot be constructed
   *
   * @example
   * ```typescript
   * const db = container.resolve(DatabaseT, { overrides: { connectionString: 'memory://' } });
   * const rules = container.resolve(all(RuleT));
   * ```
   */
  resolve<T>(service: Collection<T>, options?: ContainerResolveOptions): T[];
  resolve<T>(service: ServiceDescriptor<T>, options?: ContainerResolveOptions): T;
  resolve(service: Descriptor, options?: ContainerResolveOptions): unknown {
    return this._resolve(service, options);
  }

  /**
   * Every registration of `service`: the unkeyed one (when lookup finds
   * one), then all keyed ones. Never throws for absence.
   */
  resolveAll<T>(service: ServiceDescriptor<T>, scope?: LifetimeScope): T[] {
    return this.resolve(all(service), { scope });
  }

  /**
   * Resolve `service`, or return undefined when nothing serves it. Failures
   * other than a missing registration still propagate.
   */
  tryResolve<T>(service: ServiceDescriptor<T>, options?: ContainerResolveOptions): T | undefined {
    if (!this.canResolve(service, options?.key)) return undefined;
    return this.resolve(service, options);
  }

  /**
   * Core resolution flow: collection -> lookup -> lifetime policy.
   *
   * @internal Used by scopes and the activator
   */
  _resolve(service: Descriptor, options?: ContainerResolveOptions): unknown {
    const scope = options !== undefined ? options.scope : undefined;
    if (scope !== undefined && scope.isDisposed) throw new ScopeDisposedError();

    if (isCollection(service)) return this._resolveCollection(service, scope);

    if (!isServiceDescriptor(service)) {
      throw new ConfigurationError(
        `resolve() expects a token, a class or all(...), got ${describeDescriptor(service)}`
      );
    }

    const key = normalizeResolveKey(options?.key);
    const reg = this.store.lookup(service, key);
    if (reg === undefined) throw this.buildNotFoundError(service, key);

    return this.resolver.fromRegistration(reg, scope, options?.overrides);
  }

  private _resolveCollection(collection: Collection, scope?: LifetimeScope): unknown[] {
    const out: unknown[] = [];

    // Only a missing default is skipped; its failures are not.
    const unkeyed = this.store.lookup(collection.element);
    if (unkeyed !== undefined) out.push(this.resolver.fromRegistration(unkeyed, scope));

    for (const reg of this.store.keyed(collection.element)) {
      out.push(this.resolver.fromRegistration(reg, scope));
    }
    return out;
  }

  // ----- diagnostics -----

  /**
   * Whether an explicit registration exists. Closed generics served by an
   * open registration and implicit self-registrations are not counted.
   */
  isRegistered(service: ServiceDescriptor | OpenToken, key?: Key | null): boolean {
    return this.store.has(service, normalizeResolveKey(key));
  }

  /**
   * Whether resolve() would find a registration, including closed generics
   * and implicit self-registrations. Does not construct anything.
   */
  canResolve(service: ServiceDescriptor, key?: Key | null): boolean {
    if (!isServiceDescriptor(service)) return false;
    return this.store.lookup(service, normalizeResolveKey(key)) !== undefined;
  }

  /**
   * Labels of all explicitly registered services, sorted.
   *
   * @example
   * ```typescript
   * container.getRegisteredServices();
   * // => ['Clock', 'IRepository<>', 'Logger']
   * ```
   */
  getRegisteredServices(): string[] {
    return this.store
      .services()
      .map((s) => describeDescriptor(s))
      .sort();
  }

  /**
   * Snapshot of realized singletons, by registration label.
   *
   * Lazy singletons that have not been resolved yet do not appear. Labels
   * shared by distinct registrations get a ` #2`, ` #3`, ... suffix in
   * registration order.
   */
  getSingletons(): Map<string, unknown> {
    const out = new Map<string, unknown>();
    const seen = new Map<string, number>();
    for (const reg of this.store.registrations()) {
      const count = (seen.get(reg.label) ?? 0) + 1;
      seen.set(reg.label, count);
      if ((reg.flags & LIFETIME_MASK) === LIFETIME_SINGLETON && reg.flags & FLAG_HAS_INSTANCE) {
        out.set(count === 1 ? reg.label : `${reg.label} #${count}`, reg.instance);
      }
    }
    return out;
  }

  /**
   * Forget realized singletons so the next resolve builds them again.
   * Instances supplied with registerInstance() are kept.
   */
  clear(): void {
    for (const reg of this.store.registrations()) {
      if (reg.preset) continue;
      if (reg.flags & FLAG_HAS_INSTANCE) {
        reg.instance = undefined;
        reg.flags &= ~FLAG_HAS_INSTANCE;
      }
    }
  }

  buildNotFoundError(service: ServiceDescriptor, key?: Key): NotRegisteredError {
    return new NotRegisteredError(
      describeDescriptor(service),
      key,
      this.getRegisteredServices(),
      this.resolver.chain()
    );
  }

  // ----- registration helpers -----

  /**
   * Validate and store a class registration.
   *
   * @internal Used by register() and LifetimeScope.register()
   */
  _register(
    service: ServiceDescriptor | OpenToken,
    implementation: Constructor | OpenClass,
    options?: LifetimeType | RegisterOptions
  ): void {
    const { lifetime, key } = this._normalizeOptions(options);
    const explicit =
      typeof options === 'object' ? { inject: options.inject, properties: options.properties } : undefined;

    if (isOpenToken(service)) {
      if (!isOpenClass(implementation)) {
        throw new ConfigurationError(
          `open generic service '${describeDescriptor(service)}' requires an open class implementation`
        );
      }
      if (implementation.arity !== service.arity) {
        throw new ConfigurationError(
          `'${implementation.label}' takes ${implementation.arity} type argument(s) but '${describeDescriptor(service)}' takes ${service.arity}`
        );
      }
      if (key !== undefined) {
        throw new ConfigurationError(
          `open generic service '${describeDescriptor(service)}' cannot be registered with a key`
        );
      }
      this._add(createRegistration({ service, lifetime, openImplementation: implementation, explicit }));
      return;
    }

    if (!isServiceDescriptor(service)) {
      throw new ConfigurationError(
        `register() expects a token, a class or an open token, got ${describeDescriptor(service)}`
      );
    }
    if (isOpenClass(implementation)) {
      throw new ConfigurationError(
        `open class '${implementation.label}' can only implement an open generic service, not '${describeDescriptor(service)}'`
      );
    }
    if (typeof implementation !== 'function') {
      throw new ConfigurationError(
        `implementation of '${describeDescriptor(service)}' must be a class, got ${String(implementation)}`
      );
    }

    this._add(createRegistration({ service, key, lifetime, implementation, explicit }));
  }

  private _add(reg: Registration): void {
    const existing = this.store.get(reg.service, reg.key);
    if (existing) this._enforceOverwritePolicy(reg.service, reg.key);

    if (reg.key === undefined) this.store.set(reg.service, reg);
    else this.store.setKeyed(reg.service, reg.key, reg);
  }

  private _enforceOverwritePolicy(service: RegistrationService, key?: Key): void {
    const label = registrationLabel(service, key);
    switch (this.cfg.overwritePolicy) {
      case 'error':
        throw new ConfigurationError(
          `'${label}' is already registered in container '${this.cfg.name}' (overwritePolicy: 'error')`
        );
      case 'warn':
        console.warn(`[wiregraph] Container '${this.cfg.name}': registration of '${label}' replaced an existing one.`);
        break;
      case 'allow':
        break;
    }
  }

  private _normalizeOptions(options?: LifetimeType | FactoryOptions | { key?: Key | null }): {
    lifetime: LifetimeType;
    key?: Key;
  } {
    if (options === undefined) return { lifetime: Lifetime.Transient };

    if (typeof options === 'string') {
      if (!isLifetime(options)) throw new ConfigurationError(`unknown lifetime '${String(options)}'`);
      return { lifetime: options };
    }

    if (typeof options !== 'object' || options === null) {
      throw new ConfigurationError('registration options must be a lifetime or an options object');
    }

    if ('key' in options && options.key === null) {
      throw new ConfigurationError('registration key must not be null');
    }

    const lifetime = 'lifetime' in options && options.lifetime !== undefined ? options.lifetime : Lifetime.Transient;
    if (!isLifetime(lifetime)) throw new ConfigurationError(`unknown lifetime '${String(lifetime)}'`);

    return { lifetime, key: options.key ?? undefined };
  }

  private _validateAndFreezeConfig(config?: ContainerConfig): NormalizedConfig {
    if (config !== undefined && (typeof config !== 'object' || config === null)) {
      throw new ConfigurationError('container config must be an object');
    }

    const interceptors = config?.interceptors ?? [];
    if (!Array.isArray(interceptors) || interceptors.some((i) => typeof i !== 'function')) {
      throw new ConfigurationError('interceptors must be an array of functions');
    }

    const overwritePolicy = config?.overwritePolicy ?? 'allow';
    if (!OVERWRITE_POLICIES.includes(overwritePolicy)) {
      throw new ConfigurationError(`unknown overwritePolicy '${String(overwritePolicy)}'`);
    }

    if (config?.onInstantiate !== undefined && typeof config.onInstantiate !== 'function') {
      throw new ConfigurationError('onInstantiate must be a function');
    }

    return Object.freeze({
      name: config?.name ?? 'Container',
      interceptors: Object.freeze([...interceptors]),
      onInstantiate: config?.onInstantiate,
      overwritePolicy,
      cacheClosedGenerics: config?.cacheClosedGenerics ?? true,
      validateLifetimes: config?.validateLifetimes ?? false,
      modules: Object.freeze([...(config?.modules ?? [])]),
    });
  }
}
