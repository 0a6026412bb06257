/* LifetimeScope
 *
 * A bounded resolution context owning the instances of Scoped registrations.
 *
 * Lifetime interaction:
 *  - Singleton: shared with the container, never stored here
 *  - Scoped: one instance per scope, cached by Registration identity
 *  - Transient: fresh instance every time, never cached
 *
 * Registration calls are forwarded to the parent container; a scope has no
 * registrations of its own. Resolution goes through the container with this
 * scope attached, so factories invoked on behalf of the scope receive the
 * scope as their resolver.
 *
 * Usage example:
 * ```typescript
 * const scope = container.beginScope();
 * try {
 *   const handler = scope.resolve(RequestHandlerT);
 *   handler.handle(request);
 * } finally {
 *   scope.dispose();
 * }
 * ```
 *
 * Instances are not disposed with the scope; the cache is only dropped.
 */

import { ScopeDisposedError } from '../errors/errors.js';
import type {
  Constructor,
  Factory,
  FactoryOptions,
  Key,
  LifetimeType,
  RegisterOptions,
  ResolveOptions,
  Resolver,
} from '../types/types.js';
import type { Container } from './container.js';
import type { OpenClass } from './generics.js';
import type { Registration } from './registration.js';
import type { Collection, Descriptor, OpenToken, ServiceDescriptor } from './token.js';

export class LifetimeScope implements Resolver {
  private disposed = false;

  /**
   * Scoped instances, keyed by the Registration that produced them.
   * Lazily allocated on the first scoped resolution.
   */
  private _cache?: Map<Registration, unknown>;

  constructor(private readonly container: Container) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * @throws {ScopeDisposedError} if the scope has been disposed
   * @internal Used by the resolver
   */
  get cache(): Map<Registration, unknown> {
    if (this.disposed) throw new ScopeDisposedError();
    return (this._cache ??= new Map());
  }

  resolve<T>(service: Collection<T>, options?: ResolveOptions): T[];
  resolve<T>(service: ServiceDescriptor<T>, options?: ResolveOptions): T;
  resolve(service: Descriptor, options?: ResolveOptions): unknown {
    if (this.disposed) throw new ScopeDisposedError();
    return this.container._resolve(service, { ...options, scope: this });
  }

  resolveAll<T>(service: ServiceDescriptor<T>): T[] {
    if (this.disposed) throw new ScopeDisposedError();
    return this.container.resolveAll(service, this);
  }

  /**
   * Resolve `service`, or return undefined when nothing is registered for it.
   * Failures other than a missing registration still propagate.
   */
  tryResolve<T>(service: ServiceDescriptor<T>, options?: ResolveOptions): T | undefined {
    if (this.disposed) throw new ScopeDisposedError();
    return this.container.tryResolve(service, { ...options, scope: this });
  }

  // ---- registration, forwarded to the container ----

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
    if (this.disposed) throw new ScopeDisposedError();
    this.container._register(service, implementation, options);
    return this;
  }

  registerFactory<T>(
    service: ServiceDescriptor<T>,
    factory: Factory<T>,
    options?: LifetimeType | FactoryOptions
  ): this {
    if (this.disposed) throw new ScopeDisposedError();
    this.container.registerFactory(service, factory, options);
    return this;
  }

  registerInstance<T>(service: ServiceDescriptor<T>, instance: T, options?: { key?: Key | null }): this {
    if (this.disposed) throw new ScopeDisposedError();
    this.container.registerInstance(service, instance, options);
    return this;
  }

  /**
   * Drop every scoped instance. Safe to call more than once; any later use of
   * the scope throws ScopeDisposedError.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this._cache?.clear();
    this._cache = undefined;
  }
}
