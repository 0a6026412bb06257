/* LifetimeResolver
 *
 * Lifetime policy around construction. Responsibilities:
 *  - Return realized singletons before anything else, with no side effects.
 *  - Require a scope for Scoped registrations and use its cache.
 *  - Detect circular dependencies on the container's resolution stack.
 *  - Optionally reject scoped services captured by a singleton.
 *  - Delegate materialization to `Activator.instantiate`.
 *
 * Lifetime handling:
 *  - Singleton: instance stored on the Registration, committed only after a
 *    successful construction so a failure can be retried
 *  - Scoped: instance stored in LifetimeScope.cache
 *  - Transient: fresh instance every time, no caching
 *
 * The stack is owned by the container and shared by every nested resolve,
 * including the ones a factory makes through its resolver, so cycles that
 * pass through factories are reported too.
 */

import { CircularDependencyError, LifetimeViolationError } from '../errors/errors.js';
import type { Overrides } from '../types/types.js';
import type { Activator } from './activator.js';
import {
  FLAG_HAS_INSTANCE,
  LIFETIME_MASK,
  LIFETIME_SCOPED,
  LIFETIME_SINGLETON,
} from './flags.js';
import type { Registration } from './registration.js';
import type { LifetimeScope } from './scope.js';

export interface ResolverOptions {
  validateLifetimes: boolean;
}

function sameRegistration(a: Registration, b: Registration): boolean {
  return a === b || (a.service === b.service && a.key === b.key);
}

export class LifetimeResolver {
  constructor(
    private readonly activator: Activator,
    private readonly stack: Registration[],
    private readonly options: ResolverOptions
  ) {}

  /**
   * Resolve one registration.
   *
   * @param overrides - Constructor arguments by parameter name, for this frame only
   * @throws {LifetimeViolationError} Scoped without a scope, or captured by a singleton
   * @throws {CircularDependencyError} if the registration is already being built
   */
  fromRegistration(reg: Registration, scope?: LifetimeScope, overrides?: Overrides): unknown {
    const lifetime = reg.flags & LIFETIME_MASK;

    // Fast path: realized singleton
    if (lifetime === LIFETIME_SINGLETON && reg.flags & FLAG_HAS_INSTANCE) {
      return reg.instance;
    }

    let scopeCache: Map<Registration, unknown> | undefined;
    if (lifetime === LIFETIME_SCOPED) {
      if (!scope) throw new LifetimeViolationError(reg.label, this.chain());
      if (this.options.validateLifetimes) this.assertNotCaptured(reg);

      scopeCache = scope.cache;
      if (scopeCache.has(reg)) return scopeCache.get(reg);
    }

    const at = this.stack.findIndex((r) => sameRegistration(r, reg));
    if (at !== -1) {
      const cycle = this.stack.slice(at).map((r) => r.label);
      throw new CircularDependencyError([...cycle, reg.label]);
    }

    this.stack.push(reg);
    try {
      const value = this.activator.instantiate(reg, scope, overrides);

      if (lifetime === LIFETIME_SINGLETON) {
        reg.instance = value;
        reg.flags |= FLAG_HAS_INSTANCE;
      } else if (scopeCache) {
        scopeCache.set(reg, value);
      }

      return value;
    } finally {
      this.stack.pop();
    }
  }

  /** Labels of the registrations currently being built, outermost first. */
  chain(): string[] {
    return this.stack.map((r) => r.label);
  }

  private assertNotCaptured(reg: Registration): void {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const consumer = this.stack[i];
      if (consumer !== undefined && (consumer.flags & LIFETIME_MASK) === LIFETIME_SINGLETON) {
        throw new LifetimeViolationError(reg.label, this.chain(), consumer.label);
      }
    }
  }
}
