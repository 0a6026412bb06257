/* Activator
 *
 * Materializes a Registration into a runtime value. Two paths:
 *  - factory-backed registrations: `factory(resolver)`, no reflection at all
 *  - class-backed registrations: constructor arguments from the construction
 *    plan (or overrides), then property injection
 *
 * Both paths end with the container's interceptors, applied in order.
 *
 * Notes
 *  - JavaScript classes have exactly one constructor, so there is no
 *    constructor selection; the plan describes that constructor.
 *  - Overrides address parameters by name and only ever reach the frame that
 *    received them. Nested dependencies are resolved without overrides.
 *  - Errors raised by the container itself pass through factories and
 *    property injection unwrapped.
 */

import {
  CircularDependencyError,
  ConstructionError,
  FactoryExecutionError,
  PropertyInjectionError,
  isContainerError,
} from '../errors/errors.js';
import type {
  ConstructionPlan,
  Constructor,
  InterceptionContext,
  Interceptor,
  Overrides,
  PropertyPlan,
} from '../types/types.js';
import type { Container } from './container.js';
import { FLAG_HAS_NO_DEPS } from './flags.js';
import type { Registration } from './registration.js';
import type { LifetimeScope } from './scope.js';
import { describeDescriptor } from './token.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

const hasOwn = (o: object, key: string) => Object.prototype.hasOwnProperty.call(o, key);

/**
 * Whether assigning `key` on `target` would take effect: a writable data
 * property or an accessor with a setter, found on the object or up its
 * prototype chain. Undeclared keys are writable on extensible objects.
 */
function isWritable(target: object, key: string | symbol): boolean {
  let current: object | null = target;
  while (current !== null) {
    const desc = Object.getOwnPropertyDescriptor(current, key);
    if (desc) return 'value' in desc ? desc.writable === true : desc.set !== undefined;
    current = Object.getPrototypeOf(current);
  }
  return Object.isExtensible(target);
}

export interface ActivatorOptions {
  interceptors: readonly Interceptor[];
  onInstantiate?: (service: string, durationNs: number) => void;
}

export class Activator {
  constructor(
    private readonly container: Container,
    private readonly options: ActivatorOptions
  ) {}

  /**
   * Build a fresh value for `reg`.
   *
   * @throws {FactoryExecutionError} when a factory throws a non-container error
   * @throws {ConstructionError} when the implementation cannot be constructed
   * @throws {PropertyInjectionError} when an injectable property cannot be resolved
   */
  instantiate(reg: Registration, scope?: LifetimeScope, overrides?: Overrides): unknown {
    const value = this.instrument(reg.label, () =>
      reg.factory ? this.invokeFactory(reg, scope) : this.construct(reg, scope, overrides)
    );
    return this.intercept(value, reg);
  }

  /**
   * Wrap instantiation with the onInstantiate hook, when one is configured.
   * The hook never replaces the built value or the construction error.
   */
  private instrument<T>(service: string, execute: () => T): T {
    const hook = this.options.onInstantiate;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      try {
        hook(service, toNs(nowMs() - start));
      } catch (e) {
        console.warn(`[wiregraph] onInstantiate hook failed for '${service}':`, e);
      }
    }
  }

  private invokeFactory(reg: Registration, scope?: LifetimeScope): unknown {
    const factory = reg.factory;
    if (!factory) throw new ConstructionError(reg.label, 'registration has no factory');
    try {
      return factory(scope ?? this.container);
    } catch (e) {
      // Preserve container errors raised by nested resolutions
      if (isContainerError(e)) throw e;
      throw new FactoryExecutionError(reg.label, e);
    }
  }

  private construct(reg: Registration, scope?: LifetimeScope, overrides?: Overrides): unknown {
    const ctor = reg.implementation;
    const plan = reg.plan;
    if (!ctor || !plan) {
      throw new ConstructionError(reg.label, 'registration has no implementation');
    }
    const name = describeDescriptor(ctor);

    if (typeof ctor !== 'function' || ctor.prototype === undefined || plan.abstract) {
      throw new ConstructionError(name, 'no public constructor');
    }

    // Zero-dependency fast path
    if (reg.flags & FLAG_HAS_NO_DEPS) return new ctor();

    const instance: unknown = new ctor(...this.buildArguments(ctor, plan, name, scope, overrides));
    if (plan.properties.length > 0 && typeof instance === 'object' && instance !== null) {
      this.injectProperties(instance, plan.properties, name, scope);
    }
    return instance;
  }

  private buildArguments(
    ctor: Constructor,
    plan: ConstructionPlan,
    name: string,
    scope?: LifetimeScope,
    overrides?: Overrides
  ): unknown[] {
    const arity = Math.max(plan.params.length, ctor.length);
    const args = new Array<unknown>(arity);

    for (let i = 0; i < arity; i++) {
      const param = plan.params[i];
      const paramName = param?.name ?? String(i);

      if (overrides !== undefined && hasOwn(overrides, paramName)) {
        args[i] = overrides[paramName];
        continue;
      }
      if (param === undefined) {
        throw new ConstructionError(
          name,
          `constructor parameter #${i} has no declared dependency (use @Inject() or pass an override named '${paramName}')`
        );
      }
      args[i] = this.container._resolve(param.service, { scope });
    }
    return args;
  }

  private injectProperties(
    instance: object,
    properties: readonly PropertyPlan[],
    name: string,
    scope?: LifetimeScope
  ): void {
    for (const { key, service } of properties) {
      if (!isWritable(instance, key)) continue;

      let value: unknown;
      try {
        value = this.container._resolve(service, { scope });
      } catch (e) {
        if (e instanceof CircularDependencyError || e instanceof PropertyInjectionError) throw e;
        throw new PropertyInjectionError(name, String(key), describeDescriptor(service), e);
      }
      Reflect.set(instance, key, value);
    }
  }

  private intercept(value: unknown, reg: Registration): unknown {
    const interceptors = this.options.interceptors;
    if (interceptors.length === 0) return value;

    const context: InterceptionContext = {
      service: reg.label,
      lifetime: reg.lifetime,
      key: reg.key,
      implementation: reg.implementation,
    };
    let out = value;
    for (const interceptor of interceptors) out = interceptor(out, context);
    return out;
  }
}
