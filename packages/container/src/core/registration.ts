/*
 * RegistrationStore
 * -----------------
 * Per-container registry mapping service descriptors to Registrations:
 *  - service -> unkeyed Registration (at most one, last write wins)
 *  - service -> key -> keyed Registration (insertion order of first write)
 *
 * lookup() is the only place that synthesizes registrations. Two kinds exist:
 *  - closed generics: an open registration closed over the requested type
 *    arguments, cached per closed token unless the container disables it
 *  - implicit self-registrations: a concrete class requested by itself,
 *    Transient, cached per class and never reported as registered
 */
import { StaticServiceRegistry } from '../registry/static-registry.js';
import {
  isConstructor,
  lifetimeToFlag,
  type ConstructionPlan,
  type Constructor,
  type ExplicitPlan,
  type Factory,
  type Key,
  type LifetimeType,
} from '../types/types.js';
import { FLAG_HAS_INSTANCE, FLAG_HAS_NO_DEPS } from './flags.js';
import type { OpenClass } from './generics.js';
import {
  describeDescriptor,
  isToken,
  type OpenToken,
  type ServiceDescriptor,
  type Token,
} from './token.js';

/** Anything a registration can be stored under. */
export type RegistrationService = ServiceDescriptor | OpenToken;

/**
 * How to produce one service.
 *
 * Exactly one of `implementation`, `openImplementation` or `factory` is set,
 * except for pre-supplied instances which carry only `instance`.
 */
export type Registration = {
  service: RegistrationService;
  key?: Key;
  /** Service label plus key, used in diagnostics */
  label: string;
  lifetime: LifetimeType;
  implementation?: Constructor;
  openImplementation?: OpenClass;
  /** Explicit plan kept for the classes closed from `openImplementation` */
  explicit?: ExplicitPlan;
  factory?: Factory;
  plan?: ConstructionPlan;
  instance?: unknown;
  /** Set by registerInstance(); survives container.clear() */
  preset?: boolean;
  flags: number;
};

type RegistrationInit = Omit<Registration, 'label' | 'flags' | 'plan'> & { plan?: ConstructionPlan };

export function registrationLabel(service: RegistrationService, key?: Key): string {
  const label = describeDescriptor(service);
  return key === undefined ? label : `${label} [${String(key)}]`;
}

/**
 * Build a Registration and precompute its flags and construction plan.
 */
export function createRegistration(init: RegistrationInit): Registration {
  const plan =
    init.plan ??
    (init.implementation ? StaticServiceRegistry.buildPlan(init.implementation, init.explicit) : undefined);

  let flags = lifetimeToFlag(init.lifetime);
  if (init.preset) flags |= FLAG_HAS_INSTANCE;
  if (
    init.implementation &&
    plan &&
    !plan.abstract &&
    plan.params.length === 0 &&
    plan.properties.length === 0 &&
    init.implementation.length === 0
  ) {
    flags |= FLAG_HAS_NO_DEPS;
  }

  return { ...init, label: registrationLabel(init.service, init.key), plan, flags };
}

function isConcreteClass(x: unknown): x is Constructor {
  return isConstructor(x) && !StaticServiceRegistry.isAbstract(x);
}

export class RegistrationStore {
  private readonly unkeyed = new Map<RegistrationService, Registration>();
  private readonly keyedBuckets = new Map<RegistrationService, Map<Key, Registration>>();

  /** Closed token -> registration synthesized from its open registration */
  private readonly closed = new Map<Token, Registration>();

  /** Class -> implicit Transient self-registration */
  private readonly implicit = new WeakMap<object, Registration>();

  constructor(private readonly cacheClosedGenerics = true) {}

  /**
   * Number of explicit registrations, keyed ones included.
   */
  get size(): number {
    let n = this.unkeyed.size;
    for (const bucket of this.keyedBuckets.values()) n += bucket.size;
    return n;
  }

  /**
   * Store the unkeyed registration of `service`, returning the one it replaced.
   */
  set(service: RegistrationService, registration: Registration): Registration | undefined {
    const previous = this.unkeyed.get(service);
    this.unkeyed.set(service, registration);

    // Closed registrations of a replaced open registration are stale.
    if (!isToken(service) && typeof service !== 'function') {
      for (const closedToken of this.closed.keys()) {
        if (closedToken.generic?.definition === service) this.closed.delete(closedToken);
      }
    }
    return previous;
  }

  /**
   * Store a keyed registration. Replacing a key keeps its enumeration position.
   */
  setKeyed(service: RegistrationService, key: Key, registration: Registration): Registration | undefined {
    let bucket = this.keyedBuckets.get(service);
    if (!bucket) {
      bucket = new Map();
      this.keyedBuckets.set(service, bucket);
    }
    const previous = bucket.get(key);
    bucket.set(key, registration);
    return previous;
  }

  /**
   * Exact match only, no synthesis.
   */
  get(service: RegistrationService, key?: Key): Registration | undefined {
    if (key === undefined) return this.unkeyed.get(service);
    return this.keyedBuckets.get(service)?.get(key);
  }

  has(service: RegistrationService, key?: Key): boolean {
    return this.get(service, key) !== undefined;
  }

  /**
   * Find the registration that serves `service`.
   *
   * Keyed lookups never fall back: a miss is a miss. Unkeyed lookups try the
   * exact registration, then an open registration for a closed generic token,
   * then an implicit self-registration for a concrete class.
   */
  lookup(service: ServiceDescriptor, key?: Key): Registration | undefined {
    if (key !== undefined) return this.keyedBuckets.get(service)?.get(key);

    const exact = this.unkeyed.get(service);
    if (exact) return exact;

    if (isToken(service)) return service.generic ? this.closeGeneric(service) : undefined;

    if (!isConcreteClass(service)) return undefined;
    let reg = this.implicit.get(service);
    if (!reg) {
      reg = createRegistration({ service, lifetime: 'transient', implementation: service });
      this.implicit.set(service, reg);
    }
    return reg;
  }

  /**
   * Keyed registrations of `service`, in enumeration order.
   */
  keyed(service: ServiceDescriptor): Registration[] {
    const bucket = this.keyedBuckets.get(service);
    return bucket ? Array.from(bucket.values()) : [];
  }

  /**
   * Distinct services with at least one explicit registration.
   */
  services(): RegistrationService[] {
    const out = new Set<RegistrationService>(this.unkeyed.keys());
    for (const [service, bucket] of this.keyedBuckets) {
      if (bucket.size > 0) out.add(service);
    }
    return Array.from(out);
  }

  /**
   * Every registration that can hold a singleton: explicit ones and cached
   * closed generics.
   */
  *registrations(): IterableIterator<Registration> {
    yield* this.unkeyed.values();
    for (const bucket of this.keyedBuckets.values()) yield* bucket.values();
    yield* this.closed.values();
  }

  // ---- internals ----

  private closeGeneric(closedToken: Token): Registration | undefined {
    const generic = closedToken.generic;
    if (!generic) return undefined;

    if (this.cacheClosedGenerics) {
      const cached = this.closed.get(closedToken);
      if (cached) return cached;
    }

    const open = this.unkeyed.get(generic.definition);
    if (!open?.openImplementation) return undefined;

    // Lifetime carries over; the singleton slot does not.
    const reg = createRegistration({
      service: closedToken,
      lifetime: open.lifetime,
      implementation: open.openImplementation.close(...generic.args),
      explicit: open.explicit,
    });

    if (this.cacheClosedGenerics) this.closed.set(closedToken, reg);
    return reg;
  }
}
