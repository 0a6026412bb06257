import { ConfigurationError } from '../errors/errors.js';
import { isDescriptor, type Descriptor, type ServiceDescriptor } from '../core/token.js';
import type {
  ConstructionPlan,
  ExplicitPlan,
  ParameterPlan,
  ParameterSpec,
  PropertyPlan,
} from '../types/types.js';

/**
 * Sentinel for classes without constructor or property dependencies.
 */
const EMPTY_PARAMS: readonly (ParameterPlan | undefined)[] = Object.freeze([]);
const EMPTY_PROPERTIES: readonly PropertyPlan[] = Object.freeze([]);

/**
 * Mutable record storing decorator metadata for a single class.
 *
 * Fields:
 * - params: parameter index → dependency from @Inject()
 * - properties: property key → dependency from @InjectProperty()
 * - implemented: services declared with @Implements()
 * - abstract: set by @Abstract()
 * - cachedPlan: plan built from decorators only, dropped on every change
 */
type MutableServiceRecord = {
  params: Map<number, { service: Descriptor; name?: string }>;
  properties: Map<string | symbol, Descriptor>;
  implemented: ServiceDescriptor[];
  abstract: boolean;
  cachedPlan?: ConstructionPlan;
};

type GlobalBag = {
  records: WeakMap<object, MutableServiceRecord>;
};

/**
 * Global symbol for storing the registry on globalThis, so the metadata is
 * shared even if the module is bundled more than once.
 */
const GLOBAL_SYMBOL = Symbol.for('wiregraph.staticServiceRegistry');

type GlobalWithRegistry = typeof globalThis & Record<symbol, GlobalBag | undefined>;

function createBag(): GlobalBag {
  return { records: new WeakMap() };
}

function ensureBag(): GlobalBag {
  const g = globalThis as GlobalWithRegistry;
  return (g[GLOBAL_SYMBOL] ??= createBag());
}

/**
 * Classes from `ctor` up to (not including) Function.prototype, base first.
 */
function classChain(ctor: object): object[] {
  const chain: object[] = [];
  let current: unknown = ctor;
  while (typeof current === 'function' && current !== Function.prototype) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

function normalizeParameter(spec: ParameterSpec, index: number): ParameterPlan {
  if (isDescriptor(spec)) return { index, name: String(index), service: spec };
  if (typeof spec === 'object' && spec !== null && isDescriptor(spec.service)) {
    return { index, name: spec.name ?? String(index), service: spec.service };
  }
  throw new ConfigurationError(`inject[${index}] must be a descriptor or { service, name }`);
}

/**
 * Global registry for decorator-based construction metadata.
 *
 * Decorators write into it at class-definition time; the container reads a
 * precomputed {@link ConstructionPlan} once per registration.
 */
export class StaticServiceRegistry {
  /**
   * Record a constructor parameter dependency from @Inject().
   */
  static registerParameter(
    target: object,
    parameterIndex: number,
    service: Descriptor,
    name?: string
  ): void {
    const rec = this.recordFor(target);
    rec.params.set(parameterIndex, { service, name });
    rec.cachedPlan = undefined;
  }

  /**
   * Record an injectable property from @InjectProperty().
   *
   * @param target - The class constructor owning the property
   */
  static registerProperty(target: object, key: string | symbol, service: Descriptor): void {
    const rec = this.recordFor(target);
    rec.properties.set(key, service);
    rec.cachedPlan = undefined;
  }

  static registerImplements(target: object, services: readonly ServiceDescriptor[]): void {
    const rec = this.recordFor(target);
    for (const service of services) {
      if (!rec.implemented.includes(service)) rec.implemented.push(service);
    }
  }

  static markAbstract(target: object): void {
    const rec = this.recordFor(target);
    rec.abstract = true;
    rec.cachedPlan = undefined;
  }

  /**
   * Only the class itself counts; subclasses of an abstract base are concrete.
   */
  static isAbstract(target: object): boolean {
    return this.getBag().records.get(target)?.abstract ?? false;
  }

  /**
   * Services declared with @Implements() on the class and its base classes,
   * own declarations first.
   */
  static getImplementedServices(target: object): ServiceDescriptor[] {
    const bag = this.getBag();
    const out: ServiceDescriptor[] = [];
    for (const klass of classChain(target).reverse()) {
      for (const service of bag.records.get(klass)?.implemented ?? []) {
        if (!out.includes(service)) out.push(service);
      }
    }
    return out;
  }

  /**
   * Build the construction plan of a class.
   *
   * Plans from decorators alone are cached on the class record. An explicit
   * plan replaces the decorated parameters and is merged over the decorated
   * properties.
   */
  static buildPlan(target: object, explicit?: ExplicitPlan): ConstructionPlan {
    const rec = this.getBag().records.get(target);
    const hasExplicit = explicit !== undefined && (explicit.inject || explicit.properties);

    if (!hasExplicit && rec?.cachedPlan) return rec.cachedPlan;

    const plan: ConstructionPlan = Object.freeze({
      params: explicit?.inject
        ? Object.freeze(explicit.inject.map(normalizeParameter))
        : this.computeParams(target),
      properties: this.computeProperties(target, explicit?.properties),
      abstract: rec?.abstract ?? false,
    });

    if (!hasExplicit && rec) rec.cachedPlan = plan;
    return plan;
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ Classes decorated before the reset lose their metadata.
   */
  static resetForTests(): void {
    (globalThis as GlobalWithRegistry)[GLOBAL_SYMBOL] = createBag();
  }

  static getBag(): GlobalBag {
    return ensureBag();
  }

  // ---- internals ----

  private static recordFor(target: object): MutableServiceRecord {
    const bag = this.getBag();
    let rec = bag.records.get(target);
    if (!rec) {
      rec = { params: new Map(), properties: new Map(), implemented: [], abstract: false };
      bag.records.set(target, rec);
    }
    return rec;
  }

  /**
   * Parameter array with length = highest decorated index + 1. Undecorated
   * parameters in between stay `undefined`.
   *
   * A class without decorated parameters of its own takes those of its
   * nearest decorated base class, whose constructor it inherits.
   *
   * Example:
   *   constructor(
   *     @Inject(A) a: A,        // index 0
   *     b: B,                   // index 1 → undefined
   *     @Inject(C, 'c') c: C    // index 2
   *   )
   */
  private static computeParams(target: object): readonly (ParameterPlan | undefined)[] {
    const bag = this.getBag();
    const rec = classChain(target)
      .reverse()
      .map((klass) => bag.records.get(klass))
      .find((r) => r !== undefined && r.params.size > 0);
    if (!rec) return EMPTY_PARAMS;
    let max = -1;
    for (const i of rec.params.keys()) if (i > max) max = i;
    const params = new Array<ParameterPlan | undefined>(max + 1).fill(undefined);
    for (const [index, { service, name }] of rec.params) {
      params[index] = { index, name: name ?? String(index), service };
    }
    return Object.freeze(params);
  }

  private static computeProperties(
    target: object,
    explicit?: Readonly<Record<string, Descriptor>>
  ): readonly PropertyPlan[] {
    const bag = this.getBag();
    const merged = new Map<string | symbol, Descriptor>();

    // Base classes first so subclass declarations win.
    for (const klass of classChain(target)) {
      const rec = bag.records.get(klass);
      if (!rec) continue;
      for (const [key, service] of rec.properties) merged.set(key, service);
    }

    if (explicit) {
      for (const [key, service] of Object.entries(explicit)) {
        if (!isDescriptor(service)) {
          throw new ConfigurationError(`properties.${key} must be a descriptor`);
        }
        merged.set(key, service);
      }
    }

    if (merged.size === 0) return EMPTY_PROPERTIES;
    return Object.freeze(Array.from(merged, ([key, service]) => ({ key, service })));
  }
}
