const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const chainLines = (target: string, chain?: string[]): string[] =>
  chain && chain.length > 0 ? ['Dependency chain:', `  ${chain.join(' → ')} → ${target}`, ''] : [];

/**
 * Registration-time misuse: open-generic mismatches, null keys or instances,
 * values that are not descriptors, and rejected overwrites.
 */
export class ConfigurationError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid container configuration', '', `  ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'ConfigurationError';
  }
}

/**
 * No registration matches the requested service (and key).
 */
export class NotRegisteredError extends Error {
  constructor(
    public service: string,
    public key: unknown,
    public availableServices: string[],
    public dependencyChain?: string[]
  ) {
    const keyed = key !== undefined && key !== null;
    const headline = keyed
      ? `No registration found for service '${service}' with key '${String(key)}'.`
      : `Service '${service}' is not registered.`;

    const parts: string[] = [headline, '', ...chainLines(service, dependencyChain)];

    if (availableServices.length > 0 && availableServices.length <= 10) {
      parts.push('Registered services:');
      availableServices.forEach((s) => parts.push(`  - ${s}`));
      parts.push('');
    } else if (availableServices.length > 10) {
      parts.push(`${availableServices.length} services are registered.`, '');
    }

    parts.push('To fix this:');
    if (keyed) {
      parts.push(`  1. Register '${service}' with { key: ${String(key)} }`);
      parts.push(`  2. Check the key for typos; keys are compared by value identity`);
    } else {
      parts.push(`  1. Register an implementation with container.register(${service}, Impl)`);
      parts.push(`  2. Abstract classes and tokens are never constructed implicitly`);
    }

    super(format(headline, parts));
    this.name = 'NotRegisteredError';
  }
}

/**
 * A scoped registration was resolved without a scope, or (with lifetime
 * validation enabled) while a singleton was being built.
 */
export class LifetimeViolationError extends Error {
  constructor(
    public service: string,
    public dependencyChain?: string[],
    public captor?: string
  ) {
    const headline = captor
      ? `Singleton '${captor}' cannot depend on scoped service '${service}'.`
      : `Cannot resolve scoped service '${service}' outside of a lifetime scope.`;

    const parts: string[] = [headline, '', ...chainLines(service, dependencyChain)];

    if (captor) {
      parts.push(
        `  A singleton outlives every scope. Capturing '${service}' would leak the`,
        `  first scope's instance into all later resolutions.`,
        '',
        'To fix this:',
        `  1. Change '${captor}' to Scoped or Transient`,
        `  2. Change '${service}' to Singleton`,
        ''
      );
    } else {
      parts.push(
        'To fix this:',
        '  1. Resolve through a scope:',
        '     const scope = container.beginScope();',
        `     scope.resolve(${service});`,
        '  2. Or register the service as Singleton or Transient.',
        ''
      );
    }

    super(format(headline, parts));
    this.name = 'LifetimeViolationError';
  }
}

export class ConstructionError extends Error {
  constructor(
    public implementation: string,
    public reason: string
  ) {
    const dev = [
      'Construction failed',
      '',
      `Cannot construct '${implementation}': ${reason}`,
      '',
      'Register a concrete class, or use registerFactory() / registerInstance().',
    ];
    super(format(`Cannot construct '${implementation}': ${reason}`, dev));
    this.name = 'ConstructionError';
  }
}

export class PropertyInjectionError extends Error {
  constructor(
    public implementation: string,
    public property: string,
    public service: string,
    cause: unknown
  ) {
    const dev = [
      'Property injection failed',
      '',
      `Property '${property}' of '${implementation}' requires '${service}', which could not be resolved.`,
      `See 'cause' for details.`,
    ];
    super(
      format(`Cannot inject property '${property}' of '${implementation}'.`, dev),
      { cause }
    );
    this.name = 'PropertyInjectionError';
  }
}

/**
 * Circular dependency detected error
 */
export class CircularDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Circular dependency detected: ${cycleStr}`, [
      'Circular dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other services.`,
      '',
      'Common causes:',
      `  1. Constructor injection creates a cycle`,
      `  2. An injected property points back at its owner`,
      `  3. A factory resolves the service it is registered for`,
      '',
      'Solutions:',
      `  1. Extract shared logic into a separate service`,
      `  2. Resolve one side lazily through a factory that captures the container`,
    ]);
    super(message);
    this.name = 'CircularDependencyError';
  }
}

export class FactoryExecutionError extends Error {
  constructor(
    public service: string,
    cause: unknown
  ) {
    const dev = [
      'Factory execution failed',
      '',
      `Factory for '${service}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Factory for '${service}' failed during creation.`, dev), {
      cause: cause,
    });
    this.name = 'FactoryExecutionError';
  }
}

export class ScopeDisposedError extends Error {
  constructor() {
    const dev = [
      'Scope disposed',
      '',
      'Lifetime scope has been disposed. Begin a new scope with container.beginScope().',
    ];
    super(format('Lifetime scope has been disposed.', dev));
    this.name = 'ScopeDisposedError';
  }
}

const CONTAINER_ERRORS = [
  ConfigurationError,
  NotRegisteredError,
  LifetimeViolationError,
  ConstructionError,
  PropertyInjectionError,
  CircularDependencyError,
  FactoryExecutionError,
  ScopeDisposedError,
] as const;

/**
 * True for errors raised by the container itself. Such errors pass through
 * factories and property injection without being wrapped again.
 */
export function isContainerError(error: unknown): boolean {
  return CONTAINER_ERRORS.some((ErrorClass) => error instanceof ErrorClass);
}
