import { describe, expect, it } from 'vitest';

import {
  CircularDependencyError,
  ConfigurationError,
  ConstructionError,
  FactoryExecutionError,
  LifetimeViolationError,
  NotRegisteredError,
  PropertyInjectionError,
  ScopeDisposedError,
  isContainerError,
} from '../src/errors/errors.js';

describe('error classes', () => {
  it('provides contextual error messages and properties', () => {
    const circular = new CircularDependencyError(['A', 'B', 'A']);
    expect(circular.cycle).toEqual(['A', 'B', 'A']);
    expect(circular.name).toBe('CircularDependencyError');
    expect(circular.message).toContain('A → B → A');

    const notFound = new NotRegisteredError('Service', undefined, ['Alpha', 'Beta'], ['Foo', 'Bar']);
    expect(notFound.service).toBe('Service');
    expect(notFound.availableServices).toEqual(['Alpha', 'Beta']);
    expect(notFound.dependencyChain).toEqual(['Foo', 'Bar']);
    expect(notFound.message).toContain("Service 'Service' is not registered.");
    expect(notFound.message).toContain('Foo → Bar → Service');
    expect(notFound.message).toContain('  - Alpha');

    const keyed = new NotRegisteredError('Storage', 'C', []);
    expect(keyed.key).toBe('C');
    expect(keyed.message).toContain("No registration found for service 'Storage' with key 'C'.");

    const many = new NotRegisteredError('Huge', undefined, new Array(11).fill('X'));
    expect(many.message).toContain('11 services are registered.');

    const config = new ConfigurationError('registration key must not be null');
    expect(config.reason).toBe('registration key must not be null');
    expect(config.message).toContain('registration key must not be null');

    const construction = new ConstructionError('Base', 'no public constructor');
    expect(construction.implementation).toBe('Base');
    expect(construction.message).toContain("Cannot construct 'Base': no public constructor");
  });

  it('distinguishes missing scope from captive dependencies', () => {
    const noScope = new LifetimeViolationError('Session', ['Handler']);
    expect(noScope.captor).toBeUndefined();
    expect(noScope.message).toContain(
      "Cannot resolve scoped service 'Session' outside of a lifetime scope."
    );

    const captive = new LifetimeViolationError('Session', ['Cache'], 'Cache');
    expect(captive.captor).toBe('Cache');
    expect(captive.message).toContain("Singleton 'Cache' cannot depend on scoped service 'Session'.");
  });

  it('preserves causes on wrapping errors', () => {
    const cause = new Error('boom');

    const factory = new FactoryExecutionError('Clock', cause);
    expect(factory.service).toBe('Clock');
    expect(factory.cause).toBe(cause);

    const property = new PropertyInjectionError('Job', 'logger', 'Logger', cause);
    expect(property.property).toBe('logger');
    expect(property.service).toBe('Logger');
    expect(property.cause).toBe(cause);
  });

  it('identifies container errors', () => {
    expect(isContainerError(new ScopeDisposedError())).toBe(true);
    expect(isContainerError(new ConfigurationError('x'))).toBe(true);
    expect(isContainerError(new Error('plain'))).toBe(false);
    expect(isContainerError('string')).toBe(false);
  });
});
