import { afterEach, describe, expect, it, vi } from 'vitest';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    vi.resetModules();
  });

  it('uses one-line error messages in production', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { Container } = await import('../src/core/container.js');
    const { token } = await import('../src/core/token.js');
    const { Lifetime } = await import('../src/types/types.js');
    const {
      CircularDependencyError,
      ConfigurationError,
      FactoryExecutionError,
      LifetimeViolationError,
      NotRegisteredError,
    } = await import('../src/errors/errors.js');

    const container = new Container();
    const MissingT = token('Missing');
    const SessionT = token('Session');
    container.registerFactory(SessionT, () => ({}), Lifetime.Scoped);

    expect(() => container.resolve(MissingT)).toThrow(NotRegisteredError);
    expect(() => container.resolve(MissingT)).toThrow("Service 'Missing' is not registered.");
    expect(() => container.resolve(SessionT)).toThrow(LifetimeViolationError);

    expect(new NotRegisteredError('Storage', 'C', []).message).toBe(
      "No registration found for service 'Storage' with key 'C'."
    );
    expect(new CircularDependencyError(['A', 'B', 'A']).message).toBe(
      'Circular dependency detected: A → B → A'
    );
    expect(new FactoryExecutionError('Clock', new Error('fail')).message).toBe(
      "Factory for 'Clock' failed during creation."
    );
    expect(new ConfigurationError('bad key').message).toBe(
      'Invalid container configuration: bad key'
    );
    expect(new LifetimeViolationError('Session').message).toBe(
      "Cannot resolve scoped service 'Session' outside of a lifetime scope."
    );
  });
});
