import { beforeEach, describe, expect, it } from 'vitest';

import { Abstract, Implements, Inject, InjectProperty } from '../src/decorators/index.js';
import { all, token } from '../src/core/token.js';
import { ConfigurationError } from '../src/errors/errors.js';
import { StaticServiceRegistry } from '../src/registry/static-registry.js';

describe('Decorators', () => {
  beforeEach(() => {
    StaticServiceRegistry.resetForTests();
  });

  it('@Inject records constructor parameters with optional names', () => {
    const DatabaseT = token('Database');
    const RuleT = token('Rule');

    class OrderService {
      constructor(
        @Inject(DatabaseT) readonly db: unknown,
        @Inject(token('ConnectionString'), 'connectionString') readonly connectionString: string,
        @Inject(all(RuleT)) readonly rules: unknown[]
      ) {}
    }

    const plan = StaticServiceRegistry.buildPlan(OrderService);

    expect(plan.params.map((p) => p?.name)).toEqual(['0', 'connectionString', '2']);
    expect(plan.params[0]?.service).toBe(DatabaseT);
    expect(plan.params[2]?.service).toEqual(all(RuleT));
  });

  it('@Inject rejects non-descriptors and method parameters', () => {
    const DepT = token('Dep');
    class Target {
      method(_dep: unknown): void {}
    }

    expect(() => Inject('not-a-token' as never)).toThrow(ConfigurationError);
    expect(() => Inject(DepT)(Target.prototype, 'method', 0)).toThrow(
      /constructor parameters only/
    );
  });

  it('@InjectProperty records properties on the owning class', () => {
    const LoggerT = token('Logger');

    class Job {
      @InjectProperty(LoggerT)
      logger?: unknown;
    }

    expect(StaticServiceRegistry.buildPlan(Job).properties).toEqual([
      { key: 'logger', service: LoggerT },
    ]);
  });

  it('@InjectProperty rejects static members and non-descriptors', () => {
    const LoggerT = token('Logger');
    class Job {}

    expect(() => InjectProperty(LoggerT)(Job, 'shared')).toThrow(/instance properties only/);
    expect(() => InjectProperty(null as never)).toThrow(ConfigurationError);
  });

  it('@Implements and @Abstract feed assembly scanning metadata', () => {
    const NotifierT = token('Notifier');
    const AuditSinkT = token('AuditSink');

    @Abstract()
    @Implements(AuditSinkT)
    class BaseNotifier {}

    @Implements(NotifierT)
    class EmailNotifier extends BaseNotifier {}

    expect(StaticServiceRegistry.isAbstract(BaseNotifier)).toBe(true);
    expect(StaticServiceRegistry.isAbstract(EmailNotifier)).toBe(false);
    expect(StaticServiceRegistry.getImplementedServices(EmailNotifier)).toEqual([
      NotifierT,
      AuditSinkT,
    ]);
    expect(StaticServiceRegistry.buildPlan(BaseNotifier).abstract).toBe(true);
  });

  it('@Implements rejects non-descriptors', () => {
    expect(() => Implements(token('Ok'), 'bad' as never)).toThrow(/argument 1/);
  });
});
