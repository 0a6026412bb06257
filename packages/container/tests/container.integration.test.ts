import { describe, expect, it, vi } from 'vitest';

import { Container } from '../src/core/container.js';
import { openClass } from '../src/core/generics.js';
import { all, openToken, token } from '../src/core/token.js';
import { Inject, InjectProperty } from '../src/decorators/index.js';
import {
  CircularDependencyError,
  LifetimeViolationError,
  NotRegisteredError,
} from '../src/errors/errors.js';
import { Lifetime } from '../src/types/types.js';

interface Greeter {
  greet(): string;
}

class EnglishGreeter implements Greeter {
  greet() {
    return 'hello';
  }
}

describe('Container integration', () => {
  it('resolves an unkeyed registration to its implementation', () => {
    const GreeterT = token<Greeter>('Greeter');
    const container = new Container().register(GreeterT, EnglishGreeter);

    const greeter = container.resolve(GreeterT);

    expect(greeter).toBeInstanceOf(EnglishGreeter);
    expect(greeter.greet()).toBe('hello');
  });

  it('creates a fresh transient on every resolve', () => {
    const GreeterT = token<Greeter>('Greeter');
    const container = new Container().register(GreeterT, EnglishGreeter, Lifetime.Transient);

    expect(container.resolve(GreeterT)).not.toBe(container.resolve(GreeterT));
  });

  it('shares singletons and returns pre-registered instances unchanged', () => {
    const GreeterT = token<Greeter>('Greeter');
    const ConfigT = token<{ region: string }>('Config');
    const config = { region: 'eu-west' };

    const container = new Container()
      .register(GreeterT, EnglishGreeter, Lifetime.Singleton)
      .registerInstance(ConfigT, config);

    expect(container.resolve(GreeterT)).toBe(container.resolve(GreeterT));
    expect(container.resolve(ConfigT)).toBe(config);
    expect(container.resolve(ConfigT)).toBe(config);
  });

  it('confines scoped instances to their scope', () => {
    class Session {}
    const SessionT = token<Session>('Session');
    const container = new Container().register(SessionT, Session, Lifetime.Scoped);

    const first = container.beginScope();
    const second = container.beginScope();

    expect(first.resolve(SessionT)).toBe(first.resolve(SessionT));
    expect(first.resolve(SessionT)).not.toBe(second.resolve(SessionT));
    expect(() => container.resolve(SessionT)).toThrow(LifetimeViolationError);
  });

  it('selects keyed registrations and never falls back on a keyed miss', () => {
    interface Storage {
      readonly kind: string;
    }
    class DiskStorage implements Storage {
      readonly kind = 'disk';
    }
    class MemoryStorage implements Storage {
      readonly kind = 'memory';
    }
    const StorageT = token<Storage>('Storage');

    const container = new Container()
      .register(StorageT, DiskStorage, { key: 'A' })
      .register(StorageT, MemoryStorage, { key: 'B' });

    expect(container.resolve(StorageT, { key: 'A' })).toBeInstanceOf(DiskStorage);
    expect(container.resolve(StorageT, { key: 'B' })).toBeInstanceOf(MemoryStorage);
    expect(() => container.resolve(StorageT, { key: 'C' })).toThrow(NotRegisteredError);
    expect(() => container.resolve(StorageT)).toThrow(NotRegisteredError);
    expect(() => container.resolve(DiskStorage, { key: 'A' })).toThrow(NotRegisteredError);
  });

  it('closes open generic registrations on demand', () => {
    class Customer {}
    class Database {}
    interface Repository {
      readonly entity: unknown;
      readonly db: Database;
    }

    const RepositoryT = openToken('IRepository', 1);
    const DatabaseT = token<Database>('Database');
    const RepositoryImpl = openClass('Repository', 1, (entity) => {
      class Repository {
        readonly entity = entity;
        constructor(@Inject(DatabaseT) readonly db: Database) {}
      }
      return Repository;
    });

    const container = new Container()
      .register(DatabaseT, Database, Lifetime.Singleton)
      .register(RepositoryT, RepositoryImpl);

    const repo = container.resolve(RepositoryT.close<Repository>(Customer));

    expect(repo).toBeInstanceOf(RepositoryImpl.close(Customer));
    expect(repo.entity).toBe(Customer);
    expect(repo.db).toBe(container.resolve(DatabaseT));
  });

  it('aggregates unkeyed and keyed registrations into a collection', () => {
    interface Rule {
      readonly id: string;
    }
    class RuleA implements Rule {
      readonly id = 'a';
    }
    class RuleB implements Rule {
      readonly id = 'b';
    }
    class RuleC implements Rule {
      readonly id = 'c';
    }
    const RuleT = token<Rule>('Rule');
    const NoneT = token<Rule>('None');

    const container = new Container()
      .register(RuleT, RuleA)
      .register(RuleT, RuleB, { key: 'b' })
      .register(RuleT, RuleC, { key: 'c' });

    const rules = container.resolve(all(RuleT));

    expect(rules).toHaveLength(3);
    expect(rules.map((r) => r.id)).toEqual(['a', 'b', 'c']);
    expect(container.resolve(all(NoneT))).toEqual([]);
  });

  it('uses overrides verbatim for the named constructor parameter', () => {
    const ConnectionStringT = token<string>('ConnectionString');

    class Database {
      constructor(
        @Inject(ConnectionStringT, 'connectionString') readonly connectionString: string
      ) {}
    }
    const DatabaseT = token<Database>('Database');

    const container = new Container().register(DatabaseT, Database);
    const db = container.resolve(DatabaseT, { overrides: { connectionString: 'X' } });

    expect(db.connectionString).toBe('X');
  });

  it('populates injectable properties after construction', () => {
    class Logger {}
    const LoggerT = token<Logger>('Logger');

    class ReportJob {
      @InjectProperty(LoggerT)
      logger?: Logger;
    }

    const container = new Container().register(LoggerT, Logger, Lifetime.Singleton);
    const job = container.resolve(ReportJob);

    expect(job.logger).toBeInstanceOf(Logger);
    expect(job.logger).toBe(container.resolve(LoggerT));
  });

  it('reports A → B → A as a circular dependency', () => {
    const AT = token('A');
    const BT = token('B');

    class A {
      constructor(@Inject(BT) readonly b: unknown) {}
    }
    class B {
      constructor(@Inject(AT) readonly a: unknown) {}
    }

    const container = new Container().register(AT, A).register(BT, B);

    let error: unknown;
    try {
      container.resolve(AT);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(CircularDependencyError);
    expect(error).toMatchObject({ cycle: ['A', 'B', 'A'] });
  });

  it('invokes a singleton factory exactly once', () => {
    const ClockT = token<{ now: number }>('Clock');
    const factory = vi.fn(() => ({ now: 1 }));

    const container = new Container().registerFactory(ClockT, factory, Lifetime.Singleton);

    const first = container.resolve(ClockT);
    const second = container.resolve(ClockT);
    container.beginScope().resolve(ClockT);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });
});
