/*
 * Resolution benchmark (tinybench)
 * A request-shaped graph resolved per lifetime scope:
 *   Controller (transient) -> Service (transient) -> Repository (scoped)
 *     -> Database, Logger (singletons)
 * tsyringe runs the same graph with child containers standing in for scopes.
 */

import 'reflect-metadata';
import { Bench } from 'tinybench';
import {
  container as tsyringe,
  inject,
  injectable,
  Lifecycle as TsyringeLifecycle,
} from 'tsyringe';

import { Container, Inject, Lifetime, all, openClass, openToken, token } from '../src/index.js';

const ITERATIONS = 1_000;

// ---- wiregraph ----

class Logger {
  log(msg: string): string {
    return msg;
  }
}

class Database {
  query(sql: string): string {
    return sql;
  }
}

const LoggerT = token<Logger>('Logger');
const DatabaseT = token<Database>('Database');
const RepositoryT = token<Repository>('Repository');
const ServiceT = token<Service>('Service');
const RuleT = token<object>('Rule');

class Repository {
  constructor(
    @Inject(DatabaseT) readonly db: Database,
    @Inject(LoggerT) readonly logger: Logger
  ) {}
}

class Service {
  constructor(@Inject(RepositoryT) readonly repository: Repository) {}
}

class Controller {
  constructor(
    @Inject(ServiceT) readonly service: Service,
    @Inject(LoggerT) readonly logger: Logger
  ) {}

  handle(): string {
    return this.service.repository.db.query('select 1');
  }
}

const EntityStoreT = openToken('IEntityStore', 1);
const EntityStoreImpl = openClass('EntityStore', 1, (entity) => {
  class EntityStore {
    readonly entity = entity;
    constructor(@Inject(DatabaseT) readonly db: Database) {}
  }
  return EntityStore;
});
class Customer {}

function buildContainer(): Container {
  const container = new Container({ name: 'Bench' })
    .register(LoggerT, Logger, Lifetime.Singleton)
    .register(DatabaseT, Database, Lifetime.Singleton)
    .register(RepositoryT, Repository, Lifetime.Scoped)
    .register(ServiceT, Service)
    .register(EntityStoreT, EntityStoreImpl, Lifetime.Singleton);

  for (let i = 0; i < 4; i++) container.register(RuleT, class Rule {}, { key: i });
  return container;
}

// ---- tsyringe ----

@injectable()
class TsyLogger extends Logger {}

@injectable()
class TsyDatabase extends Database {}

@injectable()
class TsyRepository {
  constructor(
    @inject('Database') readonly db: Database,
    @inject('Logger') readonly logger: Logger
  ) {}
}

@injectable()
class TsyService {
  constructor(@inject('Repository') readonly repository: TsyRepository) {}
}

@injectable()
class TsyController {
  constructor(
    @inject('Service') readonly service: TsyService,
    @inject('Logger') readonly logger: Logger
  ) {}

  handle(): string {
    return this.service.repository.db.query('select 1');
  }
}

function buildTsyringe() {
  const root = tsyringe.createChildContainer();
  root.registerSingleton('Logger', TsyLogger);
  root.registerSingleton('Database', TsyDatabase);
  root.register('Repository', { useClass: TsyRepository }, { lifecycle: TsyringeLifecycle.ContainerScoped });
  root.register('Service', { useClass: TsyService });
  return root;
}

async function main(): Promise<void> {
  const container = buildContainer();
  const tsy = buildTsyringe();
  const CustomerStoreT = EntityStoreT.close(Customer);

  const bench = new Bench({ time: 500 });

  bench
    .add('wiregraph: cold boot', () => {
      buildContainer().beginScope().resolve(Controller).handle();
    })
    .add('tsyringe: cold boot', () => {
      buildTsyringe().createChildContainer().resolve(TsyController).handle();
    })
    .add(`wiregraph: ${ITERATIONS} requests`, () => {
      for (let i = 0; i < ITERATIONS; i++) {
        const scope = container.beginScope();
        scope.resolve(Controller).handle();
        scope.dispose();
      }
    })
    .add(`tsyringe: ${ITERATIONS} requests`, () => {
      for (let i = 0; i < ITERATIONS; i++) {
        tsy.createChildContainer().resolve(TsyController).handle();
      }
    })
    .add(`wiregraph: ${ITERATIONS} closed generics`, () => {
      for (let i = 0; i < ITERATIONS; i++) container.resolve(CustomerStoreT);
    })
    .add(`wiregraph: ${ITERATIONS} collections`, () => {
      for (let i = 0; i < ITERATIONS; i++) container.resolve(all(RuleT));
    });

  console.log(`[phase] running ${bench.tasks.length} tasks`);
  await bench.run();
  console.table(bench.table());
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
