import { Container } from '../core/container.js';
import type { ContainerConfig } from '../types/types.js';

/**
 * A batch of registrations. `load` is invoked once per container, however
 * many times the module is passed to `registerModule()`.
 */
export interface Module {
  load(container: Container): void;
}

/**
 * Class-based module.
 *
 * @example
 * ```typescript
 * class PersistenceModule extends ContainerModule {
 *   constructor(private readonly url: string) {
 *     super();
 *   }
 *
 *   load(container: Container): void {
 *     container
 *       .registerInstance(DatabaseUrlT, this.url)
 *       .register(DatabaseT, PgDatabase, Lifetime.Singleton);
 *   }
 * }
 * ```
 */
export abstract class ContainerModule implements Module {
  abstract load(container: Container): void;
}

/**
 * Function-based module with a name for diagnostics.
 *
 * @example
 * ```typescript
 * export const LoggingModule = defineModule('Logging', (c) => {
 *   c.register(LoggerT, ConsoleLogger, Lifetime.Singleton);
 * });
 * ```
 */
export function defineModule(
  name: string,
  load: (container: Container) => void
): Module & { readonly name: string } {
  return Object.freeze({ name, load });
}

/**
 * Create a container and load `config.modules`, in order.
 */
export function createContainer(config?: ContainerConfig): Container {
  return new Container(config);
}
