import { ConfigurationError } from '../errors/errors.js';
import { StaticServiceRegistry } from '../registry/static-registry.js';
import { describeDescriptor, isDescriptor, type Descriptor } from '../core/token.js';

/**
 * Parameter decorator for constructor injection.
 *
 * Declares the dependency of one constructor parameter. TypeScript's
 * emitDecoratorMetadata is not used, so every parameter the container should
 * fill needs one. The optional `name` is the key under which callers may
 * override the argument; unnamed parameters are addressed by position.
 *
 * @example
 * ```typescript
 * class OrderService {
 *   constructor(
 *     @Inject(DatabaseT) private readonly db: Database,
 *     @Inject(ConnectionStringT, 'connectionString') readonly connectionString: string,
 *     @Inject(all(OrderRuleT)) private readonly rules: OrderRule[]
 *   ) {}
 * }
 *
 * container.resolve(OrderService, { overrides: { connectionString: 'memory://' } });
 * ```
 */
export function Inject<T>(service: Descriptor<T>, name?: string): ParameterDecorator {
  if (!isDescriptor(service)) {
    throw new ConfigurationError(
      `@Inject() expects a token, a class or all(...), got ${describeDescriptor(service)}`
    );
  }

  return function (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex: number
  ) {
    // Method parameters receive the prototype and a property key.
    if (propertyKey !== undefined) {
      throw new ConfigurationError(
        `@Inject() applies to constructor parameters only (found on '${String(propertyKey)}')`
      );
    }
    StaticServiceRegistry.registerParameter(target, parameterIndex, service, name);
  };
}
