import { ConfigurationError } from '../errors/errors.js';
import { StaticServiceRegistry } from '../registry/static-registry.js';
import { describeDescriptor, isDescriptor, type Descriptor } from '../core/token.js';

/**
 * Marks a writable instance property for injection after construction.
 *
 * Declarations are inherited: a subclass gets the injectable properties of
 * its base classes and may redeclare one with another service.
 *
 * @example
 * ```typescript
 * class ReportJob {
 *   @InjectProperty(LoggerT)
 *   logger!: Logger;
 * }
 * ```
 */
export function InjectProperty<T>(service: Descriptor<T>): PropertyDecorator {
  if (!isDescriptor(service)) {
    throw new ConfigurationError(
      `@InjectProperty() expects a token, a class or all(...), got ${describeDescriptor(service)}`
    );
  }

  return function (target: object, propertyKey: string | symbol) {
    // Static members receive the constructor itself.
    if (typeof target === 'function') {
      throw new ConfigurationError(
        `@InjectProperty() applies to instance properties only (found on static '${String(propertyKey)}')`
      );
    }
    StaticServiceRegistry.registerProperty(target.constructor, propertyKey, service);
  };
}
