import { ConfigurationError } from '../errors/errors.js';
import { StaticServiceRegistry } from '../registry/static-registry.js';
import { describeDescriptor, isServiceDescriptor, type ServiceDescriptor } from '../core/token.js';

/**
 * Declares the services a class implements. Consumed by
 * `container.registerAssemblyTypes()`; interfaces have no runtime identity,
 * so scanning only sees what is declared here (and on base classes).
 *
 * @example
 * ```typescript
 * @Implements(NotifierT, AuditSinkT)
 * class EmailNotifier implements Notifier, AuditSink {}
 * ```
 */
export function Implements(...services: ServiceDescriptor[]): ClassDecorator {
  services.forEach((service, i) => {
    if (!isServiceDescriptor(service)) {
      throw new ConfigurationError(
        `@Implements() argument ${i} must be a token or a class, got ${describeDescriptor(service)}`
      );
    }
  });

  return (target) => {
    StaticServiceRegistry.registerImplements(target, services);
  };
}

/**
 * Marks a class as abstract at runtime. TypeScript's `abstract` keyword is
 * erased, so without this marker the container would construct the class
 * implicitly when it is requested by itself.
 */
export function Abstract(): ClassDecorator {
  return (target) => {
    StaticServiceRegistry.markAbstract(target);
  };
}
