import { ConfigurationError } from '../errors/errors.js';
import type { Constructor } from '../types/types.js';
import { ArgumentCache } from './argument-cache.js';
import { assertTypeArguments, type TypeArgument } from './token.js';

/**
 * Open-generic implementation descriptor, e.g. `Repository<>`.
 *
 * TypeScript erases generic arguments, so an open class is a builder that
 * receives the type arguments as runtime descriptors and returns the closed
 * class. Each distinct argument tuple is built once.
 */
export interface OpenClass {
  readonly kind: 'open-class';
  readonly label: string;
  readonly arity: number;
  close(...args: TypeArgument[]): Constructor;
}

/**
 * @example
 * ```typescript
 * const RepositoryImpl = openClass('Repository', 1, (entity) => {
 *   class Repository {
 *     readonly entity = entity;
 *     constructor(@Inject(DatabaseT) readonly db: Database) {}
 *   }
 *   return Repository;
 * });
 *
 * container.register(RepositoryT, RepositoryImpl, Lifetime.Scoped);
 * ```
 */
export function openClass(
  label: string,
  arity: number,
  build: (...args: TypeArgument[]) => Constructor
): OpenClass {
  if (!Number.isInteger(arity) || arity < 1) {
    throw new ConfigurationError(`open class '${label}' needs an arity of at least 1, got ${arity}`);
  }
  if (typeof build !== 'function') {
    throw new ConfigurationError(`open class '${label}' needs a builder function`);
  }

  const closed = new ArgumentCache<Constructor>();
  return Object.freeze({
    kind: 'open-class' as const,
    label,
    arity,
    close(...args: TypeArgument[]): Constructor {
      assertTypeArguments(label, arity, args);
      return closed.getOrCreate(args, () => {
        const ctor = build(...args);
        if (typeof ctor !== 'function') {
          throw new ConfigurationError(`builder of open class '${label}' must return a class`);
        }
        return ctor;
      });
    },
  });
}

export function isOpenClass(x: unknown): x is OpenClass {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as OpenClass).kind === 'open-class' &&
    typeof (x as OpenClass).close === 'function'
  );
}
