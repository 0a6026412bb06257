import { ConfigurationError } from '../errors/errors.js';
import type { AbstractConstructor } from '../types/types.js';
import { ArgumentCache } from './argument-cache.js';

/**
 * Branded type for canonical token identifiers.
 * Prevents accidental use of raw strings as token IDs.
 */
export type CanonicalId = string & { __brand: 'CanonicalId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates tokens with their resolved value type without runtime overhead.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Type-safe service token.
 *
 * Tokens stand in for interfaces, which have no runtime identity. They carry
 * the resolved type at compile time via the phantom type parameter T.
 *
 * @template T - The type of value this token resolves to
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Unique canonical identifier (tok_1, tok_2, etc.) */
  readonly id: CanonicalId;

  /** Human-readable label for debugging and error messages */
  readonly label: string;

  /** Present on tokens produced by {@link OpenToken.close} */
  readonly generic?: ClosedGeneric;

  /** Phantom type brand - associates token with its value type */
  readonly [TOKEN_BRAND]: T;
}

/**
 * Service descriptor: a token, or a class (concrete or abstract) used as its
 * own service identity.
 */
export type ServiceDescriptor<T = unknown> = Token<T> | AbstractConstructor<T>;

/** Type argument accepted when closing an open generic. */
export type TypeArgument = ServiceDescriptor;

export interface ClosedGeneric {
  readonly definition: OpenToken;
  readonly args: readonly TypeArgument[];
}

/**
 * Open-generic service descriptor, e.g. `IRepository<>`.
 *
 * Closing it with the same type arguments always yields the same token.
 */
export interface OpenToken {
  readonly kind: 'open-token';
  readonly id: CanonicalId;
  readonly label: string;
  readonly arity: number;
  close<T = unknown>(...args: TypeArgument[]): Token<T>;
}

/**
 * "Sequence of T": resolves every registration of the element service.
 */
export interface Collection<T = unknown> {
  readonly kind: 'collection';
  readonly element: ServiceDescriptor<T>;
  readonly label: string;
}

/** Anything a constructor parameter or property can depend on. */
export type Descriptor<T = unknown> = ServiceDescriptor<T> | Collection<T>;

/**
 * Global counter for generating unique token IDs.
 * Shared by plain and open tokens.
 */
let _tokCounter = 0;

const nextId = (): CanonicalId => `tok_${++_tokCounter}` as CanonicalId;

function createToken<T>(label: string, generic?: ClosedGeneric): Token<T> {
  const t = { kind: 'token' as const, id: nextId(), label, ...(generic ? { generic } : {}) };
  return Object.freeze(t) as Token<T>;
}

/**
 * Create a new type-safe service token.
 *
 * @param label - Optional human-readable label for debugging (defaults to "Token")
 *
 * @example
 * ```typescript
 * const LoggerT = token<Logger>('Logger');
 * container.register(LoggerT, ConsoleLogger, Lifetime.Singleton);
 * ```
 */
export function token<T = unknown>(label?: string): Token<T> {
  return createToken<T>(label ?? 'Token');
}

/**
 * Create an open-generic service token with `arity` type parameters.
 *
 * @example
 * ```typescript
 * const RepositoryT = openToken('IRepository', 1);
 * const CustomerRepositoryT = RepositoryT.close<Repository<Customer>>(Customer);
 * ```
 */
export function openToken(label: string, arity: number): OpenToken {
  if (!Number.isInteger(arity) || arity < 1) {
    throw new ConfigurationError(`open token '${label}' needs an arity of at least 1, got ${arity}`);
  }

  const closed = new ArgumentCache<Token>();
  const open: OpenToken = Object.freeze({
    kind: 'open-token' as const,
    id: nextId(),
    label,
    arity,
    close<T = unknown>(...args: TypeArgument[]): Token<T> {
      assertTypeArguments(label, arity, args);
      const frozenArgs = Object.freeze([...args]);
      const t = closed.getOrCreate(args, () =>
        createToken(`${label}<${frozenArgs.map(describeDescriptor).join(', ')}>`, {
          definition: open,
          args: frozenArgs,
        })
      );
      return t as Token<T>;
    },
  });
  return open;
}

/**
 * Collection descriptor for every registration of `element`.
 */
export function all<T>(element: ServiceDescriptor<T>): Collection<T> {
  if (!isServiceDescriptor(element)) {
    throw new ConfigurationError(`all() expects a token or a class, got ${String(element)}`);
  }
  return Object.freeze({
    kind: 'collection' as const,
    element,
    label: `${describeDescriptor(element)}[]`,
  });
}

/**
 * Runtime type guard to check if a value is a valid Token.
 */
export function isToken(x: unknown): x is Token<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Token).kind === 'token' &&
    typeof (x as Token).id === 'string' &&
    typeof (x as Token).label === 'string'
  );
}

export function isOpenToken(x: unknown): x is OpenToken {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as OpenToken).kind === 'open-token' &&
    typeof (x as OpenToken).arity === 'number'
  );
}

export function isCollection(x: unknown): x is Collection {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Collection).kind === 'collection' &&
    isServiceDescriptor((x as Collection).element)
  );
}

export function isServiceDescriptor(x: unknown): x is ServiceDescriptor {
  return isToken(x) || typeof x === 'function';
}

export function isDescriptor(x: unknown): x is Descriptor {
  return isServiceDescriptor(x) || isCollection(x);
}

/**
 * Human-readable label of any descriptor, used in diagnostics.
 */
export function describeDescriptor(x: unknown): string {
  if (isToken(x) || isCollection(x)) return x.label;
  if (isOpenToken(x)) return `${x.label}<${','.repeat(x.arity - 1)}>`;
  if (typeof x === 'function') return x.name || 'anonymous';
  return String(x);
}

export function assertTypeArguments(label: string, arity: number, args: readonly unknown[]): void {
  if (args.length !== arity) {
    throw new ConfigurationError(
      `'${label}' takes ${arity} type argument(s), got ${args.length}`
    );
  }
  args.forEach((arg, i) => {
    if (!isServiceDescriptor(arg)) {
      throw new ConfigurationError(
        `type argument ${i} of '${label}' must be a token or a class, got ${String(arg)}`
      );
    }
  });
}
