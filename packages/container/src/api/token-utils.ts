import { openToken, token, type OpenToken, type Token } from '../core/token.js';

/**
 * Create multiple tokens at once with a shared prefix.
 * Useful for organizing the services of a feature or module.
 *
 * @param prefix - Common prefix for all tokens (e.g., 'User', 'Billing')
 * @param shape - Object whose keys name the tokens; values only carry types
 *
 * @example
 * ```typescript
 * const UserTokens = createTokenGroup('User', {
 *   Repository: null as unknown as UserRepository,
 *   Service: null as unknown as UserService,
 * });
 * // UserTokens.Repository: Token<UserRepository>, labelled 'UserRepository'
 * ```
 */
export function createTokenGroup<T extends Record<string, unknown>>(
  prefix: string,
  shape: T
): { [K in keyof T]: Token<T[K]> } {
  const result = {} as { [K in keyof T]: Token<T[K]> };

  (Object.keys(shape) as Array<keyof T>).forEach((key) => {
    result[key] = token<T[typeof key]>(`${prefix}${String(key)}`);
  });

  return result;
}

/**
 * Create open tokens for a family of generic services sharing a prefix,
 * keyed by name with their arity as value.
 *
 * @example
 * ```typescript
 * const Data = createOpenTokenGroup('Data', { Repository: 1, Mapper: 2 });
 * Data.Mapper.close(OrderRow, Order); // labelled 'DataMapper<OrderRow, Order>'
 * ```
 */
export function createOpenTokenGroup<T extends Record<string, number>>(
  prefix: string,
  arities: T
): { [K in keyof T]: OpenToken } {
  const result = {} as { [K in keyof T]: OpenToken };

  (Object.keys(arities) as Array<keyof T>).forEach((key) => {
    result[key] = openToken(`${prefix}${String(key)}`, arities[key]);
  });

  return result;
}
