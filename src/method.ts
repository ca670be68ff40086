import { ConfigurationError } from './errors.js';

/**
 * HTTP verbs a route can be bound to. Each value is the verb's wire token.
 *
 * @category Routes
 *
 * @example
 * ```typescript
 * router.addRoute('user:detail', '/users/:id', handler, Method.Get);
 * ```
 */
export const Method = {
    Get: 'GET',
    Post: 'POST',
    Put: 'PUT',
    Patch: 'PATCH',
    Delete: 'DELETE',
    Head: 'HEAD',
    Options: 'OPTIONS',
    Connect: 'CONNECT',
    Trace: 'TRACE',
} as const;

/**
 * @category Routes
 */
export type Method = (typeof Method)[keyof typeof Method];

/**
 * Every supported verb, in declaration order
 * @category Routes
 */
export const METHODS: readonly Method[] = Object.values(Method);

export function isMethod(value: string): value is Method {
    return METHODS.some((method) => method === value);
}

/**
 * Parse a verb token, ignoring case.
 *
 * @throws ConfigurationError when the token is not a supported verb
 */
export function parseMethod(value: string): Method {
    const token = value.trim().toUpperCase();
    if (!isMethod(token)) {
        throw new ConfigurationError(`Unsupported HTTP method '${value}'`);
    }
    return token;
}
