import { Either } from 'effect';
import { MissingParameterError } from './errors.js';

/**
 * Values accepted for URL placeholders; each is inserted in its string form
 * @category URLs
 */
export type UrlParams = Readonly<Record<string, string | number | boolean | bigint>>;

/** `:name`, with its leading slash and an optional `?` (optional) or `+` (greedy) modifier */
const PLACEHOLDER = /(\/?):(\w+)([?+]?)/g;

function hasValue(params: UrlParams, name: string): boolean {
    return Object.prototype.hasOwnProperty.call(params, name);
}

/**
 * Names of the `:name` placeholders in a pattern, in order of appearance
 * @category URLs
 */
export function placeholders(pattern: string): string[] {
    return Array.from(pattern.matchAll(PLACEHOLDER), (match) => match[2]);
}

/**
 * Build a concrete path by substituting every `:name` placeholder in
 * `pattern` with `String(params[name])`.
 *
 * Values are inserted as given, without escaping. Parameters that match no
 * placeholder are ignored. An optional placeholder (`:name?`) without a value
 * is dropped along with its leading slash; the `?` and `+` modifiers never
 * appear in the result.
 *
 * @returns the path, or MissingParameterError for the first required placeholder without a value
 *
 * @category URLs
 *
 * @example
 * ```typescript
 * generateUrlByPattern('/:locale/products/:id', { locale: 'cs', id: 42 });
 * // Either.right('/cs/products/42')
 * generateUrlByPattern('/users/:id?');
 * // Either.right('/users')
 * ```
 */
export function generateUrlByPattern(
    pattern: string,
    params: UrlParams = {}
): Either.Either<string, MissingParameterError> {
    for (const [, , name, modifier] of pattern.matchAll(PLACEHOLDER)) {
        if (modifier !== '?' && !hasValue(params, name)) {
            return Either.left(new MissingParameterError(name, pattern));
        }
    }

    const path = pattern.replace(PLACEHOLDER, (_token, slash: string, name: string) =>
        hasValue(params, name) ? slash + String(params[name]) : ''
    );
    return Either.right(path === '' ? '/' : path);
}
