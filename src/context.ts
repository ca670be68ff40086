import { ResponseContext } from './response-context.js';
import type { Logger } from './logger.js';
import type { Method } from './method.js';

/**
 * Raw route parameters extracted from the URL path
 * @category Types
 */
export type Params = Record<string, string>;

/**
 * The parts of an HTTP request a handler reads.
 *
 * A fetch `Request` satisfies it. The Node.js transport builds its own, since
 * fetch refuses the CONNECT and TRACE verbs.
 *
 * @category Types
 */
export interface HttpRequest {
    readonly method: string;
    /** Absolute request URL */
    readonly url: string;
    readonly headers: Headers;
    text(): Promise<string>;
    json(): Promise<unknown>;
}

/**
 * The matched route, as seen by a handler
 * @category Types
 */
export interface RouteInfo {
    name: string;
    /** Absolute pattern the route was registered under */
    pattern: string;
    method: Method;
}

/**
 * Context object passed to every route handler.
 *
 * Provides access to the request, the decoded path segments, and response
 * customization.
 *
 * @category Context
 *
 * @example
 * ```typescript
 * router.get('user:detail', '/users/:id', (ctx) => {
 *     ctx.log.debug('Looking up user %s', ctx.params.id);
 *     return { id: ctx.params.id };
 * });
 * ```
 */
export interface Context {
    /** Original incoming request */
    request: HttpRequest;

    /** Path segments from the URL, percent-decoded (e.g., { id: '123' } from '/users/:id') */
    params: Params;

    /** Matched route; undefined when no route matched */
    route?: RouteInfo;

    /** Response customization (status, headers) */
    response: ResponseContext;

    /** Logger instance */
    log: Logger;
}

/**
 * Context given to error handlers once the final status is known.
 *
 * @category Context
 */
export interface ErrorContext extends Context {
    /** Final status that triggered the error handler (>= 400) */
    status: number;

    /** Error thrown while handling the request, if any */
    error?: unknown;

    /** Value the route handler returned, if it returned normally */
    body?: unknown;
}

/**
 * Creates a Context object for a request.
 */
export function createContext(request: HttpRequest, params: Params, log: Logger, route?: RouteInfo): Context {
    return {
        request,
        params,
        route,
        response: new ResponseContext(),
        log,
    };
}
