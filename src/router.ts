import { Either } from 'effect';
import createHttpError from 'http-errors';
import { Router as IttyRouter, type IRequest, type RouterType } from 'itty-router';
import type { Server } from 'node:http';
import { resolveConfig, type RouterConfig, type RouterOptions } from './config.js';
import {
    createContext,
    type Context,
    type ErrorContext,
    type HttpRequest,
    type Params,
    type RouteInfo,
} from './context.js';
import {
    ConfigurationError,
    DecodeError,
    RouteNotFoundError,
    type DecodeIssue,
    type MissingParameterError,
} from './errors.js';
import {
    adaptHandler,
    withParams,
    type HandlerInput,
    type ParamHandlerFn,
    type ParamsSchema,
} from './handler.js';
import { createLogger, type Logger } from './logger.js';
import { Method } from './method.js';
import { listen, serveUntilClosed } from './node.js';
import { Route, RouteList } from './route.js';
import { generateUrlByPattern, type UrlParams } from './url.js';

/**
 * Error handler: receives the final status and returns the response body.
 * Returning a `Response` sends it unchanged.
 *
 * @category Errors
 */
export type ErrorHandler = (ctx: ErrorContext) => unknown;

/**
 * Engine the router registers with; exposed by {@link NamedRouter.getNativeRouter}
 * @category Routers
 */
export type NativeRouter = RouterType<IRequest, [], Response>;

type EngineHandler = (request: IRequest) => Promise<Response>;

/**
 * A route as registered with the engine
 */
interface Registration {
    route: Route;
    handler: EngineHandler;
}

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

const DEFAULT_ERROR_BODY = {
    error: 'An error occurred',
    description: 'No specific handler defined for this status',
};

/**
 * Build a JSON Response from a handler's return value and the context's
 * response settings.
 *
 * @param result The return value from a route or error handler
 * @param ctx The request context
 * @returns A properly formatted Response
 */
export function buildResponse(result: unknown, ctx: Context): Response {
    // If handler returns a Response directly, use it as-is
    if (result instanceof Response) {
        return result;
    }

    const headers = new Headers({ 'Content-Type': 'application/json' });
    ctx.response.headers.forEach((value, key) => {
        if (key === 'set-cookie') {
            headers.append(key, value);
        } else {
            headers.set(key, value);
        }
    });

    const noBody =
        result === undefined || ctx.request.method === 'HEAD' || NULL_BODY_STATUSES.has(ctx.response.status);
    return new Response(noBody ? null : JSON.stringify(result), {
        status: ctx.response.status,
        statusText: ctx.response.statusText,
        headers,
    });
}

/**
 * Last-resort Response used when an error handler itself fails.
 *
 * @param error The error that was thrown
 * @param ctx The request context
 */
export function buildErrorResponse(error: unknown, ctx: Context): Response {
    ctx.log.error('Error handler failed: %s', error);

    return new Response(JSON.stringify({ error: 'Internal Server Error' }), {
        status: 500,
        headers: { 'Content-Type': 'application/json' },
    });
}

/**
 * HTTP status for an error thrown while handling a request
 */
export function statusForError(error: unknown): number {
    if (error instanceof DecodeError) {
        return error.status;
    }
    if (createHttpError.isHttpError(error)) {
        return error.status;
    }
    return 500;
}

/**
 * Fallback for error statuses without a specific handler.
 *
 * @category Errors
 */
export const defaultErrorHandler: ErrorHandler = (ctx) => {
    if (ctx.error instanceof DecodeError) {
        return { error: ctx.error.message, issues: ctx.error.issues };
    }
    if (createHttpError.isHttpError(ctx.error) && ctx.error.expose) {
        return { error: ctx.error.message };
    }
    return DEFAULT_ERROR_BODY;
};

/**
 * Router of named routes on top of itty-router.
 *
 * Features:
 * - Named routes with URL generation from route names
 * - Route lists composing path prefixes
 * - Path parameters decoded into typed values before the handler runs
 * - Per-status and default error handlers for every status >= 400
 *
 * Registration happens first; `build()`, `fetch()` or `listen()` freeze the
 * router and any later registration throws.
 *
 * @category Routers
 *
 * @example
 * ```typescript
 * const router = new NamedRouter({ name: 'catalog' })
 *     .get('health', '/health', () => ({ status: 'healthy' }))
 *     .setErrorHandler(404, () => ({ error: 'Custom 404' }));
 *
 * await router.run(':8080');
 * ```
 */
export class NamedRouter {
    /** Router name for logging */
    readonly name: string;
    /** Logger instance */
    readonly log: Logger;
    /** Resolved configuration */
    readonly config: RouterConfig;
    /** Underlying itty-router instance for path matching */
    private readonly router: NativeRouter;
    /** Registered routes by name */
    private readonly routes = new Map<string, Route>();
    /** Engine registrations under each route name */
    private readonly registrations = new Map<string, Registration[]>();
    /** Status-specific error handlers */
    private readonly errorHandlers = new Map<number, ErrorHandler>();
    private defaultHandler: ErrorHandler = defaultErrorHandler;
    /** Whether the router has been built */
    private isBuilt: boolean = false;

    constructor(options: RouterOptions = {}) {
        this.config = resolveConfig(options);
        this.name = this.config.name;
        this.log = createLogger(this.name, this.config.logLevel);
        this.router = IttyRouter<IRequest, [], Response>();
    }

    /**
     * Register a route.
     *
     * Re-using a name follows the `duplicateNames` policy. Under the default
     * `overwrite` policy the registry keeps the latest route and the previous
     * route's engine registration is removed; registering the same name for
     * several methods of one pattern keeps all of them routed.
     *
     * @param name - Route name used for lookup and URL generation
     * @param pattern - Path pattern, e.g. '/users/:id'
     * @param handler - A function, or a handler built with raw() or withParams()
     * @param method - HTTP verb
     * @returns This router instance for chaining
     * @throws ConfigurationError for a rejected duplicate, an invalid pattern, or a built router
     *
     * @example
     * ```typescript
     * router.addRoute('user:detail', '/users/:id', withParams(UserParams, (ctx, params) => {
     *     return { id: params.id };
     * }), Method.Get);
     * ```
     */
    addRoute(name: string, pattern: string, handler: HandlerInput, method: Method): this {
        return this.register(new Route(name, pattern, handler, method));
    }

    /**
     * Register one handler under one name for several methods.
     */
    addMultiMethodsRoute(name: string, pattern: string, handler: HandlerInput, methods: readonly Method[]): this {
        for (const method of methods) {
            this.addRoute(name, pattern, handler, method);
        }
        return this;
    }

    /**
     * Register a prebuilt route under its own pattern
     */
    addRouteObject(route: Route): this {
        return this.register(route);
    }

    /**
     * Register every route of a route list tree under its composed pattern.
     *
     * @example
     * ```typescript
     * const root = new RouteList();
     * root.group('/v1').add('v1:product', '/:locale/products/:id', productHandler, Method.Get);
     * router.addRouteList(root);
     * ```
     */
    addRouteList(list: RouteList): this {
        for (const { pattern, route } of list.flatten()) {
            this.register(route.withPattern(pattern));
        }
        return this;
    }

    get(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Get);
    }

    post(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Post);
    }

    put(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Put);
    }

    patch(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Patch);
    }

    delete(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Delete);
    }

    head(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Head);
    }

    options(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Options);
    }

    connect(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Connect);
    }

    trace(name: string, pattern: string, handler: HandlerInput): this {
        return this.addRoute(name, pattern, handler, Method.Trace);
    }

    /**
     * Install the error handler for one status code. A 404 handler also
     * answers requests that match no route.
     */
    setErrorHandler(status: number, handler: ErrorHandler): this {
        this.assertNotBuilt('set an error handler');
        if (!Number.isInteger(status) || status < 400 || status > 599) {
            throw new ConfigurationError(`Error handlers apply to statuses 400-599, got ${status}`);
        }
        this.errorHandlers.set(status, handler);
        return this;
    }

    /**
     * Replace the handler used for error statuses without a specific handler,
     * including unmatched routes when no 404 handler is set.
     */
    setDefaultErrorHandler(handler: ErrorHandler): this {
        this.assertNotBuilt('set the default error handler');
        this.defaultHandler = handler;
        return this;
    }

    /**
     * Registered routes by name
     */
    getRoutes(): ReadonlyMap<string, Route> {
        return this.routes;
    }

    getRoute(name: string): Route | undefined {
        return this.routes.get(name);
    }

    /**
     * Build the path of a named route.
     *
     * @example
     * ```typescript
     * router.generateUrlByName('product', { locale: 'cs', id: 42 }); // Either.right('/cs/products/42')
     * ```
     */
    generateUrlByName(
        name: string,
        params: UrlParams = {}
    ): Either.Either<string, RouteNotFoundError | MissingParameterError> {
        const route = this.routes.get(name);
        if (!route) {
            return Either.left(new RouteNotFoundError(name));
        }
        return generateUrlByPattern(route.pattern, params);
    }

    generateUrlByPattern(pattern: string, params: UrlParams = {}): Either.Either<string, MissingParameterError> {
        return generateUrlByPattern(pattern, params);
    }

    /**
     * The underlying itty-router instance, for capabilities this router does not wrap
     */
    getNativeRouter(): NativeRouter {
        return this.router;
    }

    /**
     * Freeze registration and install the catch-all for unmatched requests.
     *
     * @returns The underlying itty-router instance
     */
    build(): NativeRouter {
        if (this.isBuilt) {
            return this.router;
        }

        // Handle 404 - Route not found
        this.router.all('*', (request: IRequest) => {
            const ctx = createContext(request, {}, this.log);
            return this.respond(ctx, async () => {
                throw createHttpError(404, 'Not found');
            });
        });

        this.isBuilt = true;
        return this.router;
    }

    /**
     * Answer a request. Builds the router on first use.
     *
     * Accepts a fetch `Request` or any {@link HttpRequest}, such as the ones
     * the Node.js transport builds for CONNECT and TRACE.
     */
    fetch(request: HttpRequest): Promise<Response> {
        if (!this.isBuilt) {
            this.build();
        }
        return this.router.fetch(request);
    }

    /**
     * Build the router and start serving HTTP on `address` (`host:port` or `:port`).
     *
     * @returns the server once it is listening
     * @throws ListenError when the address cannot be bound
     */
    async listen(address: string = ':8080'): Promise<Server> {
        this.build();
        return listen((request) => this.fetch(request), address, this.log);
    }

    /**
     * Serve HTTP on `address` until the server closes.
     *
     * @throws ListenError when the address cannot be bound or the listener fails
     */
    async run(address: string = ':8080'): Promise<void> {
        const server = await this.listen(address);
        await serveUntilClosed(server, address);
    }

    private register(route: Route): this {
        this.assertNotBuilt(`register route '${route.name}'`);

        const existing = this.registrations.get(route.name) ?? [];
        const stale = existing.filter((entry) => isReplacedBy(entry.route, route));
        if (stale.length > 0 && this.config.duplicateNames === 'reject') {
            throw new ConfigurationError(`Route name '${route.name}' is already registered`);
        }

        const info: RouteInfo = { name: route.name, pattern: route.pattern, method: route.method };
        const dispatch = adaptHandler(route.handler);
        const handler: EngineHandler = (request) => {
            const ctx = createContext(request, {}, this.log, info);
            ctx.log.trace('Incoming request %s %s (%s)', request.method, request.url, info.name);
            return this.respond(ctx, async () => {
                ctx.params = decodeSegments(request.params);
                return dispatch(ctx);
            });
        };

        try {
            engineRoute(this.router, route.method)(route.pattern, handler);
        } catch (error) {
            throw new ConfigurationError(`Invalid pattern '${route.pattern}' for route '${route.name}'`, {
                cause: error,
            });
        }

        if (stale.length > 0) {
            this.log.warn("Route name '%s' re-registered as %s %s", route.name, route.method, route.pattern);
            this.unregister(stale);
        }

        this.routes.set(route.name, route);
        this.registrations.set(route.name, [
            ...existing.filter((entry) => !stale.includes(entry)),
            { route, handler },
        ]);
        this.log.debug('%s %s --> %s', route.method, route.pattern, route.name);
        return this;
    }

    /**
     * Remove registrations from the engine so their patterns are no longer routed
     */
    private unregister(registrations: readonly Registration[]): void {
        const entries = this.router.routes;
        for (let index = entries.length - 1; index >= 0; index--) {
            const [, , entryHandlers] = entries[index];
            if (registrations.some(({ handler }) => entryHandlers.includes(handler))) {
                entries.splice(index, 1);
            }
        }
    }

    private assertNotBuilt(action: string): void {
        if (this.isBuilt) {
            throw new ConfigurationError(`Cannot ${action}: router '${this.name}' is already built`);
        }
    }

    /**
     * Run a handler and turn its outcome into a Response, handing statuses
     * >= 400 to the error handlers.
     */
    private async respond(ctx: Context, run: () => Promise<unknown>): Promise<Response> {
        let body: unknown;
        let error: unknown;

        try {
            body = await run();
        } catch (thrown) {
            error = thrown;
            ctx.response.status = statusForError(thrown);
            if (createHttpError.isHttpError(thrown) && thrown.headers) {
                for (const [key, value] of Object.entries(thrown.headers)) {
                    ctx.response.headers.set(key, value);
                }
            }
            if (ctx.response.status >= 500) {
                ctx.log.error('Request %s %s failed: %s', ctx.request.method, ctx.request.url, thrown);
            }
        }

        if (body instanceof Response) {
            return body;
        }
        if (!ctx.response.isError) {
            return buildResponse(body, ctx);
        }

        const status = ctx.response.status;
        const handler = this.errorHandlers.get(status) ?? this.defaultHandler;
        const errorCtx: ErrorContext = { ...ctx, status, error, body };
        try {
            return buildResponse(await handler(errorCtx), errorCtx);
        } catch (handlerError) {
            return buildErrorResponse(handlerError, errorCtx);
        }
    }
}

/**
 * Register a route whose handler parameters are typed by `schema`.
 *
 * @example
 * ```typescript
 * createRoute(router, 'test', '/test/:id', Schema.Struct({ id: Schema.NumberFromString }), (ctx, params) => {
 *     return { id: params.id };
 * }, Method.Get);
 * ```
 *
 * @category Routers
 */
export function createRoute<A, I extends Readonly<Record<string, string | undefined>>>(
    router: NamedRouter,
    name: string,
    pattern: string,
    schema: ParamsSchema<A, I>,
    handler: ParamHandlerFn<A>,
    method: Method
): NamedRouter {
    return router.addRoute(name, pattern, withParams(schema, handler), method);
}

function engineRoute(router: NativeRouter, method: Method): NativeRouter['get'] {
    switch (method) {
        case Method.Get:
            return router.get;
        case Method.Post:
            return router.post;
        case Method.Put:
            return router.put;
        case Method.Patch:
            return router.patch;
        case Method.Delete:
            return router.delete;
        case Method.Head:
            return router.head;
        case Method.Options:
            return router.options;
        case Method.Connect:
            return router.connect;
        case Method.Trace:
            return router.trace;
    }
}

/**
 * An earlier registration under the same name is replaced unless it is the
 * same pattern bound to another method.
 */
function isReplacedBy(previous: Route, next: Route): boolean {
    return previous.pattern !== next.pattern || previous.method === next.method;
}

/**
 * Percent-decode matched path segments, dropping unmatched optional ones.
 *
 * @throws DecodeError naming every segment with a malformed escape
 */
function decodeSegments(params: Record<string, string | undefined> | undefined): Params {
    const decoded: Params = {};
    const issues: DecodeIssue[] = [];
    for (const [key, value] of Object.entries(params ?? {})) {
        if (value === undefined) {
            continue;
        }
        try {
            decoded[key] = decodeURIComponent(value);
        } catch (error) {
            if (!(error instanceof URIError)) {
                throw error;
            }
            issues.push({ field: key, kind: 'invalid', message: 'Malformed percent-encoding' });
        }
    }
    if (issues.length > 0) {
        throw new DecodeError(issues);
    }
    return decoded;
}
