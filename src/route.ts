import { toHandler, type Handler, type HandlerInput } from './handler.js';
import type { Method } from './method.js';

/**
 * A single named endpoint: one pattern, one verb, one handler.
 *
 * Routes are immutable. A route may carry named child routes, which are an
 * index for lookup by name only; registering a route does not register its
 * children.
 *
 * @category Routes
 *
 * @example
 * ```typescript
 * const detail = new Route('user:detail', '/users/:id', getUser, Method.Get);
 * const users = new Route('user:list', '/users', listUsers, Method.Get, [detail]);
 *
 * users.child('user:detail'); // detail
 * ```
 */
export class Route {
    readonly name: string;
    readonly pattern: string;
    readonly handler: Handler;
    readonly method: Method;
    readonly children: ReadonlyMap<string, Route>;

    constructor(name: string, pattern: string, handler: HandlerInput, method: Method, children: Iterable<Route> = []) {
        this.name = name;
        this.pattern = pattern;
        this.handler = toHandler(handler);
        this.method = method;
        this.children = new Map(Array.from(children, (child): [string, Route] => [child.name, child]));
    }

    child(name: string): Route | undefined {
        return this.children.get(name);
    }

    /**
     * Copy of this route bound to another pattern
     */
    withPattern(pattern: string): Route {
        return new Route(this.name, pattern, this.handler, this.method, this.children.values());
    }
}

/**
 * A route paired with its absolute pattern after prefix composition
 * @category Routes
 */
export interface FlattenedRoute {
    pattern: string;
    route: Route;
}

/**
 * A prefix-scoped group of routes and nested route lists.
 *
 * Lists are only used to compose paths; once added to a router they are
 * flattened and no longer referenced.
 *
 * @category Routes
 *
 * @example
 * ```typescript
 * const root = new RouteList();
 * root.add('product', '/:locale/products/:id', productHandler, Method.Get);
 *
 * const v1 = root.group('/v1');
 * v1.add('v1:product', '/:locale/products/:id', productHandler, Method.Get);
 *
 * router.addRouteList(root); // GET /:locale/products/:id and GET /v1/:locale/products/:id
 * ```
 */
export class RouteList {
    readonly pattern: string;
    readonly routes: Route[] = [];
    readonly children: RouteList[] = [];

    constructor(pattern: string = '') {
        this.pattern = pattern;
    }

    add(name: string, pattern: string, handler: HandlerInput, method: Method): this {
        return this.addRoute(new Route(name, pattern, handler, method));
    }

    addRoute(route: Route): this {
        this.routes.push(route);
        return this;
    }

    addChild(list: RouteList): this {
        this.children.push(list);
        return this;
    }

    /**
     * Create a child list under `prefix`, attach it, and return it
     */
    group(prefix: string): RouteList {
        const child = new RouteList(prefix);
        this.addChild(child);
        return child;
    }

    flatten(prefix: string = ''): FlattenedRoute[] {
        return flatten(this, prefix);
    }
}

/**
 * Resolve a route list tree into absolute patterns, depth first.
 *
 * Direct routes of a list come before the routes of its children; both keep
 * insertion order.
 *
 * @category Routes
 */
export function flatten(list: RouteList, prefix: string = ''): FlattenedRoute[] {
    const base = joinPaths(prefix, list.pattern);
    const flattened: FlattenedRoute[] = list.routes.map((route) => ({
        pattern: joinPaths(base, route.pattern),
        route,
    }));

    for (const child of list.children) {
        flattened.push(...flatten(child, base));
    }

    return flattened;
}

/**
 * Join path fragments with single slashes. The result always starts with `/`
 * and never ends with one, except for the root path itself.
 *
 * @category Routes
 *
 * @example
 * ```typescript
 * joinPaths('/v1/', '/users/:id'); // '/v1/users/:id'
 * joinPaths('', '');               // '/'
 * ```
 */
export function joinPaths(...parts: string[]): string {
    const segments = parts.map((part) => part.replace(/^\/+|\/+$/g, '')).filter((part) => part.length > 0);
    return '/' + segments.join('/');
}
