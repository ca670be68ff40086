import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Either, Schema } from 'effect';
import createHttpError from 'http-errors';
import {
    ConfigurationError,
    DecodeError,
    Method,
    MissingParameterError,
    NamedRouter,
    NodeRequest,
    Route,
    RouteList,
    RouteNotFoundError,
    createRoute,
    raw,
    withParams,
    type Context,
    type ErrorContext,
} from '../../src/index.js';

const ProductParams = Schema.Struct({
    locale: Schema.String,
    id: Schema.NumberFromString.pipe(Schema.int()),
});

const productHandler = withParams(ProductParams, (_ctx, params) => ({ locale: params.locale, id: params.id }));

function request(path: string, init?: RequestInit): Request {
    return new Request(`http://localhost${path}`, init);
}

describe('NamedRouter', () => {
    let router: NamedRouter;

    beforeEach(() => {
        router = new NamedRouter({ name: 'test-router', mode: 'test' });
    });

    describe('constructor', () => {
        it('should create router with default name', () => {
            const defaultRouter = new NamedRouter({ mode: 'test' });
            expect(defaultRouter.name).toBe('unnamed');
        });

        it('should create router with custom name', () => {
            expect(router.name).toBe('test-router');
            expect(router.config.duplicateNames).toBe('overwrite');
        });

        it('should silence logging in test mode', () => {
            vi.stubEnv('LOG_LEVEL', '');
            const quiet = new NamedRouter({ mode: 'test' });
            vi.unstubAllEnvs();

            expect(quiet.config.logLevel).toBe('silent');
            expect(quiet.log.level).toBe(Number.NEGATIVE_INFINITY);
        });

        it('should take an explicit log level over the mode', () => {
            const verbose = new NamedRouter({ mode: 'test', logLevel: 'warn' });

            expect(verbose.log.level).toBe(1);
        });
    });

    describe('route registration', () => {
        it('should return this for chaining', () => {
            const result = router
                .get('a', '/a', () => 'a')
                .post('b', '/b', () => 'b')
                .addRoute('c', '/c', () => 'c', Method.Put);

            expect(result).toBe(router);
            expect([...router.getRoutes().keys()]).toEqual(['a', 'b', 'c']);
        });

        it('should register each verb helper under its method', () => {
            router
                .get('get', '/r', () => null)
                .post('post', '/r', () => null)
                .put('put', '/r', () => null)
                .patch('patch', '/r', () => null)
                .delete('delete', '/r', () => null)
                .head('head', '/r', () => null)
                .options('options', '/r', () => null)
                .connect('connect', '/r', () => null)
                .trace('trace', '/r', () => null);

            expect([...router.getRoutes().values()].map((route) => route.method)).toEqual([
                'GET',
                'POST',
                'PUT',
                'PATCH',
                'DELETE',
                'HEAD',
                'OPTIONS',
                'CONNECT',
                'TRACE',
            ]);
        });

        it('should look up routes by name', () => {
            router.get('health', '/health', () => ({ status: 'healthy' }));

            const route = router.getRoute('health');
            expect(route).toBeInstanceOf(Route);
            expect(route?.pattern).toBe('/health');
            expect(router.getRoute('missing')).toBeUndefined();
        });

        it('should register prebuilt route objects', async () => {
            router.addRouteObject(new Route('ping', '/ping', () => 'pong', Method.Get));

            const response = await router.fetch(request('/ping'));
            expect(await response.json()).toBe('pong');
        });

        it('should reject invalid patterns', () => {
            expect(() => router.get('broken', '/broken(', () => null)).toThrow(ConfigurationError);
            expect(() => router.get('broken', '/broken(', () => null)).toThrow(
                "Invalid pattern '/broken(' for route 'broken'"
            );
            expect(router.getRoute('broken')).toBeUndefined();
        });

        it('should reject registration once built', () => {
            router.build();

            expect(() => router.get('late', '/late', () => null)).toThrow(ConfigurationError);
            expect(() => router.setErrorHandler(404, () => null)).toThrow(ConfigurationError);
            expect(() => router.setDefaultErrorHandler(() => null)).toThrow(ConfigurationError);
        });

        it('should build on first fetch and freeze registration', async () => {
            router.get('health', '/health', () => ({ status: 'healthy' }));

            await router.fetch(request('/health'));

            expect(() => router.get('late', '/late', () => null)).toThrow(
                "Cannot register route 'late': router 'test-router' is already built"
            );
        });

        it('should return the same engine when built twice', () => {
            expect(router.build()).toBe(router.build());
            expect(router.getNativeRouter()).toBe(router.build());
        });
    });

    describe('duplicate names', () => {
        it('should let the last registration win', async () => {
            router.get('item', '/old', () => ({ v: 'old' }));
            router.get('item', '/new', () => ({ v: 'new' }));

            expect(router.getRoute('item')?.pattern).toBe('/new');
            expect(router.getNativeRouter().routes).toHaveLength(1);

            const fresh = await router.fetch(request('/new'));
            expect(await fresh.json()).toEqual({ v: 'new' });

            const stale = await router.fetch(request('/old'));
            expect(stale.status).toBe(404);
        });

        it('should replace a handler registered for the same pattern and method', async () => {
            router.get('item', '/item', () => 'first');
            router.get('item', '/item', () => 'second');

            const response = await router.fetch(request('/item'));
            expect(await response.json()).toBe('second');
        });

        it('should reject duplicates under the reject policy', () => {
            const strict = new NamedRouter({ mode: 'test', duplicateNames: 'reject' });
            strict.get('item', '/old', () => null);

            expect(() => strict.get('item', '/new', () => null)).toThrow(
                "Route name 'item' is already registered"
            );
            expect(strict.getRoute('item')?.pattern).toBe('/old');
        });

        it('should allow one name across methods of one pattern under the reject policy', () => {
            const strict = new NamedRouter({ mode: 'test', duplicateNames: 'reject' });

            expect(() =>
                strict.addMultiMethodsRoute('item', '/items', () => null, [Method.Get, Method.Post])
            ).not.toThrow();
        });
    });

    describe('addMultiMethodsRoute', () => {
        it('should route every listed method to the handler', async () => {
            const handler = vi.fn((ctx: Context) => ({ method: ctx.request.method }));
            router.addMultiMethodsRoute('item', '/items', handler, [Method.Get, Method.Post]);

            const get = await router.fetch(request('/items'));
            const post = await router.fetch(request('/items', { method: 'POST' }));
            const put = await router.fetch(request('/items', { method: 'PUT' }));

            expect(await get.json()).toEqual({ method: 'GET' });
            expect(await post.json()).toEqual({ method: 'POST' });
            expect(put.status).toBe(404);
            expect(handler).toHaveBeenCalledTimes(2);
            expect(router.getRoute('item')?.method).toBe('POST');
        });
    });

    describe('route lists', () => {
        it('should serve the same handler at the root and under a prefix', async () => {
            const root = new RouteList();
            root.add('product', '/:locale/products/:id', productHandler, Method.Get);
            root.group('/v1').add('v1:product', '/:locale/products/:id', productHandler, Method.Get);
            router.addRouteList(root);

            const plain = await router.fetch(request('/cs/products/42'));
            const versioned = await router.fetch(request('/v1/cs/products/42'));

            expect(plain.status).toBe(200);
            expect(await plain.text()).toBe('{"locale":"cs","id":42}');
            expect(versioned.status).toBe(200);
            expect(await versioned.text()).toBe('{"locale":"cs","id":42}');
            expect(router.getRoute('v1:product')?.pattern).toBe('/v1/:locale/products/:id');
        });

        it('should register list routes without their children', () => {
            const detail = new Route('user:detail', '/users/:id', () => null, Method.Get);
            const list = new RouteList().addRoute(
                new Route('user:list', '/users', () => null, Method.Get, [detail])
            );

            router.addRouteList(list);

            expect(router.getRoute('user:list')?.child('user:detail')).toBe(detail);
            expect(router.getRoute('user:detail')).toBeUndefined();
        });
    });

    describe('handlers', () => {
        it('should pass raw string parameters to raw handlers', async () => {
            router.get('product', '/:locale/products/:id', raw((ctx) => ctx.params));

            const response = await router.fetch(request('/cs/products/42'));

            expect(await response.json()).toEqual({ locale: 'cs', id: '42' });
        });

        it('should expose the matched route on the context', async () => {
            router.get('product', '/:locale/products/:id', (ctx) => ctx.route);

            const response = await router.fetch(request('/en/products/1'));

            expect(await response.json()).toEqual({
                name: 'product',
                pattern: '/:locale/products/:id',
                method: 'GET',
            });
        });

        it('should use ctx.response status and headers', async () => {
            router.post('user:create', '/users', (ctx) => {
                ctx.response.status = 201;
                ctx.response.headers.set('Location', '/users/42');
                return { id: 42 };
            });

            const response = await router.fetch(request('/users', { method: 'POST' }));

            expect(response.status).toBe(201);
            expect(response.headers.get('Location')).toBe('/users/42');
            expect(await response.json()).toEqual({ id: 42 });
        });

        it('should send returned Responses unchanged', async () => {
            router.setErrorHandler(418, () => ({ error: 'intercepted' }));
            router.get('teapot', '/teapot', () => new Response('short and stout', { status: 418 }));

            const response = await router.fetch(request('/teapot'));

            expect(response.status).toBe(418);
            expect(await response.text()).toBe('short and stout');
        });

        it('should answer decode failures with 400 without calling the handler', async () => {
            const handler = vi.fn();
            router.get('product', '/:locale/products/:id', withParams(ProductParams, handler));

            const response = await router.fetch(request('/cs/products/abc'));
            const body = await response.json();

            expect(response.status).toBe(400);
            expect(handler).not.toHaveBeenCalled();
            expect(body).toEqual({
                error: 'Invalid path parameters',
                issues: [expect.objectContaining({ field: 'id', kind: 'invalid' })],
            });
        });

        it('should report placeholders the pattern does not provide as missing', async () => {
            router.get('thing', '/things/:slug', withParams(ProductParams, vi.fn()));

            const response = await router.fetch(request('/things/lamp'));
            const body = await response.json();

            expect(response.status).toBe(400);
            expect(body).toEqual({
                error: 'Invalid path parameters',
                issues: [
                    expect.objectContaining({ field: 'locale', kind: 'missing' }),
                    expect.objectContaining({ field: 'id', kind: 'missing' }),
                ],
            });
        });
    });

    describe('path segments', () => {
        it('should percent-decode segments before handlers see them', async () => {
            router.get('user', '/users/:name', (ctx) => ctx.params);

            const response = await router.fetch(request('/users/caf%C3%A9'));

            expect(await response.json()).toEqual({ name: 'café' });
        });

        it('should decode segments before schema decoding', async () => {
            router.get('product', '/:locale/products/:id', productHandler);

            const response = await router.fetch(request('/pt%2DBR/products/%34%32'));

            expect(await response.json()).toEqual({ locale: 'pt-BR', id: 42 });
        });

        it('should answer malformed escapes with 400 without calling the handler', async () => {
            const handler = vi.fn();
            router.get('user', '/users/:name', handler);

            const response = await router.fetch(request('/users/%E0%A4%A'));

            expect(response.status).toBe(400);
            expect(handler).not.toHaveBeenCalled();
            expect(await response.json()).toEqual({
                error: 'Invalid path parameters',
                issues: [{ field: 'name', kind: 'invalid', message: 'Malformed percent-encoding' }],
            });
        });

        it('should serve optional segments and generate URLs for them', async () => {
            router.get('user', '/users/:id?', (ctx) => ctx.params);

            const bare = await router.fetch(request('/users'));
            const withId = await router.fetch(request('/users/7'));

            expect(await bare.json()).toEqual({});
            expect(await withId.json()).toEqual({ id: '7' });
            expect(Either.getOrThrow(router.generateUrlByName('user', { id: 7 }))).toBe('/users/7');
            expect(Either.getOrThrow(router.generateUrlByName('user', {}))).toBe('/users');
        });
    });

    describe('response headers', () => {
        it('should keep every Set-Cookie header', async () => {
            router.get('login', '/login', (ctx) => {
                ctx.response.headers.append('Set-Cookie', 'a=1');
                ctx.response.headers.append('Set-Cookie', 'b=2');
                return { ok: true };
            });

            const response = await router.fetch(request('/login'));

            expect(response.headers.getSetCookie()).toEqual(['a=1', 'b=2']);
        });
    });

    describe('other request shapes', () => {
        it('should route verbs a fetch Request cannot carry', async () => {
            router.trace('trace', '/trace', (ctx) => ({ method: ctx.request.method }));
            router.connect('tunnel', '/tunnel', (ctx) => ({ method: ctx.request.method }));

            const trace = await router.fetch(new NodeRequest('TRACE', 'http://localhost/trace', new Headers()));
            const connect = await router.fetch(new NodeRequest('CONNECT', 'http://localhost/tunnel', new Headers()));

            expect(await trace.json()).toEqual({ method: 'TRACE' });
            expect(await connect.json()).toEqual({ method: 'CONNECT' });
        });
    });

    describe('createRoute', () => {
        it('should register a route with typed parameters', async () => {
            const result = createRoute(
                router,
                'test',
                '/test/:id',
                Schema.Struct({ id: Schema.NumberFromString }),
                (_ctx, params) => ({ id: params.id, doubled: params.id * 2 }),
                Method.Get
            );

            const response = await router.fetch(request('/test/21'));

            expect(result).toBe(router);
            expect(await response.json()).toEqual({ id: 21, doubled: 42 });
        });
    });

    describe('error handling', () => {
        it('should answer unmatched paths with the default 404 body', async () => {
            const response = await router.fetch(request('/nowhere'));

            expect(response.status).toBe(404);
            expect(response.headers.get('Content-Type')).toBe('application/json');
            expect(await response.json()).toEqual({ error: 'Not found' });
        });

        it('should answer unmatched paths with a custom 404 handler', async () => {
            router.setErrorHandler(404, () => ({ error: 'Custom 404' }));

            const response = await router.fetch(request('/nowhere'));

            expect(response.status).toBe(404);
            expect(await response.json()).toEqual({ error: 'Custom 404' });
        });

        it('should not route other methods of a registered path', async () => {
            router.get('health', '/health', () => 'ok');

            const response = await router.fetch(request('/health', { method: 'DELETE' }));

            expect(response.status).toBe(404);
        });

        it('should hand error statuses set by a handler to the error handler', async () => {
            router.setErrorHandler(404, () => ({ error: 'Custom 404' }));
            router.get('user', '/users/:id', (ctx) => {
                ctx.response.status = 404;
                return { ignored: true };
            });

            const response = await router.fetch(request('/users/9'));

            expect(response.status).toBe(404);
            expect(await response.json()).toEqual({ error: 'Custom 404' });
        });

        it('should give the error handler the status and returned body', async () => {
            const handler = vi.fn((ctx: ErrorContext) => ({ wrapped: ctx.body, status: ctx.status }));
            router.setErrorHandler(409, handler);
            router.put('user', '/users/:id', (ctx) => {
                ctx.response.status = 409;
                return { conflict: true };
            });

            const response = await router.fetch(request('/users/9', { method: 'PUT' }));

            expect(response.status).toBe(409);
            expect(await response.json()).toEqual({ wrapped: { conflict: true }, status: 409 });
            expect(handler.mock.calls[0][0].route?.name).toBe('user');
            expect(handler.mock.calls[0][0].error).toBeUndefined();
        });

        it('should use the default body for statuses without a handler', async () => {
            router.get('gone', '/gone', (ctx) => {
                ctx.response.status = 410;
            });

            const response = await router.fetch(request('/gone'));

            expect(response.status).toBe(410);
            expect(await response.json()).toEqual({
                error: 'An error occurred',
                description: 'No specific handler defined for this status',
            });
        });

        it('should answer thrown errors with 500', async () => {
            router.get('boom', '/boom', () => {
                throw new Error('boom');
            });

            const response = await router.fetch(request('/boom'));

            expect(response.status).toBe(500);
            expect(await response.json()).toEqual({
                error: 'An error occurred',
                description: 'No specific handler defined for this status',
            });
        });

        it('should use a custom 500 handler', async () => {
            const handler = vi.fn((ctx: ErrorContext) => ({
                error: 'Custom 500',
                message: ctx.error instanceof Error ? ctx.error.message : null,
            }));
            router.setErrorHandler(500, handler);
            router.get('boom', '/boom', async () => {
                throw new Error('boom');
            });

            const response = await router.fetch(request('/boom'));

            expect(response.status).toBe(500);
            expect(await response.json()).toEqual({ error: 'Custom 500', message: 'boom' });
        });

        it('should use the status and headers of thrown HTTP errors', async () => {
            router.get('secret', '/secret', () => {
                throw createHttpError(401, 'Unauthorized', { headers: { 'WWW-Authenticate': 'Bearer' } });
            });

            const response = await router.fetch(request('/secret'));

            expect(response.status).toBe(401);
            expect(response.headers.get('WWW-Authenticate')).toBe('Bearer');
            expect(await response.json()).toEqual({ error: 'Unauthorized' });
        });

        it('should pass decode errors to a custom 400 handler', async () => {
            const handler = vi.fn((ctx: ErrorContext) => ({
                decode: ctx.error instanceof DecodeError,
                fields: ctx.error instanceof DecodeError ? ctx.error.issues.map((issue) => issue.field) : [],
            }));
            router.setErrorHandler(400, handler);
            router.get('product', '/:locale/products/:id', productHandler);

            const response = await router.fetch(request('/cs/products/x'));

            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({ decode: true, fields: ['id'] });
        });

        it('should replace the default error handler', async () => {
            router.setDefaultErrorHandler((ctx) => ({ status: ctx.status }));

            const response = await router.fetch(request('/nowhere'));

            expect(await response.json()).toEqual({ status: 404 });
        });

        it('should answer with a fixed 500 when an error handler throws', async () => {
            router.setErrorHandler(404, () => {
                throw new Error('handler failed');
            });

            const response = await router.fetch(request('/nowhere'));

            expect(response.status).toBe(500);
            expect(await response.json()).toEqual({ error: 'Internal Server Error' });
        });

        it('should only accept error statuses', () => {
            expect(() => router.setErrorHandler(302, () => null)).toThrow(
                'Error handlers apply to statuses 400-599, got 302'
            );
            expect(() => router.setErrorHandler(600, () => null)).toThrow(ConfigurationError);
        });
    });

    describe('URL generation', () => {
        beforeEach(() => {
            router.get('product', '/:locale/products/:id', productHandler);
        });

        it('should build the path of a named route', () => {
            const url = router.generateUrlByName('product', { locale: 'cs', id: 42 });

            expect(Either.getOrThrow(url)).toBe('/cs/products/42');
        });

        it('should report unknown route names', () => {
            const error = Either.getOrThrow(Either.flip(router.generateUrlByName('missing', {})));

            expect(error).toBeInstanceOf(RouteNotFoundError);
            expect(error.message).toBe("Route with name 'missing' not found");
        });

        it('should report missing parameters', () => {
            const error = Either.getOrThrow(Either.flip(router.generateUrlByName('product', { locale: 'cs' })));

            expect(error).toBeInstanceOf(MissingParameterError);
        });

        it('should build paths from patterns', () => {
            expect(Either.getOrThrow(router.generateUrlByPattern('/users/:id', { id: 7 }))).toBe('/users/7');
        });

        it('should round-trip generated paths through the router', async () => {
            const path = Either.getOrThrow(router.generateUrlByName('product', { locale: 'de', id: 5 }));

            const response = await router.fetch(request(path));

            expect(await response.json()).toEqual({ locale: 'de', id: 5 });
        });
    });
});
