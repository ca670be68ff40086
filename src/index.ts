/**
 * @packageDocumentation
 * Named, nestable HTTP routes on top of itty-router, with typed path parameters,
 * URL generation from route names, and per-status error handlers.
 *
 * @example
 * ```typescript
 * import { Schema } from 'effect';
 * import { NamedRouter, RouteList, Method, withParams } from 'named-router';
 *
 * const ProductParams = Schema.Struct({
 *     locale: Schema.String,
 *     id: Schema.NumberFromString,
 * });
 *
 * const products = new RouteList('/v1')
 *     .add('product', '/:locale/products/:id', withParams(ProductParams, (ctx, p) => p), Method.Get);
 *
 * const router = new NamedRouter({ name: 'catalog' }).addRouteList(products);
 * await router.run(':8080');
 * ```
 */

export * from './config.js';
export * from './context.js';
export * from './errors.js';
export * from './handler.js';
export * from './logger.js';
export * from './method.js';
export * from './node.js';
export * from './response-context.js';
export * from './route.js';
export * from './router.js';
export * from './url.js';
