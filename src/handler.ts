import { Either, ParseResult, Schema, SchemaAST } from 'effect';
import type { Context, Params } from './context.js';
import { DecodeError, HandlerShapeError, type DecodeIssue } from './errors.js';

/**
 * Handler that receives only the request context.
 *
 * The return value becomes the JSON response body; returning a `Response`
 * sends it unchanged.
 *
 * @category Handlers
 */
export type RawHandlerFn = (ctx: Context) => unknown;

/**
 * Handler that receives the request context and its decoded path parameters.
 *
 * @category Handlers
 */
export type ParamHandlerFn<A> = (ctx: Context, params: A) => unknown;

/**
 * @category Handlers
 */
export interface RawHandler {
    readonly kind: 'raw';
    handle(ctx: Context): unknown;
}

/**
 * @category Handlers
 */
export interface ParamHandler<A> {
    readonly kind: 'params';
    readonly decode: (params: Params) => Either.Either<A, DecodeError>;
    handle(ctx: Context, params: A): unknown;
}

/**
 * A route handler, tagged with its calling convention.
 *
 * @category Handlers
 */
export type Handler = RawHandler | ParamHandler<unknown>;

/**
 * Anything registration accepts as a handler; a bare function is a raw handler.
 *
 * @category Handlers
 */
export type HandlerInput = Handler | RawHandlerFn;

/**
 * Normalized per-request invocation produced by {@link adaptHandler}
 *
 * @category Handlers
 */
export type Dispatch = (ctx: Context) => Promise<unknown>;

/**
 * Path parameter schema: decodes a struct of path segment strings into `A`.
 *
 * @category Handlers
 */
export type ParamsSchema<A, I extends Readonly<Record<string, string | undefined>>> = Schema.Schema<A, I, never>;

/**
 * Wrap a context-only handler.
 *
 * @category Handlers
 */
export function raw(fn: RawHandlerFn): RawHandler {
    if (typeof fn !== 'function') {
        throw new HandlerShapeError(`Handler must be a function, got ${typeof fn}`);
    }
    return { kind: 'raw', handle: fn };
}

/**
 * Wrap a handler whose path parameters are decoded before it runs.
 *
 * Each struct field names a path placeholder. Fields are required unless
 * wrapped in `Schema.optional`; conversions such as `Schema.NumberFromString`
 * run during decoding.
 *
 * @throws HandlerShapeError when the schema's encoded side is not a struct
 *
 * @category Handlers
 *
 * @example
 * ```typescript
 * const ProductParams = Schema.Struct({
 *     locale: Schema.String,
 *     id: Schema.NumberFromString.pipe(Schema.int()),
 * });
 *
 * router.get('product:detail', '/:locale/products/:id', withParams(ProductParams, (ctx, params) => {
 *     return { locale: params.locale, id: params.id };
 * }));
 * ```
 */
export function withParams<A, I extends Readonly<Record<string, string | undefined>>>(
    schema: ParamsSchema<A, I>,
    fn: ParamHandlerFn<A>
): ParamHandler<A> {
    if (typeof fn !== 'function') {
        throw new HandlerShapeError(`Handler must be a function, got ${typeof fn}`);
    }
    if (!Schema.isSchema(schema)) {
        throw new HandlerShapeError('Handler parameters must be described by a Schema');
    }
    const encoded = SchemaAST.encodedAST(schema.ast);
    if (!SchemaAST.isTypeLiteral(encoded)) {
        throw new HandlerShapeError(
            `Handler parameters must decode from a struct of path segments, got ${encoded._tag}`
        );
    }

    const decodeParams = Schema.decodeUnknownEither(schema, { errors: 'all' });

    return {
        kind: 'params',
        decode: (params) => Either.mapLeft(decodeParams(params), toDecodeError),
        handle: fn,
    };
}

/**
 * Normalize a registration argument into a tagged handler.
 *
 * @throws HandlerShapeError for anything that is neither a function nor a tagged handler
 */
export function toHandler(input: HandlerInput): Handler {
    if (typeof input === 'function') {
        return raw(input);
    }
    if (input?.kind === 'raw' || input?.kind === 'params') {
        return input;
    }
    throw new HandlerShapeError('Handler must be a function or a value built with raw() or withParams()');
}

/**
 * Produce the per-request dispatch function for a handler.
 *
 * The calling convention is settled here, once. For parameterized handlers
 * the wrapper decodes `ctx.params` first and throws the DecodeError without
 * calling the handler when decoding fails.
 *
 * @category Handlers
 */
export function adaptHandler(handler: Handler): Dispatch {
    switch (handler.kind) {
        case 'raw':
            return async (ctx) => handler.handle(ctx);
        case 'params':
            return async (ctx) => {
                const decoded = handler.decode(ctx.params);
                if (Either.isLeft(decoded)) {
                    throw decoded.left;
                }
                return handler.handle(ctx, decoded.right);
            };
        default:
            throw new HandlerShapeError('Unknown handler kind');
    }
}

function toDecodeError(error: ParseResult.ParseError): DecodeError {
    const issues = ParseResult.ArrayFormatter.formatErrorSync(error).map(
        (issue): DecodeIssue => ({
            field: issue.path.map((key) => String(key)).join('.'),
            kind: issue._tag === 'Missing' ? 'missing' : 'invalid',
            message: issue.message,
        })
    );
    return new DecodeError(issues, { cause: error });
}
