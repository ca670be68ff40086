/**
 * Error types raised while configuring a router or serving a request.
 * @module errors
 */

/**
 * Base class for every error this package raises.
 *
 * @category Errors
 */
export class RouterError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The router was configured in a way that cannot be served (invalid pattern,
 * rejected duplicate name, registration after build, bad listen address).
 *
 * Raised during setup; callers should let it abort startup.
 *
 * @category Errors
 */
export class ConfigurationError extends RouterError {}

/**
 * A handler value does not have one of the two supported shapes.
 *
 * @category Errors
 */
export class HandlerShapeError extends RouterError {}

/**
 * Why a single path parameter could not be decoded.
 *
 * - `missing` - a required field had no matching path segment
 * - `invalid` - the segment was present but could not be converted
 *
 * @category Errors
 */
export interface DecodeIssue {
    field: string;
    kind: 'missing' | 'invalid';
    message: string;
}

/**
 * Path parameters could not be decoded into the handler's parameter type.
 * Answered with HTTP 400; the route handler is never called.
 *
 * @category Errors
 */
export class DecodeError extends RouterError {
    readonly status = 400;
    readonly issues: readonly DecodeIssue[];

    constructor(issues: readonly DecodeIssue[], options?: ErrorOptions) {
        super('Invalid path parameters', options);
        this.issues = issues;
    }
}

/**
 * @category Errors
 */
export class RouteNotFoundError extends RouterError {
    readonly routeName: string;

    constructor(routeName: string) {
        super(`Route with name '${routeName}' not found`);
        this.routeName = routeName;
    }
}

/**
 * A pattern placeholder had no value in the parameters given to the URL generator.
 *
 * @category Errors
 */
export class MissingParameterError extends RouterError {
    readonly parameter: string;
    readonly pattern: string;

    constructor(parameter: string, pattern: string) {
        super(`Missing value for parameter '${parameter}' in pattern '${pattern}'`);
        this.parameter = parameter;
        this.pattern = pattern;
    }
}

/**
 * @category Errors
 */
export class ListenError extends RouterError {
    readonly address: string;

    constructor(address: string, cause: unknown) {
        super(`Failed to listen on '${address}': ${cause instanceof Error ? cause.message : String(cause)}`, {
            cause,
        });
        this.address = address;
    }
}
