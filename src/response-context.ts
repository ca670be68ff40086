/**
 * ResponseContext holds the response status and headers a handler decides on
 * before the final Response is written.
 *
 * Handlers never commit the response themselves. Setting a status of 400 or
 * above hands the body over to the router's error handlers.
 *
 * @category Response
 *
 * @example
 * ```typescript
 * router.post('user:create', '/users', (ctx) => {
 *     ctx.response.status = 201;
 *     ctx.response.headers.set('Location', '/users/42');
 *     return { id: 42 };
 * });
 * ```
 */
export class ResponseContext {
    /**
     * HTTP status code for the response
     * @default 200
     */
    status: number = 200;

    /**
     * HTTP status text; empty means the transport's default reason phrase
     * @default ''
     */
    statusText: string = '';

    /**
     * Headers to include in the response
     * Works like Response.headers - use .set(), .append(), .delete(), etc.
     */
    headers: Headers;

    constructor() {
        this.headers = new Headers();
    }

    /**
     * Whether the current status will be answered by an error handler
     */
    get isError(): boolean {
        return this.status >= 400;
    }
}
