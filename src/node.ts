import { createServer, STATUS_CODES, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import type { HttpRequest } from './context.js';
import { ConfigurationError, ListenError } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Anything that answers a request with a fetch Response
 * @category Server
 */
export type FetchHandler = (request: HttpRequest) => Promise<Response>;

/**
 * @category Server
 */
export interface ListenAddress {
    /** Interface to bind; undefined binds all interfaces */
    host?: string;
    port: number;
}

const DEFAULT_PORT = 8080;

/**
 * Parse a listen address of the form `host:port`, `:port`, `port`, or an
 * empty string (port 8080 on all interfaces). IPv6 hosts are written in
 * brackets, e.g. `[::1]:3000`.
 *
 * @throws ConfigurationError when the port is not an integer between 0 and 65535
 *
 * @category Server
 */
export function parseAddress(address: string): ListenAddress {
    const trimmed = address.trim();
    if (trimmed === '') {
        return { port: DEFAULT_PORT };
    }

    const separator = trimmed.lastIndexOf(':');
    const hostPart = separator === -1 ? '' : trimmed.slice(0, separator);
    const portPart = separator === -1 ? trimmed : trimmed.slice(separator + 1);

    const port = Number(portPart);
    if (portPart === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigurationError(`Invalid listen address '${address}'`);
    }

    const host = hostPart.replace(/^\[(.*)\]$/, '$1');
    return host === '' ? { port } : { host, port };
}

/**
 * Request built from a Node.js request, with its body buffered.
 *
 * @category Server
 */
export class NodeRequest implements HttpRequest {
    readonly method: string;
    readonly url: string;
    readonly headers: Headers;
    private readonly body: Buffer;

    constructor(method: string, url: string, headers: Headers, body: Buffer = Buffer.alloc(0)) {
        this.method = method;
        this.url = url;
        this.headers = headers;
        this.body = body;
    }

    async text(): Promise<string> {
        return this.body.toString('utf8');
    }

    async json(): Promise<unknown> {
        return JSON.parse(await this.text());
    }
}

const BODYLESS_METHODS = new Set(['GET', 'HEAD', 'CONNECT']);

/**
 * Convert a Node.js request into a router request. Bodies are buffered for
 * every method except GET, HEAD and CONNECT.
 *
 * @category Server
 */
export async function toRouterRequest(req: IncomingMessage): Promise<NodeRequest> {
    const host = req.headers.host ?? 'localhost';
    const target = req.url ?? '/';
    // CONNECT targets may be in authority form (host:port)
    const url = target.startsWith('/') ? new URL(target, `http://${host}`) : new URL(`http://${target}`);
    const method = req.method ?? 'GET';

    const headers = new Headers();
    for (const [key, value] of Object.entries(req.headers)) {
        if (Array.isArray(value)) {
            value.forEach((item) => headers.append(key, item));
        } else if (value !== undefined) {
            headers.set(key, value);
        }
    }

    if (BODYLESS_METHODS.has(method)) {
        return new NodeRequest(method, url.href, headers);
    }

    const chunks: Buffer[] = [];
    for await (const chunk of req) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return new NodeRequest(method, url.href, headers, Buffer.concat(chunks));
}

/**
 * Response headers as name/value pairs, one pair per Set-Cookie value
 */
function headerPairs(headers: Headers): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    headers.forEach((value, key) => {
        if (key !== 'set-cookie') {
            pairs.push([key, value]);
        }
    });
    for (const cookie of headers.getSetCookie()) {
        pairs.push(['set-cookie', cookie]);
    }
    return pairs;
}

/**
 * Write a fetch Response to a Node.js response and end it.
 *
 * @category Server
 */
export async function writeWebResponse(res: ServerResponse, response: Response): Promise<void> {
    res.statusCode = response.status;
    if (response.statusText) {
        res.statusMessage = response.statusText;
    }
    for (const [key, value] of headerPairs(response.headers)) {
        res.appendHeader(key, value);
    }

    const body = Buffer.from(await response.arrayBuffer());
    res.end(body);
}

/**
 * Write a fetch Response as a raw HTTP/1.1 message to a socket and end it.
 * Used for CONNECT requests, which Node.js hands over without a ServerResponse.
 *
 * @category Server
 */
export async function writeRawResponse(socket: Duplex, response: Response): Promise<void> {
    const body = Buffer.from(await response.arrayBuffer());
    const reason = response.statusText || (STATUS_CODES[response.status] ?? '');

    const lines = [`HTTP/1.1 ${response.status} ${reason}`];
    for (const [key, value] of headerPairs(response.headers)) {
        if (key !== 'content-length') {
            lines.push(`${key}: ${value}`);
        }
    }
    lines.push(`content-length: ${body.length}`, '', '');

    socket.end(Buffer.concat([Buffer.from(lines.join('\r\n'), 'latin1'), body]));
}

/**
 * Build a `node:http` request listener around a fetch handler.
 *
 * Failures inside the bridge are logged and answered with a plain 500.
 *
 * @category Server
 */
export function createRequestListener(
    handler: FetchHandler,
    log: Logger
): (req: IncomingMessage, res: ServerResponse) => void {
    return (req, res) => {
        toRouterRequest(req)
            .then(handler)
            .then((response) => writeWebResponse(res, response))
            .catch((error: unknown) => {
                log.error('Failed to serve %s %s: %s', req.method, req.url, error);
                if (!res.headersSent) {
                    res.writeHead(500, { 'Content-Type': 'text/plain' });
                }
                res.end('Internal Server Error');
            });
    };
}

/**
 * Build a listener for the server's `'connect'` event, answering CONNECT
 * requests through the same fetch handler. The socket is closed after the
 * response; no tunnel is opened.
 *
 * @category Server
 */
export function createConnectListener(
    handler: FetchHandler,
    log: Logger
): (req: IncomingMessage, socket: Duplex) => void {
    return (req, socket) => {
        socket.on('error', (error: Error) => {
            log.debug('Socket error on CONNECT %s: %s', req.url, error);
        });
        toRouterRequest(req)
            .then(handler)
            .then((response) => writeRawResponse(socket, response))
            .catch((error: unknown) => {
                log.error('Failed to serve CONNECT %s: %s', req.url, error);
                socket.end('HTTP/1.1 500 Internal Server Error\r\ncontent-length: 0\r\n\r\n');
            });
    };
}

/**
 * Start an HTTP server for a fetch handler.
 *
 * @returns the server, once it is listening
 * @throws ListenError when the server cannot listen on the address
 *
 * @category Server
 */
export async function listen(handler: FetchHandler, address: string, log: Logger): Promise<Server> {
    const { host, port } = parseAddress(address);
    const server = createServer(createRequestListener(handler, log));
    server.on('connect', createConnectListener(handler, log));

    await new Promise<void>((resolve, reject) => {
        const onError = (error: Error): void => {
            reject(new ListenError(address, error));
        };
        server.once('error', onError);
        server.listen(port, host, () => {
            server.off('error', onError);
            server.on('error', (error: Error) => {
                log.error('Server error on %s: %s', address, error);
            });
            resolve();
        });
    });

    log.info('Listening on %s', address === '' ? `:${DEFAULT_PORT}` : address);
    return server;
}

/**
 * Resolve once `server` closes; reject with ListenError if it fails first.
 *
 * @category Server
 */
export function serveUntilClosed(server: Server, address: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.once('close', () => resolve());
        server.once('error', (error: Error) => reject(new ListenError(address, error)));
    });
}
