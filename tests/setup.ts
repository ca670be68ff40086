import type { AddressInfo } from 'node:net';
import { request, type IncomingHttpHeaders, type Server } from 'node:http';
import type { NamedRouter } from '../src/index.js';

export interface ServerFixture {
    server: Server;
    baseUrl: string;
    close(): Promise<void>;
}

/**
 * Serve a router on an ephemeral loopback port
 */
export async function startServer(router: NamedRouter): Promise<ServerFixture> {
    const server = await router.listen('127.0.0.1:0');
    const { port } = boundAddress(server);

    return {
        server,
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => (error ? reject(error) : resolve()));
            }),
    };
}

export function boundAddress(server: Server): AddressInfo {
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address;
}

export interface RawResponse {
    status: number;
    headers: IncomingHttpHeaders;
    body: string;
}

/**
 * Send a request with `node:http`, for verbs the fetch client refuses.
 * CONNECT responses arrive on the `'connect'` event with the socket handed over.
 */
export function sendRaw(baseUrl: string, method: string, path: string): Promise<RawResponse> {
    const { hostname, port } = new URL(baseUrl);

    return new Promise<RawResponse>((resolve, reject) => {
        const req = request({ hostname, port, method, path });
        req.on('error', reject);
        req.on('response', (res) => {
            const chunks: Buffer[] = [];
            res.on('data', (chunk: Buffer) => chunks.push(chunk));
            res.on('error', reject);
            res.on('end', () =>
                resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString() })
            );
        });
        req.on('connect', (res, socket, head) => {
            const chunks: Buffer[] = [head];
            socket.on('data', (chunk: Buffer) => chunks.push(chunk));
            socket.on('error', reject);
            socket.on('end', () =>
                resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString() })
            );
        });
        req.end();
    });
}
