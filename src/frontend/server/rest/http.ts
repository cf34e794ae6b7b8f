/**
 * @file REST HTTP Helpers
 *
 * Transport-layer helpers used by REST route handlers.
 *
 * @module
 */

import http from 'http';
import type { z } from 'zod';

const CORS_HEADERS: Readonly<Record<string, string>> = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type'
};

/**
 * Request failure carrying the HTTP status it should be answered with.
 */
export class HttpError extends Error {
    constructor(public readonly status: number, message: string) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Parse a JSON request body.
 *
 * @param req - Incoming HTTP request.
 * @returns Parsed JSON payload; `{}` for an empty body.
 * @throws HttpError 400 when the body is not JSON.
 */
export async function body_parse(req: http.IncomingMessage): Promise<unknown> {
    return new Promise(
        (
            resolve: (value: unknown) => void,
            reject: (reason?: unknown) => void
        ): void => {
            let body: string = '';
            req.on('data', (chunk: Buffer | string): void => {
                body += chunk;
            });
            req.on('end', (): void => {
                try {
                    resolve(body ? JSON.parse(body) : {});
                } catch {
                    reject(new HttpError(400, 'Invalid JSON'));
                }
            });
            req.on('error', (error: Error): void => {
                reject(error);
            });
        }
    );
}

/**
 * Write a JSON response with standard CORS headers.
 *
 * @param res - HTTP response object.
 * @param data - Serializable response payload.
 * @param status - HTTP status code.
 */
export function json_send(res: http.ServerResponse, data: unknown, status: number = 200): void {
    res.writeHead(status, {
        'Content-Type': 'application/json',
        ...CORS_HEADERS
    });
    res.end(JSON.stringify(data, null, 2));
}

/**
 * Handle CORS preflight request.
 *
 * @param method - HTTP method.
 * @param res - HTTP response object.
 * @returns True if request was handled as preflight.
 */
export function corsPreflight_handle(method: string, res: http.ServerResponse): boolean {
    if (method !== 'OPTIONS') {
        return false;
    }

    res.writeHead(204, CORS_HEADERS);
    res.end();
    return true;
}

/**
 * Read a required query parameter.
 *
 * @throws HttpError 400 when it is missing or empty.
 */
export function queryParam_require(url: URL, key: string): string {
    const value: string | null = url.searchParams.get(key);
    if (!value) {
        throw new HttpError(400, `Missing "${key}" parameter`);
    }
    return value;
}

/**
 * Validate a parsed body against a schema.
 *
 * @throws HttpError 400 listing the schema issues.
 */
export function body_validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const result = schema.safeParse(body);
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new HttpError(400, `Invalid request body: ${issues}`);
    }
    return result.data;
}
