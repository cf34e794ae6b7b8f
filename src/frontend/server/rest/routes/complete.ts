/**
 * @file Completion Route
 *
 * @module
 */

import { json_send, queryParam_require } from '../http.js';
import type { RestRouteContext } from '../types.js';

/**
 * Handle `GET /api/complete?sessionId=…&line=…`.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_completeHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/api/complete' || context.method !== 'GET') {
        return false;
    }

    const sessionId: string = queryParam_require(context.url, 'sessionId');
    const line: string = context.url.searchParams.get('line') ?? '';
    json_send(context.res, { candidates: await context.engine.complete(sessionId, line) });
    return true;
}
