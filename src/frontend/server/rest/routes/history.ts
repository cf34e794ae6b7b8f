/**
 * @file History Route
 *
 * @module
 */

import type { HistoryEntry } from '../../../../core/engine/types.js';
import { HttpError, json_send, queryParam_require } from '../http.js';
import type { RestRouteContext } from '../types.js';

/**
 * Handle `GET /api/history?sessionId=…`.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_historyHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/api/history' || context.method !== 'GET') {
        return false;
    }

    const sessionId: string = queryParam_require(context.url, 'sessionId');
    if (!context.engine.session_get(sessionId)) {
        throw new HttpError(404, `Unknown session: ${sessionId}`);
    }
    const entries: HistoryEntry[] = [...context.engine.history(sessionId)];
    json_send(context.res, { entries });
    return true;
}
