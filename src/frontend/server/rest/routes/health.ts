/**
 * @file Health Route
 *
 * Handles root health/status endpoint.
 *
 * @module
 */

import { VERSION } from '../../../../version.js';
import { json_send } from '../http.js';
import type { RestRouteContext } from '../types.js';

export const HEALTH_ENDPOINTS: readonly string[] = [
    'POST   /api/sessions',
    'GET    /api/sessions/:id',
    'DELETE /api/sessions/:id',
    'POST   /api/command',
    'GET    /api/complete',
    'GET    /api/history',
    'GET    /api/commands',
    'WS     /nlterm/ws'
];

/**
 * Handle root service health endpoint.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_healthHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/' || context.method !== 'GET') {
        return false;
    }

    json_send(context.res, {
        service: 'nlterm server',
        version: VERSION,
        status: 'running',
        provider: context.engine.provider,
        sessions: context.engine.sessions_list().length,
        endpoints: HEALTH_ENDPOINTS
    });
    return true;
}
