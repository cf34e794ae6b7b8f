/**
 * @file Catalog Route
 *
 * @module
 */

import { json_send } from '../http.js';
import type { RestRouteContext } from '../types.js';

/**
 * Handle `GET /api/commands`: the command catalog in catalog order.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_commandsHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/api/commands' || context.method !== 'GET') {
        return false;
    }

    json_send(context.res, { commands: context.engine.commands.specs_list() });
    return true;
}
