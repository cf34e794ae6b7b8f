/**
 * @file Command Route
 *
 * Handles command execution endpoint.
 *
 * @module
 */

import { z } from 'zod';
import type { Result } from '../../../../core/engine/types.js';
import { body_parse, body_validate, json_send } from '../http.js';
import type { RestRouteContext } from '../types.js';

const CommandBodySchema = z.object({
    sessionId: z.string().min(1),
    input: z.string()
});

/**
 * Handle `POST /api/command`. Command failures are still HTTP 200: the
 * Result carries the exit code.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_commandHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname !== '/api/command' || context.method !== 'POST') {
        return false;
    }

    const body = body_validate(CommandBodySchema, await body_parse(context.req));
    const result: Result = await context.engine.process(body.sessionId, body.input);
    json_send(context.res, result);
    return true;
}
