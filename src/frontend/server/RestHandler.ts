/**
 * @file REST Route Handler
 *
 * Dispatches HTTP requests to the route modules under `rest/routes`.
 * Thrown `HttpError`s answer with their status; anything else is a 500.
 *
 * @module
 */

import http from 'http';
import { corsPreflight_handle, HttpError, json_send } from './rest/http.js';
import { route_commandHandle } from './rest/routes/command.js';
import { route_commandsHandle } from './rest/routes/commands.js';
import { route_completeHandle } from './rest/routes/complete.js';
import { route_healthHandle } from './rest/routes/health.js';
import { route_historyHandle } from './rest/routes/history.js';
import { route_sessionHandle } from './rest/routes/session.js';
import type { RestHandlerDeps, RestRouteContext, RestRouteHandler } from './rest/types.js';
import { errorMessage_get } from '../../core/errors.js';

const ROUTES: readonly RestRouteHandler[] = [
    route_sessionHandle,
    route_commandHandle,
    route_completeHandle,
    route_historyHandle,
    route_commandsHandle,
    route_healthHandle
];

/**
 * Handle HTTP REST API requests.
 * Returns true if the request was handled, false if it should fall through.
 */
export async function restRequest_handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    deps: RestHandlerDeps
): Promise<boolean> {
    const url: URL = new URL(req.url || '/', `http://${deps.host}:${deps.port}`);
    const method: string = req.method || 'GET';

    if (corsPreflight_handle(method, res)) {
        return true;
    }

    const context: RestRouteContext = {
        req,
        res,
        deps,
        url,
        pathname: url.pathname,
        method,
        engine: deps.engine
    };

    try {
        for (const route of ROUTES) {
            if (await route(context)) {
                return true;
            }
        }
    } catch (e: unknown) {
        if (e instanceof HttpError) {
            json_send(res, { error: e.message }, e.status);
        } else {
            console.error(`REST ${method} ${url.pathname} failed: ${errorMessage_get(e)}`);
            json_send(res, { error: errorMessage_get(e) }, 500);
        }
        return true;
    }

    // Not handled: fall through to 404
    return false;
}
