/**
 * @file Session Routes
 *
 * Open, inspect and close engine sessions.
 *
 * @module
 */

import { z } from 'zod';
import type { SessionSnapshot } from '../../../../core/engine/types.js';
import { body_parse, body_validate, HttpError, json_send } from '../http.js';
import type { RestRouteContext } from '../types.js';

const OpenSessionBodySchema = z.object({
    sessionId: z.string().min(1).max(128).optional()
});

const SESSION_PATH: RegExp = /^\/api\/sessions\/([^/]+)$/;

/**
 * Handle `POST /api/sessions`, `GET /api/sessions/:id` and `DELETE /api/sessions/:id`.
 *
 * @param context - Route context.
 * @returns True if handled.
 */
export async function route_sessionHandle(context: RestRouteContext): Promise<boolean> {
    if (context.pathname === '/api/sessions' && context.method === 'POST') {
        const body = body_validate(OpenSessionBodySchema, await body_parse(context.req));
        const known: boolean = body.sessionId !== undefined && context.engine.session_get(body.sessionId) !== null;
        const session: SessionSnapshot = context.engine.session_open(body.sessionId);
        json_send(context.res, { session, provider: context.engine.provider }, known ? 200 : 201);
        return true;
    }

    const match: RegExpMatchArray | null = context.pathname.match(SESSION_PATH);
    if (!match) {
        return false;
    }
    const sessionId: string = sessionId_decode(match[1]);

    if (context.method === 'GET') {
        const session: SessionSnapshot | null = context.engine.session_get(sessionId);
        if (!session) {
            throw new HttpError(404, `Unknown session: ${sessionId}`);
        }
        json_send(context.res, { session });
        return true;
    }

    if (context.method === 'DELETE') {
        if (!context.engine.session_close(sessionId)) {
            throw new HttpError(404, `Unknown session: ${sessionId}`);
        }
        json_send(context.res, { closed: sessionId });
        return true;
    }

    return false;
}

function sessionId_decode(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        throw new HttpError(400, `Invalid session id: ${segment}`);
    }
}
