/**
 * @file WebSocket Connection Handler
 *
 * Per-connection handler mapping WebSocket messages to engine calls.
 *
 * A connection binds to one session with `open` (a known id resumes
 * that session). Engine telemetry for the bound session is forwarded as
 * unsolicited `telemetry` messages. Closing the socket cancels the
 * session's in-flight request; the session itself stays until the idle
 * sweep so a reconnecting client can resume it.
 *
 * @module
 */

import type { WebSocket } from 'ws';
import type { SessionExecutionEngine } from '../../core/engine/SessionExecutionEngine.js';
import type { EngineEvent, Result, SessionSnapshot } from '../../core/engine/types.js';
import { errorMessage_get } from '../../core/errors.js';
import { ClientMessageSchema, type ValidatedClientMessage } from '../protocol/schemas.js';
import type { ServerMessage } from '../protocol/types.js';

export interface WebSocketHandlerDeps {
    engine: SessionExecutionEngine;
}

let wsConnectionCounter = 0;

/**
 * Handle a single WebSocket connection.
 */
export function wsConnection_handle(ws: WebSocket, deps: WebSocketHandlerDeps): void {
    const connectionId: string = `ws-conn-${++wsConnectionCounter}`;
    const engine: SessionExecutionEngine = deps.engine;
    let sessionId: string | null = null;

    const send = (msg: ServerMessage): void => {
        if (ws.readyState === ws.OPEN) {
            ws.send(JSON.stringify(msg));
        }
    };

    // Forward engine telemetry scoped to the bound session.
    const unsubscribeTelemetry: () => void = engine.telemetry_subscribe((event: EngineEvent): void => {
        if (sessionId !== null && event.sessionId === sessionId) {
            send({ type: 'telemetry', payload: event });
        }
    });

    const session_require = (): string => {
        if (sessionId === null) {
            throw new Error("No session: send 'open' first");
        }
        return sessionId;
    };

    const message_dispatch = async (msg: ValidatedClientMessage): Promise<void> => {
        switch (msg.type) {
            case 'open': {
                const session: SessionSnapshot = engine.session_open(msg.sessionId);
                sessionId = session.id;
                console.log(`${connectionId}: bound to session ${session.id}`);
                send({ type: 'opened', id: msg.id, session, provider: engine.provider });
                break;
            }

            case 'command': {
                const result: Result = await engine.process(session_require(), msg.input);
                send({ type: 'result', id: msg.id, result });
                break;
            }

            case 'complete': {
                const candidates: string[] = await engine.complete(session_require(), msg.line);
                send({ type: 'completions', id: msg.id, candidates });
                break;
            }

            case 'history': {
                send({ type: 'history', id: msg.id, entries: [...engine.history(session_require())] });
                break;
            }

            case 'cancel': {
                send({ type: 'cancelled', id: msg.id, cancelled: engine.cancel(session_require()) });
                break;
            }
        }
    };

    ws.on('message', async (data: Buffer | string): Promise<void> => {
        // ── Boundary: parse + validate before touching any fields ────────────
        let raw: unknown;
        try {
            raw = JSON.parse(typeof data === 'string' ? data : data.toString());
        } catch {
            send({ type: 'error', id: 'unknown', message: 'Invalid JSON' });
            return;
        }

        const parsed = ClientMessageSchema.safeParse(raw);
        if (!parsed.success) {
            send({
                type: 'error',
                id: correlationId_get(raw),
                message: `Invalid message: ${parsed.error.issues.map(i => i.message).join(', ')}`
            });
            return;
        }

        const msg: ValidatedClientMessage = parsed.data;
        try {
            await message_dispatch(msg);
        } catch (e: unknown) {
            send({ type: 'error', id: msg.id, message: errorMessage_get(e) });
        }
    });

    ws.on('close', (): void => {
        unsubscribeTelemetry();
        if (sessionId !== null && engine.cancel(sessionId)) {
            console.log(`${connectionId}: cancelled in-flight request of ${sessionId}`);
        }
        console.log(`${connectionId}: disconnected`);
    });

    ws.on('error', (err: Error): void => {
        console.error(`${connectionId}: WebSocket error: ${err.message}`);
    });
}

/**
 * Extract the correlation id from an unvalidated message, so the client
 * can match an error to the failing request.
 */
function correlationId_get(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
        return raw.id;
    }
    return 'unknown';
}
