/**
 * @file Terminal WebSocket Client
 *
 * WebSocket transport used by the console front-end in remote mode.
 * Provides typed request/response matching via correlation IDs and a
 * Promise-based API over the server's session operations.
 *
 * @module
 */

import WebSocket from 'ws';
import type { EngineEvent, Result, SessionSnapshot } from '../../core/engine/types.js';
import { DEFAULT_HOST, DEFAULT_PORT } from '../../config/settings.js';
import { ServerMessageSchema } from '../protocol/schemas.js';
import type { ClientMessage, ReplyMessage, ServerMessage } from '../protocol/types.js';
import { messageId_generate } from '../protocol/types.js';

export interface TerminalClientOptions {
    url?: string;
    host?: string;
    port?: number;
    /** Per-request reply timeout. */
    timeoutMs?: number;
}

export interface OpenedSession {
    session: SessionSnapshot;
    provider: string;
}

interface PendingRequest {
    resolve: (msg: ReplyMessage) => void;
    reject: (err: Error) => void;
    timer: NodeJS.Timeout;
}

/**
 * WebSocket client for communicating with TerminalServer.
 */
export class TerminalClient {
    private ws: WebSocket | null = null;
    private pending: Map<string, PendingRequest> = new Map();
    private readonly url: string;
    private readonly timeout: number;

    /** Live telemetry listener for the bound session. */
    public onTelemetry: ((event: EngineEvent) => void) | null = null;

    constructor(options: TerminalClientOptions = {}) {
        if (options.url) {
            this.url = options.url;
        } else {
            const host: string = options.host || process.env.NLTERM_HOST || DEFAULT_HOST;
            const port: number = options.port || Number.parseInt(process.env.NLTERM_PORT || String(DEFAULT_PORT), 10);
            this.url = `ws://${host}:${port}/nlterm/ws`;
        }
        this.timeout = options.timeoutMs ?? 60000;
    }

    /**
     * Connect to the server's WebSocket endpoint.
     */
    async connect(): Promise<void> {
        return new Promise((resolve: () => void, reject: (reason?: unknown) => void): void => {
            const ws: WebSocket = new WebSocket(this.url);
            this.ws = ws;

            ws.on('open', (): void => {
                resolve();
            });

            ws.on('message', (data: Buffer | string): void => {
                this.message_receive(typeof data === 'string' ? data : data.toString());
            });

            ws.on('close', (): void => {
                for (const [id, pending] of this.pending) {
                    clearTimeout(pending.timer);
                    pending.reject(new Error('Connection closed'));
                    this.pending.delete(id);
                }
                this.ws = null;
            });

            ws.on('error', (err: Error): void => {
                if (ws.readyState === WebSocket.CONNECTING || ws.readyState === WebSocket.CLOSED) {
                    reject(new Error(`Connection failed: ${err.message}`));
                }
            });
        });
    }

    /**
     * Disconnect from the server. The server cancels any in-flight request.
     */
    disconnect(): void {
        if (this.ws) {
            this.ws.close();
            this.ws = null;
        }
    }

    get connected(): boolean {
        return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
    }

    /**
     * Bind this connection to a session.
     *
     * @param sessionId - Existing id to resume; omitted for a new session.
     */
    async session_open(sessionId?: string): Promise<OpenedSession> {
        const reply: ReplyMessage = await this.request({ type: 'open', id: messageId_generate(), sessionId });
        if (reply.type !== 'opened') throw reply_error(reply);
        return { session: reply.session, provider: reply.provider };
    }

    async command_send(input: string): Promise<Result> {
        const reply: ReplyMessage = await this.request({ type: 'command', id: messageId_generate(), input });
        if (reply.type !== 'result') throw reply_error(reply);
        return reply.result;
    }

    async complete(line: string): Promise<string[]> {
        const reply: ReplyMessage = await this.request({ type: 'complete', id: messageId_generate(), line });
        if (reply.type !== 'completions') throw reply_error(reply);
        return reply.candidates;
    }

    /**
     * Cancel the session's in-flight request.
     *
     * @returns False when nothing was in flight.
     */
    async cancel(): Promise<boolean> {
        const reply: ReplyMessage = await this.request({ type: 'cancel', id: messageId_generate() });
        if (reply.type !== 'cancelled') throw reply_error(reply);
        return reply.cancelled;
    }

    /**
     * Route one inbound frame to its pending request or the telemetry listener.
     */
    message_receive(text: string): void {
        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            console.warn('Ignoring non-JSON server message');
            return;
        }
        const parsed = ServerMessageSchema.safeParse(raw);
        if (!parsed.success) {
            console.warn(`Ignoring malformed server message: ${parsed.error.issues.map(i => i.message).join(', ')}`);
            return;
        }

        const msg: ServerMessage = parsed.data;
        if (msg.type === 'telemetry') {
            this.onTelemetry?.(msg.payload);
            return;
        }

        const pending: PendingRequest | undefined = this.pending.get(msg.id);
        if (pending) {
            clearTimeout(pending.timer);
            this.pending.delete(msg.id);
            pending.resolve(msg);
        }
    }

    /**
     * Send a typed message and wait for the correlated response.
     */
    private async request(msg: ClientMessage): Promise<ReplyMessage> {
        const ws: WebSocket | null = this.ws;
        if (!ws || ws.readyState !== WebSocket.OPEN) {
            throw new Error('Not connected');
        }

        return new Promise((resolve: (msg: ReplyMessage) => void, reject: (err: Error) => void): void => {
            const timer: NodeJS.Timeout = setTimeout((): void => {
                this.pending.delete(msg.id);
                reject(new Error('Request timeout'));
            }, this.timeout);

            this.pending.set(msg.id, { resolve, reject, timer });
            ws.send(JSON.stringify(msg));
        });
    }
}

function reply_error(reply: ReplyMessage): Error {
    return reply.type === 'error' ? new Error(reply.message) : new Error(`Unexpected reply '${reply.type}'`);
}
