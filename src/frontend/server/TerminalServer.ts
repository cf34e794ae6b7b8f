/**
 * @file Terminal Server
 *
 * Combined HTTP + WebSocket server in front of one SessionExecutionEngine.
 * REST serves stateless clients; the WebSocket carries interactive
 * sessions with live telemetry.
 *
 * @module
 */

import http from 'http';
import type { Socket } from 'net';
import { WebSocketServer, type WebSocket } from 'ws';
import type { EngineConfig } from '../../config/settings.js';
import type { SessionExecutionEngine } from '../../core/engine/SessionExecutionEngine.js';
import type { EngineEvent } from '../../core/engine/types.js';
import { VERSION } from '../../version.js';
import { restRequest_handle } from './RestHandler.js';
import { json_send } from './rest/http.js';
import { HEALTH_ENDPOINTS } from './rest/routes/health.js';
import type { RestHandlerDeps } from './rest/types.js';
import { wsConnection_handle } from './WebSocketHandler.js';

export const WS_PATH: string = '/nlterm/ws';

export interface TerminalServerHandle {
    server: http.Server;
    wss: WebSocketServer;
    /** Stop accepting connections and dispose of the engine. */
    close: () => Promise<void>;
}

/**
 * Create and start a terminal server with REST + WebSocket support.
 *
 * @param engine - Engine serving every connection.
 * @param config - Resolved configuration; host and port are used here.
 */
export function terminalServer_start(engine: SessionExecutionEngine, config: EngineConfig): TerminalServerHandle {
    const { host, port } = config;
    const deps: RestHandlerDeps = { engine, host, port };

    const server: http.Server = http.createServer(async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
        const handled: boolean = await restRequest_handle(req, res, deps);
        if (!handled) {
            json_send(res, { error: 'Not found', path: req.url }, 404);
        }
    });

    const wss: WebSocketServer = new WebSocketServer({ noServer: true });

    server.on('upgrade', (req: http.IncomingMessage, socket: Socket, head: Buffer): void => {
        const url: URL = new URL(req.url || '/', `http://${host}:${port}`);
        if (url.pathname === WS_PATH) {
            // Flush each frame on its own so telemetry arrives as it happens.
            socket.setNoDelay(true);
            wss.handleUpgrade(req, socket, head, (ws: WebSocket): void => {
                wss.emit('connection', ws, req);
            });
        } else {
            socket.destroy();
        }
    });

    wss.on('connection', (ws: WebSocket): void => {
        console.log(`WebSocket client connected (total: ${wss.clients.size})`);
        wsConnection_handle(ws, { engine });
    });

    const unsubscribe: () => void = engine.telemetry_subscribe((event: EngineEvent): void => {
        if (event.type === 'session' && event.action === 'expired') {
            console.log(`Session ${event.sessionId} expired after inactivity`);
        } else if (event.type === 'log' && event.level !== 'info') {
            console.warn(`[${event.level}] ${event.sessionId ?? '-'}: ${event.message}`);
        }
    });
    engine.sweeper_start();

    server.listen(port, host, (): void => {
        console.log(banner_render(config));
    });

    const close = (): Promise<void> => new Promise((resolve: () => void, reject: (reason?: unknown) => void): void => {
        unsubscribe();
        engine.dispose();
        for (const client of wss.clients) {
            client.terminate();
        }
        wss.close();
        server.close((error?: Error): void => {
            if (error) {
                reject(error);
                return;
            }
            resolve();
        });
    });

    return { server, wss, close };
}

/**
 * Startup banner.
 */
export function banner_render(config: EngineConfig): string {
    const innerWidth: number = 64;
    const line_format: (text: string) => string = (text: string): string => {
        const label: string = `  ${text}`;
        const padding: string = ' '.repeat(Math.max(0, innerWidth - label.length));
        return `║${label}${padding}║`;
    };

    return `
╔${'═'.repeat(innerWidth)}╗
${line_format(`NLTERM SERVER V${VERSION}`)}
╚${'═'.repeat(innerWidth)}╝

Listening on http://${config.host}:${config.port}
WebSocket:   ws://${config.host}:${config.port}${WS_PATH}
Translator:  ${config.provider}${config.model ? ` (${config.model})` : ''}
Start cwd:   ${config.cwd}

Endpoints:
${HEALTH_ENDPOINTS.map((endpoint: string): string => `  ${endpoint}`).join('\n')}

Press Ctrl+C to stop.
`;
}
