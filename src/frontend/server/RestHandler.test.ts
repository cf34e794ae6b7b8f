import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type http from 'http';
import { restRequest_handle } from './RestHandler.js';
import type { RestHandlerDeps } from './rest/types.js';
import { SessionExecutionEngine } from '../../core/engine/SessionExecutionEngine.js';
import { handlers_create, HANDLER_NAMES } from '../../core/handlers/index.js';
import { registry_load, type CommandRegistry } from '../../core/registry/CommandRegistry.js';
import { NaturalLanguageResolver } from '../../core/resolver/NaturalLanguageResolver.js';

interface ResponseCapture {
    statusCode: number | null;
    headers: Record<string, string>;
    body: string;
}

interface Exchange {
    handled: boolean;
    capture: ResponseCapture;
    /** Parsed response body; null when there is none. */
    json: unknown;
}

class MockRequest extends EventEmitter {
    public method?: string;
    public url?: string;

    constructor(method: string, url: string) {
        super();
        this.method = method;
        this.url = url;
    }

    body_emit(payload: string): void {
        this.emit('data', payload);
        this.emit('end');
    }
}

function response_create(): { res: http.ServerResponse; capture: ResponseCapture } {
    const capture: ResponseCapture = {
        statusCode: null,
        headers: {},
        body: ''
    };

    let res: http.ServerResponse;
    const responseStub = {
        writeHead(statusCode: number, headers?: Record<string, string>): http.ServerResponse {
            capture.statusCode = statusCode;
            capture.headers = headers ?? {};
            return res;
        },
        end(chunk?: unknown): http.ServerResponse {
            if (typeof chunk === 'string') {
                capture.body += chunk;
            }
            return res;
        }
    };

    res = responseStub as unknown as http.ServerResponse;

    return { res, capture };
}

function flush_async(): Promise<void> {
    return new Promise((resolve): void => {
        setTimeout(resolve, 0);
    });
}

const registry: CommandRegistry = registry_load(HANDLER_NAMES);
let root: string;
let deps: RestHandlerDeps;

async function exchange(method: string, url: string, body?: string): Promise<Exchange> {
    const reqImpl: MockRequest = new MockRequest(method, url);
    const { res, capture } = response_create();

    const pending: Promise<boolean> = restRequest_handle(reqImpl as unknown as http.IncomingMessage, res, deps);
    if (body !== undefined) {
        await flush_async();
        reqImpl.body_emit(body);
    }
    const handled: boolean = await pending;
    return { handled, capture, json: capture.body ? JSON.parse(capture.body) : null };
}

beforeEach(async (): Promise<void> => {
    root = await mkdtemp(join(tmpdir(), 'nlterm-rest-'));
    const engine: SessionExecutionEngine = new SessionExecutionEngine({
        registry,
        handlers: handlers_create(),
        resolver: new NaturalLanguageResolver({ registry, boundary: null }),
        cwd: root
    });
    deps = { engine, host: '127.0.0.1', port: 8080 };
});

afterEach(async (): Promise<void> => {
    deps.engine.dispose();
    await rm(root, { recursive: true, force: true });
});

describe('restRequest_handle', (): void => {
    it('returns false for unhandled routes', async (): Promise<void> => {
        const { handled, capture } = await exchange('GET', '/unhandled');
        expect(handled).toBe(false);
        expect(capture.statusCode).toBeNull();
    });

    it('handles CORS preflight requests', async (): Promise<void> => {
        const { handled, capture } = await exchange('OPTIONS', '/api/command');
        expect(handled).toBe(true);
        expect(capture.statusCode).toBe(204);
        expect(capture.headers['Access-Control-Allow-Origin']).toBe('*');
        expect(capture.headers['Access-Control-Allow-Methods']).toBe('GET, POST, DELETE, OPTIONS');
    });

    it('handles root health route', async (): Promise<void> => {
        const { capture, json } = await exchange('GET', '/');
        expect(capture.statusCode).toBe(200);
        expect(json).toMatchObject({
            service: 'nlterm server',
            version: '0.4.0',
            status: 'running',
            provider: 'none',
            sessions: 0
        });
    });

    it('opens a session and resumes it by id', async (): Promise<void> => {
        const created = await exchange('POST', '/api/sessions', JSON.stringify({ sessionId: 'web-1' }));
        expect(created.capture.statusCode).toBe(201);
        expect(created.json).toEqual({
            session: {
                id: 'web-1',
                cwd: root,
                historyLength: 0,
                lastExitCode: 0,
                lastError: null,
                lastActivity: expect.any(Number),
                busy: false
            },
            provider: 'none'
        });

        const resumed = await exchange('POST', '/api/sessions', JSON.stringify({ sessionId: 'web-1' }));
        expect(resumed.capture.statusCode).toBe(200);
    });

    it('opens a session with a generated id on an empty body', async (): Promise<void> => {
        const { capture, json } = await exchange('POST', '/api/sessions', '');
        expect(capture.statusCode).toBe(201);
        expect(json).toMatchObject({ session: { id: expect.stringMatching(/^[0-9a-f-]{36}$/) } });
    });

    it('executes a command and records it', async (): Promise<void> => {
        const run = await exchange('POST', '/api/command', JSON.stringify({ sessionId: 'web-1', input: 'echo hello' }));
        expect(run.capture.statusCode).toBe(200);
        expect(run.json).toEqual({ stdout: 'hello', stderr: '', exitCode: 0 });

        const history = await exchange('GET', '/api/history?sessionId=web-1');
        expect(history.json).toMatchObject({ entries: [{ raw: 'echo hello', command: 'echo hello' }] });
    });

    it('reports command failures inside a 200 result', async (): Promise<void> => {
        const { capture, json } = await exchange('POST', '/api/command', JSON.stringify({ sessionId: 'web-1', input: 'please list things' }));
        expect(capture.statusCode).toBe(200);
        expect(json).toEqual({
            stdout: '',
            stderr: 'natural-language translation is disabled',
            exitCode: 69,
            errorKind: 'ResolutionError.Unavailable'
        });
    });

    it('answers 400 on malformed bodies', async (): Promise<void> => {
        const invalid = await exchange('POST', '/api/command', '{ invalid json');
        expect(invalid.capture.statusCode).toBe(400);
        expect(invalid.json).toEqual({ error: 'Invalid JSON' });

        const missing = await exchange('POST', '/api/command', JSON.stringify({ sessionId: 'web-1' }));
        expect(missing.capture.statusCode).toBe(400);
        expect(missing.json).toEqual({ error: 'Invalid request body: [input] Required' });
    });

    it('completes command names', async (): Promise<void> => {
        const { json } = await exchange('GET', '/api/complete?sessionId=web-1&line=ec');
        expect(json).toEqual({ candidates: ['echo'] });

        const missing = await exchange('GET', '/api/complete?line=ec');
        expect(missing.capture.statusCode).toBe(400);
        expect(missing.json).toEqual({ error: 'Missing "sessionId" parameter' });
    });

    it('answers 404 for unknown sessions', async (): Promise<void> => {
        const history = await exchange('GET', '/api/history?sessionId=nope');
        expect(history.capture.statusCode).toBe(404);
        expect(history.json).toEqual({ error: 'Unknown session: nope' });

        const snapshot = await exchange('GET', '/api/sessions/nope');
        expect(snapshot.capture.statusCode).toBe(404);
    });

    it('answers 400 for a session id that does not decode', async (): Promise<void> => {
        const { capture, json } = await exchange('GET', '/api/sessions/%E0%A4%A');
        expect(capture.statusCode).toBe(400);
        expect(json).toEqual({ error: 'Invalid session id: %E0%A4%A' });
    });

    it('closes a session once', async (): Promise<void> => {
        deps.engine.session_open('web-2');

        const closed = await exchange('DELETE', '/api/sessions/web-2');
        expect(closed.json).toEqual({ closed: 'web-2' });

        const again = await exchange('DELETE', '/api/sessions/web-2');
        expect(again.capture.statusCode).toBe(404);
    });

    it('lists the command catalog', async (): Promise<void> => {
        const { json } = await exchange('GET', '/api/commands');
        expect(json).toMatchObject({ commands: expect.arrayContaining([expect.objectContaining({ name: 'dir', aliases: ['ls'] })]) });
        expect(json).toHaveProperty('commands.length', registry.specs_list().length);
    });

    it('answers 500 when the engine faults', async (): Promise<void> => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation((): void => {});
        vi.spyOn(deps.engine, 'complete').mockRejectedValue(new Error('disk on fire'));

        const { capture, json } = await exchange('GET', '/api/complete?sessionId=web-1&line=x');
        expect(capture.statusCode).toBe(500);
        expect(json).toEqual({ error: 'disk on fire' });
        expect(errorSpy).toHaveBeenCalledWith('REST GET /api/complete failed: disk on fire');
        errorSpy.mockRestore();
    });
});
