import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { EventEmitter } from 'events';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { WebSocket } from 'ws';
import { wsConnection_handle } from './WebSocketHandler.js';
import { SessionExecutionEngine } from '../../core/engine/SessionExecutionEngine.js';
import { handlers_create, HANDLER_NAMES } from '../../core/handlers/index.js';
import { registry_load, type CommandRegistry } from '../../core/registry/CommandRegistry.js';
import { NaturalLanguageResolver } from '../../core/resolver/NaturalLanguageResolver.js';
import type { TranslationBoundary, TranslationReply, TranslationRequest } from '../../core/resolver/types.js';

interface CapturedMessage {
    type: string;
    [key: string]: unknown;
}

type TranslateFn = (request: TranslationRequest, signal: AbortSignal) => Promise<TranslationReply>;

class MockWebSocket extends EventEmitter {
    public OPEN: number = 1;
    public readyState: number = 1;
    public sent: string[] = [];

    send(payload: string): void {
        this.sent.push(payload);
    }

    message_send(payload: unknown): void {
        this.emit('message', Buffer.from(typeof payload === 'string' ? payload : JSON.stringify(payload)));
    }
}

function sentMessages_parse(ws: MockWebSocket): CapturedMessage[] {
    return ws.sent.map((payload: string): CapturedMessage => JSON.parse(payload) as CapturedMessage);
}

function reply_find(ws: MockWebSocket, id: string): CapturedMessage | undefined {
    return sentMessages_parse(ws).find((msg: CapturedMessage): boolean => msg.id === id);
}

async function reply_await(ws: MockWebSocket, id: string): Promise<CapturedMessage> {
    let reply: CapturedMessage | undefined;
    await vi.waitFor((): void => {
        reply = reply_find(ws, id);
        expect(reply).toBeDefined();
    });
    if (!reply) throw new Error(`no reply to ${id}`);
    return reply;
}

const registry: CommandRegistry = registry_load(HANDLER_NAMES);
let root: string;
let engine: SessionExecutionEngine;
let translate: Mock<TranslateFn>;

function connection_open(): MockWebSocket {
    const ws: MockWebSocket = new MockWebSocket();
    wsConnection_handle(ws as unknown as WebSocket, { engine });
    return ws;
}

beforeEach(async (): Promise<void> => {
    root = await mkdtemp(join(tmpdir(), 'nlterm-ws-'));
    translate = vi.fn<TranslateFn>(async (): Promise<TranslationReply> => ({ command: 'echo translated' }));
    const boundary: TranslationBoundary = { name: 'stub', translate };
    engine = new SessionExecutionEngine({
        registry,
        handlers: handlers_create(),
        resolver: new NaturalLanguageResolver({ registry, boundary }),
        cwd: root
    });
    vi.spyOn(console, 'log').mockImplementation((): void => {});
});

afterEach(async (): Promise<void> => {
    engine.dispose();
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
});

describe('WebSocketHandler requests', (): void => {
    it('opens a session and runs commands in it', async (): Promise<void> => {
        const ws: MockWebSocket = connection_open();

        ws.message_send({ type: 'open', id: 'open-1', sessionId: 'term-1' });
        const opened: CapturedMessage = await reply_await(ws, 'open-1');
        expect(opened).toMatchObject({ type: 'opened', provider: 'stub', session: { id: 'term-1', cwd: root } });

        ws.message_send({ type: 'command', id: 'cmd-1', input: 'echo hi there' });
        expect(await reply_await(ws, 'cmd-1')).toEqual({
            type: 'result',
            id: 'cmd-1',
            result: { stdout: 'hi there', stderr: '', exitCode: 0 }
        });

        ws.message_send({ type: 'history', id: 'hist-1' });
        const history: CapturedMessage = await reply_await(ws, 'hist-1');
        expect(history).toMatchObject({ type: 'history', entries: [{ raw: 'echo hi there' }] });
    });

    it('returns completions for the bound session', async (): Promise<void> => {
        const ws: MockWebSocket = connection_open();
        ws.message_send({ type: 'open', id: 'open-1' });
        await reply_await(ws, 'open-1');

        ws.message_send({ type: 'complete', id: 'tab-1', line: 'ec' });
        expect(await reply_await(ws, 'tab-1')).toEqual({ type: 'completions', id: 'tab-1', candidates: ['echo'] });
    });

    it('requires an open session before commands', async (): Promise<void> => {
        const ws: MockWebSocket = connection_open();

        ws.message_send({ type: 'command', id: 'cmd-1', input: 'echo hi' });
        expect(await reply_await(ws, 'cmd-1')).toEqual({
            type: 'error',
            id: 'cmd-1',
            message: "No session: send 'open' first"
        });
    });

    it('rejects malformed messages at the boundary', async (): Promise<void> => {
        const ws: MockWebSocket = connection_open();

        ws.message_send('not json');
        ws.message_send({ type: 'command', id: 'bad-1' });
        ws.message_send({ type: 'launch', id: 'bad-2' });

        const messages: CapturedMessage[] = sentMessages_parse(ws);
        expect(messages[0]).toEqual({ type: 'error', id: 'unknown', message: 'Invalid JSON' });
        expect(messages[1]).toEqual({ type: 'error', id: 'bad-1', message: 'Invalid message: Required' });
        expect(messages[2]).toMatchObject({ type: 'error', id: 'bad-2' });
    });

    it('does not send once the socket has closed', async (): Promise<void> => {
        const ws: MockWebSocket = connection_open();
        ws.readyState = 3;

        ws.message_send('not json');
        expect(ws.sent).toEqual([]);
    });
});

describe('WebSocketHandler telemetry', (): void => {
    it('forwards only events of the bound session', async (): Promise<void> => {
        const first: MockWebSocket = connection_open();
        const second: MockWebSocket = connection_open();
        first.message_send({ type: 'open', id: 'open-a', sessionId: 'a' });
        second.message_send({ type: 'open', id: 'open-b', sessionId: 'b' });
        await reply_await(first, 'open-a');
        await reply_await(second, 'open-b');

        first.message_send({ type: 'command', id: 'cmd-a', input: 'echo a' });
        await reply_await(first, 'cmd-a');

        const states = (ws: MockWebSocket): unknown[] => sentMessages_parse(ws)
            .filter((msg: CapturedMessage): boolean => msg.type === 'telemetry')
            .map((msg: CapturedMessage): unknown => msg.payload);

        expect(states(first)).toContainEqual({
            type: 'state',
            sessionId: 'a',
            requestId: expect.any(Number),
            state: 'Responded',
            detail: 'exit 0'
        });
        expect(states(second)).toEqual([]);
    });
});

describe('WebSocketHandler cancellation', (): void => {
    it('cancels the in-flight request on demand', async (): Promise<void> => {
        translate.mockImplementation((): Promise<TranslationReply> => new Promise((): void => undefined));
        const ws: MockWebSocket = connection_open();
        ws.message_send({ type: 'open', id: 'open-1', sessionId: 'c' });
        await reply_await(ws, 'open-1');

        ws.message_send({ type: 'command', id: 'cmd-1', input: 'think about it' });
        await vi.waitFor((): void => {
            expect(translate).toHaveBeenCalled();
        });
        ws.message_send({ type: 'cancel', id: 'cancel-1' });

        expect(await reply_await(ws, 'cancel-1')).toEqual({ type: 'cancelled', id: 'cancel-1', cancelled: true });
        expect(await reply_await(ws, 'cmd-1')).toMatchObject({
            type: 'result',
            result: { exitCode: 130, errorKind: 'Cancelled' }
        });
    });

    it('cancels on disconnect but keeps the session for reconnection', async (): Promise<void> => {
        translate.mockImplementation((): Promise<TranslationReply> => new Promise((): void => undefined));
        const ws: MockWebSocket = connection_open();
        ws.message_send({ type: 'open', id: 'open-1', sessionId: 'keep' });
        await reply_await(ws, 'open-1');
        ws.message_send({ type: 'command', id: 'cmd-1', input: 'think about it' });
        await vi.waitFor((): void => {
            expect(translate).toHaveBeenCalled();
        });

        ws.emit('close');
        await vi.waitFor((): void => {
            expect(engine.session_get('keep')?.busy).toBe(false);
        });
        expect(engine.session_get('keep')?.lastError).toBe('Cancelled');

        const again: MockWebSocket = connection_open();
        again.message_send({ type: 'open', id: 'open-2', sessionId: 'keep' });
        expect(await reply_await(again, 'open-2')).toMatchObject({ session: { id: 'keep', historyLength: 1 } });
    });
});
