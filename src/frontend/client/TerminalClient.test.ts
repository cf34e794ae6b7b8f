import { describe, it, expect, vi, afterEach } from 'vitest';
import { TerminalClient } from './TerminalClient.js';
import type { EngineEvent } from '../../core/engine/types.js';

afterEach((): void => {
    vi.restoreAllMocks();
});

describe('TerminalClient', (): void => {
    it('builds the socket URL from host and port', async (): Promise<void> => {
        const client: TerminalClient = new TerminalClient({ host: '127.0.0.1', port: 9100 });
        expect(client.connected).toBe(false);
        await expect(client.command_send('echo hi')).rejects.toThrow('Not connected');
    });

    it('routes telemetry frames to the listener', (): void => {
        const client: TerminalClient = new TerminalClient({ url: 'ws://localhost:1/nlterm/ws' });
        const events: EngineEvent[] = [];
        client.onTelemetry = (event: EngineEvent): void => {
            events.push(event);
        };

        client.message_receive(JSON.stringify({
            type: 'telemetry',
            payload: { type: 'state', sessionId: 's1', requestId: 3, state: 'Executed', detail: 'dir' }
        }));

        expect(events).toEqual([{ type: 'state', sessionId: 's1', requestId: 3, state: 'Executed', detail: 'dir' }]);
    });

    it('ignores frames that fail validation', (): void => {
        const warn = vi.spyOn(console, 'warn').mockImplementation((): void => {});
        const client: TerminalClient = new TerminalClient({ url: 'ws://localhost:1/nlterm/ws' });
        const listener = vi.fn<(event: EngineEvent) => void>();
        client.onTelemetry = listener;

        client.message_receive('{');
        client.message_receive(JSON.stringify({ type: 'telemetry', payload: { type: 'state' } }));
        client.message_receive(JSON.stringify({ type: 'result', id: 'unmatched', result: { stdout: '', stderr: '', exitCode: 0 } }));

        expect(listener).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(2);
        expect(warn).toHaveBeenNthCalledWith(1, 'Ignoring non-JSON server message');
    });
});
