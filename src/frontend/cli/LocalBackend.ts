/**
 * @file In-Process Backend
 *
 * Runs the console REPL against an engine living in the same process,
 * behind the same surface the WebSocket client offers.
 *
 * @module
 */

import type { SessionExecutionEngine } from '../../core/engine/SessionExecutionEngine.js';
import type { EngineEvent, Result, SessionSnapshot } from '../../core/engine/types.js';
import type { OpenedSession } from '../client/TerminalClient.js';

/**
 * What the REPL needs from wherever its session lives.
 * `TerminalClient` satisfies it for remote sessions.
 */
export interface TerminalBackend {
    onTelemetry: ((event: EngineEvent) => void) | null;
    session_open(): Promise<OpenedSession>;
    command_send(input: string): Promise<Result>;
    complete(line: string): Promise<string[]>;
    cancel(): Promise<boolean>;
    disconnect(): void;
}

export class LocalBackend implements TerminalBackend {
    public onTelemetry: ((event: EngineEvent) => void) | null = null;
    private sessionId: string | null = null;
    private readonly unsubscribe: () => void;

    constructor(private readonly engine: SessionExecutionEngine) {
        this.unsubscribe = engine.telemetry_subscribe((event: EngineEvent): void => {
            if (this.sessionId !== null && event.sessionId === this.sessionId) {
                this.onTelemetry?.(event);
            }
        });
    }

    async session_open(): Promise<OpenedSession> {
        const session: SessionSnapshot = this.engine.session_open();
        this.sessionId = session.id;
        return { session, provider: this.engine.provider };
    }

    async command_send(input: string): Promise<Result> {
        return this.engine.process(this.session_require(), input);
    }

    async complete(line: string): Promise<string[]> {
        return this.engine.complete(this.session_require(), line);
    }

    async cancel(): Promise<boolean> {
        return this.engine.cancel(this.session_require());
    }

    /**
     * Close the session and release the engine.
     */
    disconnect(): void {
        this.unsubscribe();
        this.engine.dispose();
        this.sessionId = null;
    }

    private session_require(): string {
        if (this.sessionId === null) {
            throw new Error('No session open');
        }
        return this.sessionId;
    }
}
