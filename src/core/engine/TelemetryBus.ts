/**
 * @file Telemetry Bus
 *
 * Typed facade over Node's EventEmitter carrying engine events: request
 * state transitions, session lifecycle and log lines. Front-ends
 * subscribe to it; the WebSocket server forwards events per session.
 *
 * @module core/engine
 */

import { EventEmitter } from 'events';
import type { EngineEvent } from './types.js';

export type TelemetryObserver = (event: EngineEvent) => void;

/** Internal event channel. */
const CHANNEL = 'telemetry' as const;

export class TelemetryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        // Unlimited subscribers; one per connected socket.
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to engine events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: TelemetryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: EngineEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    /** Publish a log line, optionally scoped to a session. */
    log(sessionId: string | null, level: 'info' | 'warn' | 'error', message: string): void {
        this.emit({ type: 'log', sessionId, level, message });
    }
}
