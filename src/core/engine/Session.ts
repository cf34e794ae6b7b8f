/**
 * @file Session
 *
 * Mutable state of one front-end conversation. Owned by the engine;
 * front-ends only ever see snapshots.
 *
 * @module core/engine
 */

import type { ErrorKind } from '../errors.js';
import type { HistoryStore } from '../history/HistoryStore.js';
import { SessionLock } from './SessionLock.js';
import type { SessionSnapshot } from './types.js';

export class Session {
    public cwd: string;
    public lastExitCode: number = 0;
    public lastError: ErrorKind | null = null;
    public lastActivity: number;
    /** Controller of the request currently executing, if any. */
    public inFlight: AbortController | null = null;
    public readonly lock: SessionLock = new SessionLock();

    constructor(
        public readonly id: string,
        cwd: string,
        public readonly history: HistoryStore,
        now: number
    ) {
        this.cwd = cwd;
        this.lastActivity = now;
    }

    public get busy(): boolean {
        return this.lock.busy;
    }

    public snapshot(): SessionSnapshot {
        return {
            id: this.id,
            cwd: this.cwd,
            historyLength: this.history.length,
            lastExitCode: this.lastExitCode,
            lastError: this.lastError,
            lastActivity: this.lastActivity,
            busy: this.busy
        };
    }
}
