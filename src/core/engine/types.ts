/**
 * @file Engine Types
 *
 * Result, history and request-state shapes shared by the engine, the
 * handlers and every front-end.
 *
 * @module core/engine
 */

import type { ErrorKind } from '../errors.js';

/** Front-end instruction carried alongside a Result. */
export type Directive = 'clear' | 'exit';

/**
 * Structured outcome of one request. `exitCode === 0` implies `stderr === ''`;
 * `cwd` is present only when a directory change succeeded. A failed
 * multi-operand command keeps the lines of the operands done before it in
 * `stdout`.
 */
export interface Result {
    stdout: string;
    stderr: string;
    exitCode: number;
    cwd?: string;
    /** Resolved literal command, when resolution ran. */
    command?: string;
    errorKind?: ErrorKind;
    directive?: Directive;
}

/** One recorded request. Frozen once appended. */
export interface HistoryEntry {
    readonly raw: string;
    /** Resolved literal command; null when resolution failed. */
    readonly command: string | null;
    readonly timestamp: string;
    readonly result: Readonly<Result>;
}

/** Lifecycle of a request inside the engine. */
export type RequestState =
    | 'Received'
    | 'Classified'
    | 'Resolved'
    | 'Validated'
    | 'Executed'
    | 'Recorded'
    | 'Responded';

/** Read-only view of a session. */
export interface SessionSnapshot {
    id: string;
    cwd: string;
    historyLength: number;
    lastExitCode: number;
    lastError: ErrorKind | null;
    lastActivity: number;
    busy: boolean;
}

/** Events published on the engine's telemetry bus. */
export type EngineEvent =
    | { type: 'state'; sessionId: string; requestId: number; state: RequestState; detail?: string }
    | { type: 'session'; sessionId: string; action: 'opened' | 'closed' | 'expired' }
    | { type: 'log'; sessionId: string | null; level: 'info' | 'warn' | 'error'; message: string };
