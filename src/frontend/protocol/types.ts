/**
 * @file Terminal WebSocket Protocol Types
 *
 * Typed bidirectional message definitions for the WebSocket transport
 * between TerminalServer and TerminalClient.
 *
 * Every request carries a correlation `id` so the client can match
 * responses to pending promises even when messages arrive out of order.
 *
 * @module
 */

import type { EngineEvent, HistoryEntry, Result, SessionSnapshot } from '../../core/engine/types.js';

// ─── Client → Server ────────────────────────────────────────────────────────

/** Bind the connection to a session, resuming it when the id is known. */
export interface OpenMessage {
    type: 'open';
    id: string;
    sessionId?: string;
}

export interface CommandMessage {
    type: 'command';
    id: string;
    input: string;
}

export interface CompleteMessage {
    type: 'complete';
    id: string;
    line: string;
}

export interface HistoryRequestMessage {
    type: 'history';
    id: string;
}

export interface CancelMessage {
    type: 'cancel';
    id: string;
}

export type ClientMessage =
    | OpenMessage
    | CommandMessage
    | CompleteMessage
    | HistoryRequestMessage
    | CancelMessage;

// ─── Server → Client ────────────────────────────────────────────────────────

export interface OpenedMessage {
    type: 'opened';
    id: string;
    session: SessionSnapshot;
    provider: string;
}

export interface ResultMessage {
    type: 'result';
    id: string;
    result: Result;
}

export interface CompletionsMessage {
    type: 'completions';
    id: string;
    candidates: string[];
}

export interface HistoryMessage {
    type: 'history';
    id: string;
    entries: HistoryEntry[];
}

export interface CancelledMessage {
    type: 'cancelled';
    id: string;
    /** False when nothing was in flight. */
    cancelled: boolean;
}

export interface ErrorMessage {
    type: 'error';
    id: string;
    message: string;
}

/** Unsolicited engine event scoped to the connection's session. */
export interface TelemetryMessage {
    type: 'telemetry';
    payload: EngineEvent;
}

export type ServerMessage =
    | OpenedMessage
    | ResultMessage
    | CompletionsMessage
    | HistoryMessage
    | CancelledMessage
    | ErrorMessage
    | TelemetryMessage;

/** Server messages answering a request. */
export type ReplyMessage = Exclude<ServerMessage, TelemetryMessage>;

// ─── Helpers ────────────────────────────────────────────────────────────────

let counter = 0;

/**
 * Generate a unique correlation ID for a message.
 */
export function messageId_generate(): string {
    return `msg-${Date.now()}-${++counter}`;
}
