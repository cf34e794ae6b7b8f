/**
 * @file Terminal Protocol Schemas
 *
 * Zod runtime schemas for the WebSocket wire boundary. Inbound client
 * messages are validated by the server before any handler logic runs;
 * server messages are validated by the client before they reach a
 * pending request.
 *
 * Usage:
 *   const result = ClientMessageSchema.safeParse(JSON.parse(raw));
 *   if (!result.success) { ... return error to client ... }
 *   const msg = result.data;
 *
 * @module frontend/protocol/schemas
 */

import { z } from 'zod';

// ─── Shared ──────────────────────────────────────────────────────────────────

/** Every client message carries a non-empty correlation ID. */
const IdSchema = z.string().min(1);

const ErrorKindSchema = z.enum([
    'ValidationError',
    'ResolutionError.Unrecognized',
    'ResolutionError.Unavailable',
    'HandlerError.NotFound',
    'HandlerError.PermissionDenied',
    'HandlerError.InvalidArgument',
    'HandlerError.Timeout',
    'TransportError',
    'Cancelled',
    'InternalError'
]);

export const ResultSchema = z.object({
    stdout:    z.string(),
    stderr:    z.string(),
    exitCode:  z.number().int(),
    cwd:       z.string().optional(),
    command:   z.string().optional(),
    errorKind: ErrorKindSchema.optional(),
    directive: z.enum(['clear', 'exit']).optional()
});

const HistoryEntrySchema = z.object({
    raw:       z.string(),
    command:   z.string().nullable(),
    timestamp: z.string(),
    result:    ResultSchema
});

const SessionSnapshotSchema = z.object({
    id:            z.string(),
    cwd:           z.string(),
    historyLength: z.number().int(),
    lastExitCode:  z.number().int(),
    lastError:     ErrorKindSchema.nullable(),
    lastActivity:  z.number(),
    busy:          z.boolean()
});

const EngineEventSchema = z.discriminatedUnion('type', [
    z.object({
        type:      z.literal('state'),
        sessionId: z.string(),
        requestId: z.number().int(),
        state:     z.enum(['Received', 'Classified', 'Resolved', 'Validated', 'Executed', 'Recorded', 'Responded']),
        detail:    z.string().optional()
    }),
    z.object({
        type:      z.literal('session'),
        sessionId: z.string(),
        action:    z.enum(['opened', 'closed', 'expired'])
    }),
    z.object({
        type:      z.literal('log'),
        sessionId: z.string().nullable(),
        level:     z.enum(['info', 'warn', 'error']),
        message:   z.string()
    })
]);

// ─── Client → Server ─────────────────────────────────────────────────────────

export const OpenMessageSchema = z.object({
    type:      z.literal('open'),
    id:        IdSchema,
    sessionId: z.string().min(1).max(128).optional()
});

export const CommandMessageSchema = z.object({
    type:  z.literal('command'),
    id:    IdSchema,
    input: z.string()
});

export const CompleteMessageSchema = z.object({
    type: z.literal('complete'),
    id:   IdSchema,
    line: z.string()
});

export const HistoryRequestMessageSchema = z.object({
    type: z.literal('history'),
    id:   IdSchema
});

export const CancelMessageSchema = z.object({
    type: z.literal('cancel'),
    id:   IdSchema
});

/**
 * Discriminated union of all valid client messages.
 *
 * `safeParse` this at the WS message boundary before touching any fields.
 */
export const ClientMessageSchema = z.discriminatedUnion('type', [
    OpenMessageSchema,
    CommandMessageSchema,
    CompleteMessageSchema,
    HistoryRequestMessageSchema,
    CancelMessageSchema
]);

export type ValidatedClientMessage = z.infer<typeof ClientMessageSchema>;

// ─── Server → Client ─────────────────────────────────────────────────────────

export const ServerMessageSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('opened'), id: IdSchema, session: SessionSnapshotSchema, provider: z.string() }),
    z.object({ type: z.literal('result'), id: IdSchema, result: ResultSchema }),
    z.object({ type: z.literal('completions'), id: IdSchema, candidates: z.array(z.string()) }),
    z.object({ type: z.literal('history'), id: IdSchema, entries: z.array(HistoryEntrySchema) }),
    z.object({ type: z.literal('cancelled'), id: IdSchema, cancelled: z.boolean() }),
    z.object({ type: z.literal('error'), id: z.string(), message: z.string() }),
    z.object({ type: z.literal('telemetry'), payload: EngineEventSchema })
]);

export type ValidatedServerMessage = z.infer<typeof ServerMessageSchema>;
