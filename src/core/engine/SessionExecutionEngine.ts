/**
 * @file Session Execution Engine
 *
 * Front-end facing core. Each request walks
 * Received → Classified → (Resolved) → Validated → Executed → Recorded → Responded,
 * with every transition published on the telemetry bus.
 *
 * Requests of one session are serialized through its lock; sessions are
 * independent of each other. Every failure becomes a Result with a
 * nonzero exit code, so `process` never rejects.
 *
 * @module core/engine
 */

import { randomUUID } from 'crypto';
import {
    CancelledError,
    HandlerError,
    PartialFailureError,
    TerminalError,
    ValidationError,
    EXIT_CODES,
    errorMessage_get
} from '../errors.js';
import { HistoryStore } from '../history/HistoryStore.js';
import type { HandlerContext, HandlerOutput, OperationHandler } from '../handlers/types.js';
import type { CommandRegistry } from '../registry/CommandRegistry.js';
import { commandLine_tokenize } from '../registry/tokenizer.js';
import type { ArgumentCheck, CommandSpec } from '../registry/types.js';
import type { NaturalLanguageResolver, Resolution } from '../resolver/NaturalLanguageResolver.js';
import { Session } from './Session.js';
import { TelemetryBus, type TelemetryObserver } from './TelemetryBus.js';
import type { HistoryEntry, RequestState, Result, SessionSnapshot } from './types.js';

export const DEFAULT_HANDLER_TIMEOUT_MS: number = 10000;
export const DEFAULT_IDLE_TIMEOUT_MS: number = 30 * 60 * 1000;

export interface EngineOptions {
    registry: CommandRegistry;
    handlers: ReadonlyMap<string, OperationHandler>;
    resolver: NaturalLanguageResolver;
    /** Working directory of new sessions. */
    cwd: string;
    handlerTimeoutMs?: number;
    idleTimeoutMs?: number;
    completionLimit?: number;
    bus?: TelemetryBus;
    /** Epoch-ms clock, injectable for tests. */
    clock?: () => number;
}

export interface ProcessOptions {
    signal?: AbortSignal;
}

/** Mutable per-request bookkeeping. */
interface RequestTrace {
    sessionId: string;
    requestId: number;
    command: string | null;
    translated: boolean;
}

export class SessionExecutionEngine {
    private readonly sessions: Map<string, Session> = new Map();
    private readonly registry: CommandRegistry;
    private readonly handlers: ReadonlyMap<string, OperationHandler>;
    private readonly resolver: NaturalLanguageResolver;
    private readonly defaultCwd: string;
    private readonly handlerTimeoutMs: number;
    private readonly idleTimeoutMs: number;
    private readonly completionLimit: number | undefined;
    private readonly clock: () => number;
    private readonly bus: TelemetryBus;
    private requestCounter: number = 0;
    private sweeper: NodeJS.Timeout | null = null;

    constructor(options: EngineOptions) {
        this.registry = options.registry;
        this.handlers = options.handlers;
        this.resolver = options.resolver;
        this.defaultCwd = options.cwd;
        this.handlerTimeoutMs = options.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
        this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
        this.completionLimit = options.completionLimit;
        this.clock = options.clock ?? Date.now;
        this.bus = options.bus ?? new TelemetryBus();
    }

    /** Catalog the engine dispatches against. */
    public get commands(): CommandRegistry {
        return this.registry;
    }

    /** Name of the active translation provider. */
    public get provider(): string {
        return this.resolver.provider;
    }

    // ─── Requests ───────────────────────────────────────────────────────────

    /**
     * Run one request to completion. Never rejects.
     *
     * @param sessionId - Session to run in; created when unknown.
     * @param raw - Literal command or natural-language text.
     */
    public async process(sessionId: string, raw: string, options: ProcessOptions = {}): Promise<Result> {
        try {
            const session: Session = this.session_ensure(sessionId);
            return await session.lock.run((): Promise<Result> => this.request_run(session, raw, options.signal));
        } catch (error: unknown) {
            this.bus.log(sessionId, 'error', `internal error: ${errorMessage_get(error)}`);
            return internalResult_build(error);
        }
    }

    /**
     * Completion candidates for the word under the cursor.
     */
    public async complete(sessionId: string, line: string): Promise<string[]> {
        const session: Session = this.session_ensure(sessionId);
        return session.history.complete(line, session.cwd);
    }

    /**
     * Iterate a session's history as it stood at call time.
     */
    public *history(sessionId: string): Generator<HistoryEntry, void, undefined> {
        const session: Session | undefined = this.sessions.get(sessionId);
        if (session) {
            yield* session.history.entries();
        }
    }

    /**
     * Abort the session's in-flight request.
     *
     * @returns True when there was one to abort.
     */
    public cancel(sessionId: string): boolean {
        const controller: AbortController | null = this.sessions.get(sessionId)?.inFlight ?? null;
        if (!controller || controller.signal.aborted) {
            return false;
        }
        controller.abort();
        return true;
    }

    // ─── Sessions ───────────────────────────────────────────────────────────

    /**
     * Open a session, or return the existing one with that id.
     */
    public session_open(id?: string): SessionSnapshot {
        return this.session_ensure(id ?? randomUUID()).snapshot();
    }

    /**
     * Close a session, aborting its in-flight request.
     *
     * @returns False when no such session exists.
     */
    public session_close(id: string): boolean {
        return this.session_drop(id, 'closed');
    }

    public session_get(id: string): SessionSnapshot | null {
        return this.sessions.get(id)?.snapshot() ?? null;
    }

    public sessions_list(): SessionSnapshot[] {
        return [...this.sessions.values()].map((session: Session): SessionSnapshot => session.snapshot());
    }

    /**
     * Close every idle session whose last activity is older than the idle timeout.
     *
     * @returns Ids of the expired sessions.
     */
    public sessions_sweep(now: number = this.clock()): string[] {
        const expired: string[] = [];
        for (const session of [...this.sessions.values()]) {
            if (!session.busy && now - session.lastActivity > this.idleTimeoutMs) {
                this.session_drop(session.id, 'expired');
                expired.push(session.id);
            }
        }
        return expired;
    }

    /**
     * Start the periodic idle sweep. The timer does not keep the process alive.
     */
    public sweeper_start(intervalMs: number = Math.min(60000, this.idleTimeoutMs)): void {
        if (this.sweeper) return;
        this.sweeper = setInterval((): void => {
            this.sessions_sweep();
        }, intervalMs);
        this.sweeper.unref();
    }

    /**
     * Stop the sweeper and close every session.
     */
    public dispose(): void {
        if (this.sweeper) {
            clearInterval(this.sweeper);
            this.sweeper = null;
        }
        for (const id of [...this.sessions.keys()]) {
            this.session_drop(id, 'closed');
        }
    }

    public telemetry_subscribe(observer: TelemetryObserver): () => void {
        return this.bus.subscribe(observer);
    }

    // ─── Internals ──────────────────────────────────────────────────────────

    private session_ensure(id: string): Session {
        const existing: Session | undefined = this.sessions.get(id);
        if (existing) {
            return existing;
        }
        const history: HistoryStore = new HistoryStore({
            commandTokens: this.registry.tokens_list(),
            limit: this.completionLimit
        });
        const session: Session = new Session(id, this.defaultCwd, history, this.clock());
        this.sessions.set(id, session);
        this.bus.emit({ type: 'session', sessionId: id, action: 'opened' });
        return session;
    }

    private session_drop(id: string, action: 'closed' | 'expired'): boolean {
        const session: Session | undefined = this.sessions.get(id);
        if (!session) {
            return false;
        }
        session.inFlight?.abort();
        this.sessions.delete(id);
        this.bus.emit({ type: 'session', sessionId: id, action });
        return true;
    }

    private state_emit(trace: RequestTrace, state: RequestState, detail?: string): void {
        this.bus.emit({ type: 'state', sessionId: trace.sessionId, requestId: trace.requestId, state, detail });
    }

    private async request_run(session: Session, raw: string, signal: AbortSignal | undefined): Promise<Result> {
        const trace: RequestTrace = {
            sessionId: session.id,
            requestId: ++this.requestCounter,
            command: null,
            translated: false
        };
        this.state_emit(trace, 'Received');
        session.lastActivity = this.clock();

        if (raw.trim() === '') {
            this.state_emit(trace, 'Responded', 'empty input');
            return { stdout: '', stderr: '', exitCode: 0 };
        }

        const controller: AbortController = new AbortController();
        const onAbort = (): void => controller.abort();
        if (signal?.aborted) {
            controller.abort();
        }
        signal?.addEventListener('abort', onAbort, { once: true });
        session.inFlight = controller;

        let result: Result;
        let output: HandlerOutput | null = null;
        try {
            output = await this.request_execute(session, raw, trace, controller);
            result = {
                stdout: output.stdout,
                stderr: '',
                exitCode: 0,
                ...(output.cwd !== undefined ? { cwd: output.cwd } : {}),
                ...(trace.translated && trace.command !== null ? { command: trace.command } : {}),
                ...(output.directive ? { directive: output.directive } : {})
            };
        } catch (error: unknown) {
            if (error instanceof PartialFailureError) {
                output = error.completed;
            }
            result = this.failure_build(error, trace, controller.signal);
        } finally {
            session.inFlight = null;
            signal?.removeEventListener('abort', onAbort);
        }

        // Commit: cwd delta and history entry land together.
        if (result.cwd !== undefined) {
            session.cwd = result.cwd;
        }
        if (output) {
            session.history.seen_forget(output.forgotten ?? []);
            session.history.seen_record(output.seen ?? []);
        }
        session.history.append({
            raw,
            command: trace.command,
            timestamp: new Date(this.clock()).toISOString(),
            result
        });
        session.lastExitCode = result.exitCode;
        session.lastError = result.errorKind ?? null;
        session.lastActivity = this.clock();
        this.state_emit(trace, 'Recorded');
        this.state_emit(trace, 'Responded', `exit ${result.exitCode}`);
        return result;
    }

    private async request_execute(
        session: Session,
        raw: string,
        trace: RequestTrace,
        controller: AbortController
    ): Promise<HandlerOutput> {
        this.state_emit(trace, 'Classified', this.resolver.fastPath_matches(raw) ? 'literal' : 'natural-language');

        const resolution: Resolution = await this.resolver.resolve(raw, controller.signal);
        trace.command = resolution.command;
        trace.translated = resolution.translated;
        if (resolution.translated) {
            this.state_emit(trace, 'Resolved', resolution.command);
        }

        const words: string[] = commandLine_tokenize(resolution.command);
        const spec: CommandSpec | null = this.registry.lookup(words[0] ?? '');
        if (!spec) {
            throw new ValidationError(`${words[0] ?? ''}: unknown command`);
        }
        const args: string[] = words.slice(1);
        const check: ArgumentCheck = this.registry.arguments_validate(spec, args);
        if (!check.ok) {
            throw new ValidationError(check.message);
        }
        const handler: OperationHandler | undefined = this.handlers.get(spec.handler);
        if (!handler) {
            throw new Error(`no handler bound for '${spec.handler}'`);
        }
        handler.validate?.(args);
        this.state_emit(trace, 'Validated', spec.name);

        const ctx: HandlerContext = {
            cwd: session.cwd,
            signal: controller.signal,
            timeoutMs: this.handlerTimeoutMs,
            registry: this.registry,
            history: (): readonly HistoryEntry[] => session.history.entries_list()
        };
        const output: HandlerOutput = await this.handler_run(handler, spec.name, args, ctx, controller);
        this.state_emit(trace, 'Executed', spec.name);
        return output;
    }

    /**
     * Run a handler bounded by the handler timeout and the request's abort signal.
     */
    private handler_run(
        handler: OperationHandler,
        name: string,
        args: readonly string[],
        ctx: HandlerContext,
        controller: AbortController
    ): Promise<HandlerOutput> {
        if (controller.signal.aborted) {
            return Promise.reject(new CancelledError(`${name}: cancelled`));
        }

        let timer: NodeJS.Timeout | undefined;
        let onAbort: (() => void) | undefined;
        const guard: Promise<never> = new Promise((_resolve: (value: never) => void, reject: (reason?: unknown) => void): void => {
            timer = setTimeout((): void => {
                reject(new HandlerError('Timeout', `${name}: timed out after ${this.handlerTimeoutMs} ms`));
                controller.abort();
            }, this.handlerTimeoutMs);
            onAbort = (): void => reject(new CancelledError(`${name}: cancelled`));
            controller.signal.addEventListener('abort', onAbort, { once: true });
        });

        return Promise.race([handler.execute(args, ctx), guard]).finally((): void => {
            clearTimeout(timer);
            if (onAbort) controller.signal.removeEventListener('abort', onAbort);
        });
    }

    private failure_build(error: unknown, trace: RequestTrace, signal: AbortSignal): Result {
        let failure: TerminalError | null = error instanceof TerminalError ? error : null;
        if (!failure && signal.aborted) {
            failure = new CancelledError('cancelled', { cause: error });
        }
        if (!failure) {
            this.bus.log(trace.sessionId, 'error', `internal error: ${errorMessage_get(error)}`);
            return {
                ...internalResult_build(error),
                ...(trace.translated && trace.command !== null ? { command: trace.command } : {})
            };
        }

        this.state_emit(trace, 'Executed', failure.kind);
        return {
            stdout: failure instanceof PartialFailureError ? failure.completed.stdout : '',
            stderr: failure.message,
            exitCode: failure.exitCode,
            errorKind: failure.kind,
            ...(trace.translated && trace.command !== null ? { command: trace.command } : {})
        };
    }
}

function internalResult_build(error: unknown): Result {
    return {
        stdout: '',
        stderr: `internal error: ${errorMessage_get(error)}`,
        exitCode: EXIT_CODES.InternalError,
        errorKind: 'InternalError'
    };
}
