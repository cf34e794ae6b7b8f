/**
 * @file Operation Handler Types
 *
 * Capability interface implemented once per OS operation, plus the
 * dependency bag injected into handler factories.
 *
 * @module core/handlers
 */

import type { CpuInfo, NetworkInterfaceInfo } from 'os';
import type { CommandRegistry } from '../registry/CommandRegistry.js';
import type { Directive, HistoryEntry } from '../engine/types.js';
import type { ProcessRunner } from './runner.js';

/** A filesystem entry a handler created, listed or touched. */
export interface SeenEntry {
    /** Absolute path. */
    path: string;
    directory: boolean;
}

/**
 * Per-invocation context supplied by the engine.
 */
export interface HandlerContext {
    readonly cwd: string;
    readonly signal: AbortSignal;
    readonly timeoutMs: number;
    readonly registry: CommandRegistry;
    /** Committed history of the calling session. */
    readonly history: () => readonly HistoryEntry[];
}

/**
 * Successful handler outcome. Failures are thrown as HandlerError.
 */
export interface HandlerOutput {
    stdout: string;
    /** New absolute working directory. */
    cwd?: string;
    directive?: Directive;
    seen?: SeenEntry[];
    /** Absolute paths that no longer exist. */
    forgotten?: string[];
}

/**
 * Capability interface of one OS operation.
 */
export interface OperationHandler {
    /**
     * Operation-specific argument checks beyond registry arity and shape.
     *
     * @throws ValidationError
     */
    validate?(args: readonly string[]): void;
    execute(args: readonly string[], ctx: HandlerContext): Promise<HandlerOutput>;
}

/** Host introspection primitives, injectable for tests. */
export interface SystemProbe {
    cpus: () => CpuInfo[];
    totalmem: () => number;
    freemem: () => number;
    networkInterfaces: () => NodeJS.Dict<NetworkInterfaceInfo[]>;
    homedir: () => string;
    /** Delay between the two CPU samples. */
    sampleDelayMs: number;
}

/**
 * Shared dependency bag injected into handler factories.
 */
export interface HandlerDeps {
    runner: ProcessRunner;
    system: SystemProbe;
    platform: NodeJS.Platform;
}

/**
 * Declarative handler descriptor consumed by the handler table.
 */
export interface OperationDescriptor {
    name: string;
    create: (deps: HandlerDeps) => OperationHandler;
}
