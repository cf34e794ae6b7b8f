/**
 * @file Terminal Error Taxonomy
 *
 * Typed failures raised inside the core. Every kind carries the exit
 * status it maps to when the engine converts it into a Result; only
 * `RegistryError` is fatal and it never reaches a session.
 *
 * @module core/errors
 */

import type { HandlerOutput } from './handlers/types.js';

export type HandlerErrorKind = 'NotFound' | 'PermissionDenied' | 'InvalidArgument' | 'Timeout';

export type ResolutionErrorKind = 'Unrecognized' | 'Unavailable';

export type ErrorKind =
    | 'ValidationError'
    | `ResolutionError.${ResolutionErrorKind}`
    | `HandlerError.${HandlerErrorKind}`
    | 'TransportError'
    | 'Cancelled'
    | 'InternalError';

/** Exit status per error kind. */
export const EXIT_CODES: Readonly<Record<ErrorKind, number>> = {
    'HandlerError.InvalidArgument': 1,
    'HandlerError.NotFound': 2,
    'HandlerError.PermissionDenied': 126,
    'HandlerError.Timeout': 124,
    'ValidationError': 64,
    'ResolutionError.Unavailable': 69,
    'ResolutionError.Unrecognized': 127,
    'TransportError': 69,
    'Cancelled': 130,
    'InternalError': 70
};

/**
 * Base class of every recoverable core failure.
 */
export abstract class TerminalError extends Error {
    public abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    public get exitCode(): number {
        return EXIT_CODES[this.kind];
    }
}

/** Bad argument count or shape. Never reaches a handler. */
export class ValidationError extends TerminalError {
    public readonly kind: ErrorKind = 'ValidationError';
}

/** Natural-language input could not be turned into a known command. */
export class ResolutionError extends TerminalError {
    public readonly kind: ErrorKind;

    constructor(public readonly reason: ResolutionErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = `ResolutionError.${reason}`;
    }
}

/** An OS operation failed. */
export class HandlerError extends TerminalError {
    public readonly kind: ErrorKind;

    constructor(public readonly reason: HandlerErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = `HandlerError.${reason}`;
    }
}

/**
 * A multi-operand operation failed after earlier operands took effect.
 * Kind and message are those of the failure; `completed` is what the
 * engine still reports and commits.
 */
export class PartialFailureError extends TerminalError {
    public readonly kind: ErrorKind;

    constructor(public readonly failure: TerminalError, public readonly completed: HandlerOutput) {
        super(failure.message, { cause: failure });
        this.kind = failure.kind;
    }
}

/** The external translation service could not be reached or answered badly. */
export class TransportError extends TerminalError {
    public readonly kind: ErrorKind = 'TransportError';

    constructor(message: string, public readonly status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** The in-flight request was interrupted by its front-end. */
export class CancelledError extends TerminalError {
    public readonly kind: ErrorKind = 'Cancelled';
}

/**
 * Command catalog failed its startup invariants. Fatal; thrown before
 * any session exists.
 */
export class RegistryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RegistryError';
    }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

const ERRNO_KINDS: Readonly<Record<string, HandlerErrorKind>> = {
    ENOENT: 'NotFound',
    ENOTDIR: 'NotFound',
    ESRCH: 'NotFound',
    EACCES: 'PermissionDenied',
    EPERM: 'PermissionDenied',
    ETIMEDOUT: 'Timeout'
};

const ERRNO_TEXT: Readonly<Record<string, string>> = {
    ENOENT: 'No such file or directory',
    ENOTDIR: 'Not a directory',
    ESRCH: 'No such process',
    EACCES: 'Permission denied',
    EPERM: 'Operation not permitted',
    ETIMEDOUT: 'Operation timed out',
    EEXIST: 'File exists',
    ENOTEMPTY: 'Directory not empty',
    EISDIR: 'Is a directory',
    EBUSY: 'Resource busy',
    EXDEV: 'Cross-device link'
};

/**
 * Read the `code` property of a Node system error.
 */
export function errnoCode_get(error: unknown): string | null {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map a Node filesystem/process fault onto a HandlerError.
 *
 * @param error - Whatever the OS call threw.
 * @param subject - Operand the call was about (path, pid).
 */
export function handlerError_fromErrno(error: unknown, subject: string): TerminalError {
    if (error instanceof TerminalError) {
        return error;
    }
    const code: string | null = errnoCode_get(error);
    if (code === null) {
        return new HandlerError('InvalidArgument', `${subject}: ${errorMessage_get(error)}`, { cause: error });
    }
    const kind: HandlerErrorKind = ERRNO_KINDS[code] ?? 'InvalidArgument';
    const text: string = ERRNO_TEXT[code] ?? errorMessage_get(error);
    return new HandlerError(kind, `${subject}: ${text}`, { cause: error });
}
