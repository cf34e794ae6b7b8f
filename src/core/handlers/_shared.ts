/**
 * Shared helpers for operation handler modules.
 *
 * Kept small so each handler stays self-contained while path
 * resolution and stat handling behave the same everywhere.
 */

import { stat } from 'fs/promises';
import type { Stats } from 'fs';
import { isAbsolute, resolve } from 'path';
import {
    HandlerError,
    PartialFailureError,
    errnoCode_get,
    handlerError_fromErrno,
    type HandlerErrorKind,
    type TerminalError
} from '../errors.js';
import type { RunOutput } from './runner.js';
import type { HandlerOutput } from './types.js';

/**
 * Resolve an operand against the session working directory.
 * A leading `~` expands to the home directory.
 */
export function path_resolve(cwd: string, operand: string, home: string): string {
    if (operand === '~') {
        return home;
    }
    if (operand.startsWith('~/') || operand.startsWith('~\\')) {
        return resolve(home, operand.slice(2));
    }
    return isAbsolute(operand) ? resolve(operand) : resolve(cwd, operand);
}

/**
 * Stat a path, returning null when it does not exist.
 *
 * @throws HandlerError for any fault other than a missing path.
 */
export async function stat_maybe(path: string, operand: string): Promise<Stats | null> {
    try {
        return await stat(path);
    } catch (error: unknown) {
        if (errnoCode_get(error) === 'ENOENT') {
            return null;
        }
        throw handlerError_fromErrno(error, operand);
    }
}

/**
 * Stat a path that must exist.
 *
 * @throws HandlerError `NotFound` when it is missing.
 */
export async function stat_require(path: string, operand: string): Promise<Stats> {
    try {
        return await stat(path);
    } catch (error: unknown) {
        throw handlerError_fromErrno(error, operand);
    }
}

/**
 * Require a zero exit from a spawned utility.
 *
 * @throws HandlerError of the given kind carrying the utility's own message.
 */
export function runOutput_require(output: RunOutput, program: string, kind: HandlerErrorKind): string {
    if (output.exitCode === 0) {
        return output.stdout;
    }
    const detail: string = output.stderr.trim() || output.stdout.trim() || `exited with status ${output.exitCode}`;
    throw new HandlerError(kind, `${program}: ${detail}`);
}

/** Strip one trailing newline so renderers control spacing. */
export function trailingNewline_strip(text: string): string {
    return text.replace(/\r?\n$/, '');
}

/**
 * Convert a fault on one operand of a multi-operand run, keeping the
 * operands already done when there are any.
 */
export function operandFailure_build(error: unknown, operand: string, completed: HandlerOutput): TerminalError {
    const failure: TerminalError = handlerError_fromErrno(error, operand);
    return completed.stdout === '' ? failure : new PartialFailureError(failure, completed);
}
