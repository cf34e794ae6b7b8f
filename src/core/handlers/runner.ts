/**
 * @file Process Runner
 *
 * Spawn-and-capture boundary used by handlers that shell out to host
 * utilities (ps, ping, netstat). Every run is bounded by a timeout and
 * aborts with its request.
 *
 * @module core/handlers/runner
 */

import { execFile, type ExecFileException } from 'child_process';
import { CancelledError, HandlerError } from '../errors.js';

export interface RunOptions {
    cwd: string;
    timeoutMs: number;
    signal: AbortSignal;
}

export interface RunOutput {
    stdout: string;
    stderr: string;
    exitCode: number;
}

/**
 * Process boundary. Non-zero exits resolve; only spawn faults reject.
 */
export interface ProcessRunner {
    /**
     * Run a program to completion.
     *
     * @throws HandlerError `NotFound` when the program is missing, `Timeout` when it overruns.
     * @throws CancelledError when the signal aborts.
     */
    run(file: string, args: readonly string[], options: RunOptions): Promise<RunOutput>;
    /**
     * Deliver a signal to a process.
     *
     * @throws The raw errno error (ESRCH, EPERM) from the OS.
     */
    signal_send(pid: number, signal?: NodeJS.Signals): void;
}

const MAX_BUFFER: number = 4 * 1024 * 1024;

/**
 * Runner backed by `child_process.execFile`. No shell is involved.
 */
export const systemRunner: ProcessRunner = {
    run(file: string, args: readonly string[], options: RunOptions): Promise<RunOutput> {
        if (options.signal.aborted) {
            return Promise.reject(new CancelledError(`${file}: cancelled`));
        }

        return new Promise(
            (
                resolve: (value: RunOutput) => void,
                reject: (reason?: unknown) => void
            ): void => {
                execFile(
                    file,
                    [...args],
                    {
                        cwd: options.cwd,
                        timeout: options.timeoutMs,
                        signal: options.signal,
                        maxBuffer: MAX_BUFFER,
                        windowsHide: true,
                        encoding: 'utf8'
                    },
                    (error: ExecFileException | null, stdout: string, stderr: string): void => {
                        if (!error) {
                            resolve({ stdout, stderr, exitCode: 0 });
                            return;
                        }
                        if (options.signal.aborted || error.name === 'AbortError') {
                            reject(new CancelledError(`${file}: cancelled`, { cause: error }));
                            return;
                        }
                        const code: unknown = error.code;
                        if (code === 'ENOENT') {
                            reject(new HandlerError('NotFound', `${file}: command not available on this system`, { cause: error }));
                            return;
                        }
                        if (error.killed) {
                            reject(new HandlerError('Timeout', `${file}: timed out after ${options.timeoutMs} ms`, { cause: error }));
                            return;
                        }
                        if (typeof code === 'number') {
                            resolve({ stdout, stderr, exitCode: code });
                            return;
                        }
                        reject(new HandlerError('InvalidArgument', `${file}: ${error.message}`, { cause: error }));
                    }
                );
            }
        );
    },

    signal_send(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
        process.kill(pid, signal);
    }
};
