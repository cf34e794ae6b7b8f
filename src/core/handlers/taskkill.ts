/**
 * `taskkill` operation.
 *
 * A numeric operand is signalled directly. Neither form reaches the
 * process hosting the engine. A name is matched against a
 * fresh `ps` snapshot; the snapshot may be stale by the time the signal
 * lands, so a vanished process is reported as NotFound rather than
 * treated as fatal.
 */

import { basename } from 'path';
import { HandlerError, ValidationError, handlerError_fromErrno, type TerminalError } from '../errors.js';
import type { ProcessRunner, RunOutput } from './runner.js';
import type { HandlerContext, HandlerOutput, OperationDescriptor } from './types.js';
import { runOutput_require, trailingNewline_strip } from './_shared.js';

export interface ProcessRow {
    pid: number;
    name: string;
}

export const operation: OperationDescriptor = {
    name: 'taskkill',
    create: ({ runner, platform }) => ({
        validate(args): void {
            if (/^\d+$/.test(args[0]) && Number(args[0]) === 0) {
                throw new ValidationError('pid 0 addresses a process group; name a single process');
            }
        },

        async execute(args, ctx): Promise<HandlerOutput> {
            const target: string = args[0];
            if (/^\d+$/.test(target) && Number(target) === process.pid) {
                throw new HandlerError('InvalidArgument', `${target}: refusing to signal the terminal's own process`);
            }
            if (platform === 'win32') {
                return windowsProcess_kill(runner, target, ctx);
            }

            if (/^\d+$/.test(target)) {
                const pid: number = Number(target);
                signal_deliver(runner, pid);
                return { stdout: `Sent SIGTERM to ${pid}` };
            }

            const snapshot: RunOutput = await runner.run('ps', ['-eo', 'pid=,comm='], {
                cwd: ctx.cwd,
                timeoutMs: ctx.timeoutMs,
                signal: ctx.signal
            });
            const rows: ProcessRow[] = processRows_parse(runOutput_require(snapshot, 'ps', 'InvalidArgument'));
            const wanted: string = target.toLowerCase();
            const matches: ProcessRow[] = rows.filter(
                (row: ProcessRow): boolean => row.pid !== process.pid && row.name.toLowerCase() === wanted
            );
            if (matches.length === 0) {
                throw new HandlerError('NotFound', `${target}: no matching process`);
            }

            const lines: string[] = [];
            let firstFailure: TerminalError | null = null;
            for (const row of matches) {
                try {
                    signal_deliver(runner, row.pid);
                    lines.push(`Sent SIGTERM to ${row.pid} (${row.name})`);
                } catch (error: unknown) {
                    firstFailure = firstFailure ?? handlerError_fromErrno(error, String(row.pid));
                }
            }
            if (lines.length === 0 && firstFailure) {
                throw firstFailure;
            }
            return { stdout: lines.join('\n') };
        }
    })
};

/**
 * Parse `ps -eo pid=,comm=` output. Command names are reduced to their
 * basename since some platforms print full paths.
 */
export function processRows_parse(text: string): ProcessRow[] {
    const rows: ProcessRow[] = [];
    for (const line of text.split(/\r?\n/)) {
        const match: RegExpMatchArray | null = line.trim().match(/^(\d+)\s+(.+)$/);
        if (match) {
            rows.push({ pid: Number(match[1]), name: basename(match[2].trim()) });
        }
    }
    return rows;
}

function signal_deliver(runner: ProcessRunner, pid: number): void {
    try {
        runner.signal_send(pid, 'SIGTERM');
    } catch (error: unknown) {
        throw handlerError_fromErrno(error, String(pid));
    }
}

async function windowsProcess_kill(runner: ProcessRunner, target: string, ctx: HandlerContext): Promise<HandlerOutput> {
    const selector: string[] = /^\d+$/.test(target) ? ['/PID', target] : ['/IM', target];
    const output: RunOutput = await runner.run('taskkill', [...selector, '/F'], {
        cwd: ctx.cwd,
        timeoutMs: ctx.timeoutMs,
        signal: ctx.signal
    });
    return { stdout: trailingNewline_strip(runOutput_require(output, 'taskkill', 'NotFound')) };
}
