/**
 * `tasklist` operation: point-in-time process listing from the host's
 * own utility (`ps` on POSIX, `tasklist` on Windows).
 */

import type { RunOutput } from './runner.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { runOutput_require, trailingNewline_strip } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'tasklist',
    create: ({ runner, platform }) => ({
        async execute(_args, ctx): Promise<HandlerOutput> {
            const [program, programArgs]: [string, string[]] = platform === 'win32'
                ? ['tasklist', []]
                : ['ps', ['-eo', 'pid,comm,%cpu,%mem']];

            const output: RunOutput = await runner.run(program, programArgs, {
                cwd: ctx.cwd,
                timeoutMs: ctx.timeoutMs,
                signal: ctx.signal
            });
            return { stdout: trailingNewline_strip(runOutput_require(output, program, 'InvalidArgument')) };
        }
    })
};
