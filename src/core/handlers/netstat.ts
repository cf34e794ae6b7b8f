/**
 * `netstat` operation.
 */

import type { RunOutput } from './runner.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { runOutput_require, trailingNewline_strip } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'netstat',
    create: ({ runner }) => ({
        async execute(_args, ctx): Promise<HandlerOutput> {
            const output: RunOutput = await runner.run('netstat', ['-an'], {
                cwd: ctx.cwd,
                timeoutMs: ctx.timeoutMs,
                signal: ctx.signal
            });
            return { stdout: trailingNewline_strip(runOutput_require(output, 'netstat', 'InvalidArgument')) };
        }
    })
};
