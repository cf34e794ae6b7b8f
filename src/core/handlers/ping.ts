/**
 * `ping` operation. Sends a bounded number of echo requests (4 unless
 * given) through the host utility.
 */

import type { RunOutput } from './runner.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { runOutput_require, trailingNewline_strip } from './_shared.js';

export const DEFAULT_PING_COUNT: number = 4;

export const operation: OperationDescriptor = {
    name: 'ping',
    create: ({ runner, platform }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const host: string = args[0];
            const count: string = args[1] ?? String(DEFAULT_PING_COUNT);
            const countFlag: string = platform === 'win32' ? '-n' : '-c';

            const output: RunOutput = await runner.run('ping', [countFlag, count, host], {
                cwd: ctx.cwd,
                timeoutMs: ctx.timeoutMs,
                signal: ctx.signal
            });
            return { stdout: trailingNewline_strip(runOutput_require(output, `ping ${host}`, 'NotFound')) };
        }
    })
};
