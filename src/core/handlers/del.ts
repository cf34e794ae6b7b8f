/**
 * `del` operation. Files are unlinked, directories removed with their
 * contents. Operands are processed in order; a failure stops the run
 * and earlier deletions are still reported.
 */

import { lstat, rm } from 'fs/promises';
import type { Stats } from 'fs';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { operandFailure_build, path_resolve } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'del',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const lines: string[] = [];
            const forgotten: string[] = [];

            for (const operand of args) {
                const target: string = path_resolve(ctx.cwd, operand, system.homedir());
                try {
                    const info: Stats = await lstat(target);
                    await rm(target, { recursive: info.isDirectory(), force: false });
                    lines.push(`Deleted: ${operand}${info.isDirectory() ? '/' : ''}`);
                } catch (error: unknown) {
                    throw operandFailure_build(error, operand, { stdout: lines.join('\n'), forgotten });
                }
                forgotten.push(target);
            }
            return { stdout: lines.join('\n'), forgotten };
        }
    })
};
