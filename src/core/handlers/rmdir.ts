/**
 * `rmdir` operation. Removes empty directories only; `del` handles
 * directories with contents.
 */

import { readdir, rmdir } from 'fs/promises';
import type { Stats } from 'fs';
import { HandlerError } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { operandFailure_build, path_resolve, stat_require } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'rmdir',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const lines: string[] = [];
            const forgotten: string[] = [];

            for (const operand of args) {
                const target: string = path_resolve(ctx.cwd, operand, system.homedir());
                try {
                    const info: Stats = await stat_require(target, operand);
                    if (!info.isDirectory()) {
                        throw new HandlerError('InvalidArgument', `${operand}: Not a directory`);
                    }
                    const children: string[] = await readdir(target);
                    if (children.length > 0) {
                        throw new HandlerError('InvalidArgument', `${operand}: Directory not empty (use del to remove it with its contents)`);
                    }
                    await rmdir(target);
                } catch (error: unknown) {
                    throw operandFailure_build(error, operand, { stdout: lines.join('\n'), forgotten });
                }
                lines.push(`Removed directory: ${operand}`);
                forgotten.push(target);
            }
            return { stdout: lines.join('\n'), forgotten };
        }
    })
};
