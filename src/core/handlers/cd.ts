/**
 * `cd` operation. No operand (or `~`) goes home; success reports the new
 * working directory as a delta for the engine to commit.
 */

import type { Stats } from 'fs';
import { HandlerError } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { path_resolve, stat_require } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'cd',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const operand: string = args[0] ?? '~';
            const target: string = path_resolve(ctx.cwd, operand, system.homedir());
            const info: Stats = await stat_require(target, operand);
            if (!info.isDirectory()) {
                throw new HandlerError('InvalidArgument', `${operand}: Not a directory`);
            }
            return { stdout: '', cwd: target };
        }
    })
};
