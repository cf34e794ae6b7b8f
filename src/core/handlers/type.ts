/**
 * `type` operation: print a text file of at most 1 MiB.
 */

import { readFile } from 'fs/promises';
import type { Stats } from 'fs';
import { HandlerError, handlerError_fromErrno } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { path_resolve, stat_require, trailingNewline_strip } from './_shared.js';

export const MAX_TYPE_BYTES: number = 1024 * 1024;

export const operation: OperationDescriptor = {
    name: 'type',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const operand: string = args[0];
            const target: string = path_resolve(ctx.cwd, operand, system.homedir());
            const info: Stats = await stat_require(target, operand);

            if (info.isDirectory()) {
                throw new HandlerError('InvalidArgument', `${operand}: Is a directory`);
            }
            if (info.size > MAX_TYPE_BYTES) {
                throw new HandlerError('InvalidArgument', `${operand}: file too large (${info.size} bytes, limit ${MAX_TYPE_BYTES})`);
            }

            let content: string;
            try {
                content = await readFile(target, { encoding: 'utf-8', signal: ctx.signal });
            } catch (error: unknown) {
                throw handlerError_fromErrno(error, operand);
            }
            if (content.includes('\0')) {
                throw new HandlerError('InvalidArgument', `${operand}: binary file`);
            }
            return { stdout: trailingNewline_strip(content) };
        }
    })
};
