/**
 * `mkdir` operation. Parents are created as needed and an existing
 * directory is accepted; an existing non-directory is an error.
 */

import { mkdir } from 'fs/promises';
import type { Stats } from 'fs';
import { HandlerError } from '../errors.js';
import type { HandlerOutput, OperationDescriptor, SeenEntry } from './types.js';
import { operandFailure_build, path_resolve, stat_maybe } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'mkdir',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const lines: string[] = [];
            const seen: SeenEntry[] = [];

            for (const operand of args) {
                const target: string = path_resolve(ctx.cwd, operand, system.homedir());
                try {
                    const existing: Stats | null = await stat_maybe(target, operand);
                    if (existing && !existing.isDirectory()) {
                        throw new HandlerError('InvalidArgument', `${operand}: File exists`);
                    }
                    if (existing) {
                        lines.push(`Directory exists: ${operand}`);
                    } else {
                        await mkdir(target, { recursive: true });
                        lines.push(`Created directory: ${operand}`);
                    }
                } catch (error: unknown) {
                    throw operandFailure_build(error, operand, { stdout: lines.join('\n'), seen });
                }
                seen.push({ path: target, directory: true });
            }
            return { stdout: lines.join('\n'), seen };
        }
    })
};
