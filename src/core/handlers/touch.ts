/**
 * `touch` operation. Creates empty files (and their parent directories)
 * or refreshes the timestamps of existing ones.
 */

import { mkdir, utimes, writeFile } from 'fs/promises';
import type { Stats } from 'fs';
import { dirname } from 'path';
import type { HandlerOutput, OperationDescriptor, SeenEntry } from './types.js';
import { operandFailure_build, path_resolve, stat_maybe } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'touch',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const lines: string[] = [];
            const seen: SeenEntry[] = [];

            for (const operand of args) {
                const target: string = path_resolve(ctx.cwd, operand, system.homedir());
                let existing: Stats | null = null;
                try {
                    existing = await stat_maybe(target, operand);
                    if (existing) {
                        const now: Date = new Date();
                        await utimes(target, now, now);
                        lines.push(`Updated: ${operand}`);
                    } else {
                        await mkdir(dirname(target), { recursive: true });
                        await writeFile(target, '', { flag: 'wx' });
                        lines.push(`Created file: ${operand}`);
                    }
                } catch (error: unknown) {
                    throw operandFailure_build(error, operand, { stdout: lines.join('\n'), seen });
                }
                seen.push({ path: target, directory: existing?.isDirectory() ?? false });
            }
            return { stdout: lines.join('\n'), seen };
        }
    })
};
