/**
 * `history` operation: the most recent entries of the calling session,
 * numbered by their position in the full history.
 */

import type { HistoryEntry } from '../engine/types.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';

export const DEFAULT_HISTORY_COUNT: number = 20;

export const operation: OperationDescriptor = {
    name: 'history',
    create: () => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const entries: readonly HistoryEntry[] = ctx.history();
            if (entries.length === 0) {
                return { stdout: 'No command history' };
            }

            const limit: number = args[0] ? Number(args[0]) : DEFAULT_HISTORY_COUNT;
            const start: number = Math.max(0, entries.length - limit);
            const lines: string[] = [];
            for (let i = start; i < entries.length; i++) {
                const entry: HistoryEntry = entries[i];
                const resolved: string = entry.command !== null && entry.command !== entry.raw
                    ? `  -> ${entry.command}`
                    : '';
                lines.push(`${String(i + 1).padStart(4)}  ${entry.raw}${resolved}`);
            }
            lines.push('', `Total commands: ${entries.length}`);
            return { stdout: lines.join('\n') };
        }
    })
};
