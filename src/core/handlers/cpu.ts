/**
 * `cpu` operation. Usage is the busy share of CPU time between two
 * samples of `os.cpus()`.
 */

import type { CpuInfo } from 'os';
import { setTimeout as delay } from 'timers/promises';
import { CancelledError, HandlerError } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';

interface CpuTotals {
    idle: number;
    total: number;
}

export const operation: OperationDescriptor = {
    name: 'cpu',
    create: ({ system }) => ({
        async execute(_args, ctx): Promise<HandlerOutput> {
            const first: CpuInfo[] = system.cpus();
            if (first.length === 0) {
                throw new HandlerError('NotFound', 'CPU information is not available on this system');
            }
            try {
                await delay(system.sampleDelayMs, undefined, { signal: ctx.signal });
            } catch (error: unknown) {
                throw new CancelledError('cpu: cancelled', { cause: error });
            }
            const second: CpuInfo[] = system.cpus();

            const percent: number = usage_percent(cpuTotals_sum(first), cpuTotals_sum(second));
            const model: string = first[0].model.trim();
            return { stdout: `CPU usage: ${percent.toFixed(1)}% (${first.length} cores, ${model})` };
        }
    })
};

function cpuTotals_sum(cpus: readonly CpuInfo[]): CpuTotals {
    let idle: number = 0;
    let total: number = 0;
    for (const cpu of cpus) {
        const { user, nice, sys, idle: idleTime, irq } = cpu.times;
        idle += idleTime;
        total += user + nice + sys + idleTime + irq;
    }
    return { idle, total };
}

/**
 * Busy percentage between two samples, clamped to [0, 100].
 */
export function usage_percent(before: CpuTotals, after: CpuTotals): number {
    const totalDelta: number = after.total - before.total;
    if (totalDelta <= 0) {
        return 0;
    }
    const busy: number = 1 - (after.idle - before.idle) / totalDelta;
    return Math.min(100, Math.max(0, busy * 100));
}
