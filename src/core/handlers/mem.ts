/**
 * `mem` operation.
 */

import type { OperationDescriptor } from './types.js';

const GIB: number = 1024 ** 3;

export const operation: OperationDescriptor = {
    name: 'mem',
    create: ({ system }) => ({
        async execute() {
            const total: number = system.totalmem();
            const used: number = total - system.freemem();
            const percent: number = total > 0 ? (used / total) * 100 : 0;
            return {
                stdout: `Memory: ${percent.toFixed(1)}% used (${(used / GIB).toFixed(2)} GiB / ${(total / GIB).toFixed(2)} GiB)`
            };
        }
    })
};
