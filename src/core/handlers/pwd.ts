/**
 * `pwd` operation.
 */

import type { OperationDescriptor } from './types.js';

export const operation: OperationDescriptor = {
    name: 'pwd',
    create: () => ({
        async execute(_args, ctx) {
            return { stdout: ctx.cwd };
        }
    })
};
