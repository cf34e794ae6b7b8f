/**
 * `echo` operation.
 */

import type { OperationDescriptor } from './types.js';

export const operation: OperationDescriptor = {
    name: 'echo',
    create: () => ({
        async execute(args) {
            return { stdout: args.join(' ') };
        }
    })
};
