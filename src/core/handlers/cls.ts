/**
 * `cls` operation: asks the front-end to clear its screen.
 */

import type { HandlerOutput, OperationDescriptor } from './types.js';

export const operation: OperationDescriptor = {
    name: 'cls',
    create: () => ({
        async execute(): Promise<HandlerOutput> {
            return { stdout: '', directive: 'clear' };
        }
    })
};
