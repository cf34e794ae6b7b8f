/**
 * `exit` operation: asks the front-end to end the session.
 */

import type { HandlerOutput, OperationDescriptor } from './types.js';

export const operation: OperationDescriptor = {
    name: 'exit',
    create: () => ({
        async execute(): Promise<HandlerOutput> {
            return { stdout: 'Goodbye.', directive: 'exit' };
        }
    })
};
