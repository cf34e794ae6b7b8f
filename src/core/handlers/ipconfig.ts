/**
 * `ipconfig` operation: interface addresses as reported by Node, so the
 * output has the same shape on every platform.
 */

import type { NetworkInterfaceInfo } from 'os';
import type { OperationDescriptor } from './types.js';

export const operation: OperationDescriptor = {
    name: 'ipconfig',
    create: ({ system }) => ({
        async execute() {
            const interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = system.networkInterfaces();
            const names: string[] = Object.keys(interfaces).sort();
            if (names.length === 0) {
                return { stdout: 'No network interfaces found' };
            }

            const lines: string[] = [];
            for (const name of names) {
                lines.push(`${name}:`);
                for (const info of interfaces[name] ?? []) {
                    const internal: string = info.internal ? '  (internal)' : '';
                    lines.push(`  ${info.family.padEnd(5)} ${info.address}  netmask ${info.netmask}${internal}`);
                }
            }
            return { stdout: lines.join('\n') };
        }
    })
};
