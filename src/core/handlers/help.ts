/**
 * `help` operation. The listing is generated from the registry so it
 * never drifts from the catalog.
 */

import { HandlerError } from '../errors.js';
import type { CommandCategory, CommandSpec } from '../registry/types.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';

const CATEGORY_TITLES: ReadonlyArray<[CommandCategory, string]> = [
    ['filesystem', 'Files and directories'],
    ['process', 'Processes'],
    ['system', 'System'],
    ['network', 'Network'],
    ['session', 'Session']
];

export const operation: OperationDescriptor = {
    name: 'help',
    create: () => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            if (args[0] !== undefined) {
                const spec: CommandSpec | null = ctx.registry.lookup(args[0]);
                if (!spec) {
                    throw new HandlerError('InvalidArgument', `${args[0]}: unknown command`);
                }
                return { stdout: commandHelp_render(spec) };
            }

            const specs: readonly CommandSpec[] = ctx.registry.specs_list();
            const lines: string[] = ['Available commands:'];
            for (const [category, title] of CATEGORY_TITLES) {
                const members: CommandSpec[] = specs.filter((spec: CommandSpec): boolean => spec.category === category);
                if (members.length === 0) continue;
                lines.push('', `${title}:`);
                for (const spec of members) {
                    const aliases: string = spec.aliases.length > 0 ? ` (${spec.aliases.join(', ')})` : '';
                    lines.push(`  ${spec.usage.padEnd(30)} ${spec.summary}${aliases}`);
                }
            }
            lines.push('', 'Anything else is read as a natural-language request and translated into one of these commands.');
            return { stdout: lines.join('\n') };
        }
    })
};

function commandHelp_render(spec: CommandSpec): string {
    const lines: string[] = [`usage: ${spec.usage}`, `  ${spec.summary}`];
    if (spec.aliases.length > 0) {
        lines.push(`  aliases: ${spec.aliases.join(', ')}`);
    }
    return lines.join('\n');
}
