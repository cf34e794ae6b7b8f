/**
 * @file LLM Translator
 *
 * Translation boundary backed by a chat model. The prompt lists the
 * catalog (usage and summary per command) and a handful of worked
 * examples, and asks for one bare command line back.
 *
 * @module core/resolver
 */

import type { CommandSpec } from '../registry/types.js';
import type {
    ChatClient,
    ChatMessage,
    TranslationBoundary,
    TranslationReply,
    TranslationRequest
} from './types.js';

export const TRANSLATION_EXAMPLES: ReadonlyArray<[string, string]> = [
    ['list files in current directory', 'dir'],
    ['create a folder called test', 'mkdir test'],
    ['delete the file hello.txt', 'del hello.txt'],
    ['show all running processes', 'tasklist'],
    ['check CPU usage', 'cpu']
];

export class LLMTranslator implements TranslationBoundary {
    public readonly name: string;

    constructor(
        private readonly client: ChatClient,
        private readonly catalog: readonly CommandSpec[]
    ) {
        this.name = client.provider;
    }

    async translate(request: TranslationRequest, signal: AbortSignal): Promise<TranslationReply> {
        const messages: ChatMessage[] = [
            { role: 'system', content: systemPrompt_build(this.catalog, request.commands) },
            { role: 'user', content: request.text }
        ];
        return { command: await this.client.chat(messages, signal) };
    }
}

/**
 * System prompt naming only the commands the request allows.
 */
export function systemPrompt_build(catalog: readonly CommandSpec[], allowed: readonly string[]): string {
    const permitted: ReadonlySet<string> = new Set(allowed);
    const commandLines: string[] = catalog
        .filter((spec: CommandSpec): boolean => permitted.has(spec.name))
        .map((spec: CommandSpec): string => `- ${spec.usage}: ${spec.summary}`);
    const exampleLines: string[] = TRANSLATION_EXAMPLES
        .map(([text, command]: [string, string]): string => `- "${text}" -> ${command}`);

    return [
        'Convert the user\'s natural language request into exactly one terminal command.',
        '',
        'Supported commands:',
        ...commandLines,
        '',
        'Rules:',
        '- Reply with the command only, on one line, with no explanation or formatting.',
        '- Use relative paths unless the request names an absolute one.',
        '- Quote arguments that contain spaces.',
        '- Never chain commands or use pipes or redirection.',
        '',
        'Examples:',
        ...exampleLines
    ].join('\n');
}
