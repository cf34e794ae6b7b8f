/**
 * @file Reply Normalization
 *
 * Cleans up a translator reply and decides whether it is an executable
 * command line. Only a single line whose leading token is a known
 * command, free of shell operators, passes.
 *
 * @module core/resolver
 */

import { ResolutionError } from '../errors.js';
import type { CommandRegistry } from '../registry/CommandRegistry.js';
import { leadingToken_get } from '../registry/tokenizer.js';

const FENCE_PATTERN: RegExp = /^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/;
const PROMPT_PREFIX: RegExp = /^[$>]\s+/;
const SHELL_OPERATORS: RegExp = /\||;|&&|>|<|`/;
const WRAPPERS: ReadonlySet<string> = new Set(['"', "'", '`']);

/**
 * Strip a code fence, surrounding quotes or backticks and a `$ ` / `> `
 * prompt prefix from a reply.
 */
export function reply_normalize(reply: string): string {
    let text: string = reply.trim();

    const fence: RegExpMatchArray | null = text.match(FENCE_PATTERN);
    if (fence) {
        text = fence[1].trim();
    }

    while (text.length >= 2 && WRAPPERS.has(text[0]) && text[text.length - 1] === text[0]) {
        text = text.slice(1, -1).trim();
    }

    return text.replace(PROMPT_PREFIX, '').trim();
}

/**
 * Reject anything that is not a single known command line.
 *
 * @param command - Normalized reply.
 * @param raw - Original request text, for the error message.
 * @throws ResolutionError `Unrecognized`.
 */
export function reply_validate(command: string, raw: string, registry: CommandRegistry): string {
    if (command === '') {
        throw new ResolutionError('Unrecognized', `could not understand '${raw}'`);
    }
    if (/[\r\n]/.test(command)) {
        throw new ResolutionError('Unrecognized', `translation of '${raw}' spans more than one line`);
    }
    if (SHELL_OPERATORS.test(command)) {
        throw new ResolutionError('Unrecognized', `translation '${command}' contains shell operators`);
    }
    if (!registry.lookup(leadingToken_get(command))) {
        throw new ResolutionError('Unrecognized', `translation '${command}' is not a known command`);
    }
    return command;
}
