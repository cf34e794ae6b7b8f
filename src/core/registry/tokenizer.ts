/**
 * @file Command Line Tokenizer
 *
 * Splits a literal command line into words. Single and double quotes
 * group words containing spaces; there is no other shell grammar.
 *
 * @module core/registry
 */

import { ValidationError } from '../errors.js';

/**
 * Tokenize a command line.
 *
 * @param line - Literal command text.
 * @returns Words with surrounding quotes removed.
 * @throws ValidationError on an unterminated quote.
 */
export function commandLine_tokenize(line: string): string[] {
    const tokens: string[] = [];
    let current: string = '';
    let quote: '"' | "'" | null = null;
    let inToken: boolean = false;

    for (const char of line) {
        if (quote) {
            if (char === quote) {
                quote = null;
            } else {
                current += char;
            }
            continue;
        }

        if (char === '"' || char === "'") {
            quote = char;
            inToken = true;
            continue;
        }

        if (/\s/.test(char)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
            continue;
        }

        current += char;
        inToken = true;
    }

    if (quote) {
        throw new ValidationError(`unterminated ${quote === '"' ? 'double' : 'single'} quote`);
    }
    if (inToken) {
        tokens.push(current);
    }
    return tokens;
}

/**
 * First whitespace-delimited word of a line, or '' for blank input.
 */
export function leadingToken_get(line: string): string {
    return line.trim().split(/\s+/)[0] ?? '';
}
