/**
 * @file Pattern Translator
 *
 * Offline translation boundary. Requests are matched against the ordered
 * rules of `phrasebook.yaml`; the first rule whose words occur and whose
 * extractor finds the operands it needs produces the command. Text no
 * rule can map is Unrecognized.
 *
 * @module core/resolver
 */

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { CancelledError, ResolutionError, errorMessage_get } from '../errors.js';
import type { TranslationBoundary, TranslationReply, TranslationRequest } from './types.js';

// ─── Phrasebook schema ──────────────────────────────────────────────────────

const ExtractorSchema = z.enum(['none', 'name', 'create', 'listing', 'cd', 'kill', 'move', 'copy', 'rename', 'echo', 'ping']);

const PhraseListSchema = z.array(z.string().min(1));

const RuleSchema = z.object({
    command: z.string().min(1),
    extract: ExtractorSchema.default('none'),
    any: PhraseListSchema.min(1),
    also: PhraseListSchema.optional()
});

const PhrasebookSchema = z.object({
    stopWords: PhraseListSchema,
    objectWords: PhraseListSchema.min(1),
    nameIndicators: PhraseListSchema.min(1),
    ignoredWords: PhraseListSchema,
    rules: z.array(RuleSchema).min(1)
});

export type Extractor = z.infer<typeof ExtractorSchema>;
export type PhraseRule = z.infer<typeof RuleSchema>;
export type Phrasebook = z.infer<typeof PhrasebookSchema>;

interface CompiledRule {
    command: string;
    extract: Extractor;
    any: RegExp[];
    also: RegExp[] | null;
}

/** Resolve path relative to this module's directory. */
function modulePath_resolve(relativePath: string): string {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    return resolve(__dirname, relativePath);
}

export const DEFAULT_PHRASEBOOK_PATH: string = modulePath_resolve('phrasebook.yaml');

/**
 * Parse and validate phrasebook YAML text.
 *
 * @throws Error when the document does not match the phrasebook schema.
 */
export function phrasebook_parse(yamlStr: string): Phrasebook {
    const result = PhrasebookSchema.safeParse(yaml.load(yamlStr));
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new Error(`Invalid phrasebook: ${issues}`);
    }
    return result.data;
}

/**
 * Load the phrasebook from disk.
 */
export function phrasebook_load(path: string = DEFAULT_PHRASEBOOK_PATH): Phrasebook {
    let yamlStr: string;
    try {
        yamlStr = readFileSync(path, 'utf-8');
    } catch (error: unknown) {
        throw new Error(`Cannot read phrasebook ${path}: ${errorMessage_get(error)}`);
    }
    return phrasebook_parse(yamlStr);
}

// ─── Regex helpers ──────────────────────────────────────────────────────────

const NAME: string = '([\\w.~/-]+)';
const HOST: string = '([\\w.:-]+)';
const OPEN: string = '(?<![\\w.~/-])';
const CLOSE: string = '(?![\\w.~/-])';

function escape(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Alternation of phrases, with internal spaces matching any whitespace run. */
function alternation(phrases: readonly string[]): string {
    return phrases.map((phrase: string): string => escape(phrase).replace(/\s+/g, '\\s+')).join('|');
}

function phrase_compile(phrase: string): RegExp {
    return new RegExp(`${OPEN}(?:${alternation([phrase])})${CLOSE}`, 'i');
}

function pattern(source: string): RegExp {
    return new RegExp(`${OPEN}${source}`, 'gi');
}

/** Drop trailing sentence punctuation from an extracted operand. */
function operand_clean(candidate: string): string {
    return candidate.replace(/[.,!?]+$/, '');
}

// ─── Translator ─────────────────────────────────────────────────────────────

export class PatternTranslator implements TranslationBoundary {
    public readonly name: string = 'patterns';
    private readonly rules: CompiledRule[];
    /** Words never taken as operands by the standalone scan. */
    private readonly vocabulary: ReadonlySet<string>;
    /** Words never taken as operands even after an explicit indicator. */
    private readonly ignored: ReadonlySet<string>;
    private readonly stopPattern: RegExp | null;
    private readonly objects: string;
    private readonly indicators: string;

    constructor(phrasebook: Phrasebook = phrasebook_load()) {
        this.rules = phrasebook.rules.map((rule: PhraseRule): CompiledRule => ({
            command: rule.command,
            extract: rule.extract,
            any: rule.any.map(phrase_compile),
            also: rule.also ? rule.also.map(phrase_compile) : null
        }));

        const lower = (word: string): string => word.toLowerCase();
        this.ignored = new Set([...phrasebook.ignoredWords, ...phrasebook.objectWords, ...phrasebook.stopWords].map(lower));
        const ruleWords: string[] = phrasebook.rules
            .flatMap((rule: PhraseRule): string[] => [...rule.any, ...(rule.also ?? [])])
            .filter((phrase: string): boolean => !/\s/.test(phrase));
        this.vocabulary = new Set([...this.ignored, ...ruleWords.map(lower)]);

        this.stopPattern = phrasebook.stopWords.length > 0
            ? new RegExp(`${OPEN}(?:${alternation(phrasebook.stopWords)})${CLOSE}`, 'gi')
            : null;
        this.objects = alternation(phrasebook.objectWords);
        this.indicators = alternation(phrasebook.nameIndicators);
    }

    async translate(request: TranslationRequest, signal: AbortSignal): Promise<TranslationReply> {
        if (signal.aborted) {
            throw new CancelledError('translation cancelled');
        }
        const command: string | null = this.command_derive(request.text, new Set(request.commands));
        if (command === null) {
            throw new ResolutionError('Unrecognized', `could not understand '${request.text}'`);
        }
        return { command };
    }

    /**
     * Map free text to a command line, or null when no rule applies.
     *
     * @param allowed - Canonical names rules may produce; all when omitted.
     */
    public command_derive(text: string, allowed?: ReadonlySet<string>): string | null {
        for (const rule of this.rules) {
            if (allowed && !allowed.has(rule.command)) continue;
            if (!rule.any.some((re: RegExp): boolean => re.test(text))) continue;
            if (rule.also && !rule.also.some((re: RegExp): boolean => re.test(text))) continue;

            const command: string | null = this.extract(rule, text);
            if (command !== null) {
                return command;
            }
        }
        return null;
    }

    private extract(rule: CompiledRule, text: string): string | null {
        const stripped: string = this.stopWords_strip(text);
        switch (rule.extract) {
            case 'none':
                return rule.command;
            case 'name': {
                const name: string | null = this.name_extract(stripped);
                return name ? `${rule.command} ${name}` : null;
            }
            case 'create': {
                const name: string | null = this.name_extract(stripped);
                if (!name) return null;
                return name.includes('.') && !name.endsWith('/') ? `touch ${name}` : `mkdir ${name.replace(/\/+$/, '')}`;
            }
            case 'listing': {
                const path: string | null = this.first_operand(stripped, [`(?:in|of|inside|under)\\s+${NAME}`]);
                return path ? `${rule.command} ${path}` : rule.command;
            }
            case 'cd':
                return this.cd_extract(stripped);
            case 'kill':
                return this.kill_extract(stripped);
            case 'move':
            case 'copy':
                return this.transfer_extract(rule.command, stripped);
            case 'rename':
                return this.rename_extract(stripped);
            case 'echo':
                return this.echo_extract(text);
            case 'ping': {
                const host: string | null = this.first_operand(stripped, [
                    `ping\\s+${HOST}`,
                    `(?:to|reach|host)\\s+${HOST}`,
                    '([a-z0-9-]+(?:\\.[a-z0-9-]+)+)'
                ]);
                return host ? `ping ${host}` : null;
            }
        }
    }

    private stopWords_strip(text: string): string {
        return this.stopPattern ? text.replace(this.stopPattern, ' ') : text;
    }

    /**
     * First capture across the patterns, in order, that is not a vocabulary word.
     */
    private first_operand(text: string, sources: readonly string[], exclude: ReadonlySet<string> = this.vocabulary): string | null {
        for (const source of sources) {
            for (const match of text.matchAll(pattern(source))) {
                const candidate: string = operand_clean(match[1] ?? '');
                if (candidate && !exclude.has(candidate.toLowerCase())) {
                    return candidate;
                }
            }
        }
        return null;
    }

    /**
     * File or directory name: after an indicator ("called x"), after an
     * object word ("file x"), or the first word outside the vocabulary.
     */
    private name_extract(text: string): string | null {
        const explicit: string | null = this.first_operand(text, [
            `(?:${this.objects})\\s+(?:${this.indicators})\\s+${NAME}`,
            `(?:${this.indicators})\\s+${NAME}`,
            `(?:${this.objects})\\s+${NAME}`
        ], this.ignored);
        return explicit ?? this.first_operand(text, [NAME]);
    }

    private cd_extract(text: string): string | null {
        if (/(?<![\w.])(?:up|parent|back)(?![\w.])/i.test(text)) return 'cd ..';
        if (/(?<![\w.])home(?![\w.])/i.test(text)) return 'cd ~';
        const target: string | null = this.first_operand(text, [
            `(?:to|into|enter)\\s+(?:(?:folder|directory|dir)\\s+)?${NAME}`,
            `(?:folder|directory)\\s+(?:(?:called|named)\\s+)?${NAME}`
        ]);
        return target ? `cd ${target}` : null;
    }

    private kill_extract(text: string): string | null {
        const pid: string | null = this.first_operand(text, [
            '(?:pid|id|process|task|program)\\s+(\\d+)',
            '(\\d+)(?![\\w.])'
        ]);
        if (pid) return `taskkill ${pid}`;
        const name: string | null = this.first_operand(text, [
            `(?:process|task|program)\\s+(?:(?:called|named)\\s+)?([\\w.-]+)`
        ]);
        return name ? `taskkill ${name}` : null;
    }

    private transfer_extract(command: string, text: string): string | null {
        const source: string | null = this.first_operand(text, [
            '([\\w-]+\\.\\w+)',
            `(?:file|folder|directory)\\s+${NAME}`,
            `(?:move|copy|transfer|relocate|shift|duplicate|clone|backup)\\s+${NAME}`
        ]);
        if (!source) return null;
        const dest: string | null = this.first_operand(text, [
            `(?:into|to|in)\\s+(?:(?:folder|directory)\\s+)?${NAME}`,
            `${NAME}\\s+(?:folder|directory)`
        ], new Set([...this.vocabulary, source.toLowerCase()]));
        return dest ? `${command} ${source} ${dest}` : null;
    }

    private rename_extract(text: string): string | null {
        const sources: string[] = [
            `(?:rename|ren|change\\s+name|rechristen)\\s+(?:(?:file|folder|directory)\\s+)?${NAME}\\s+(?:to|as)\\s+${NAME}`,
            `${NAME}\\s+(?:to|as)\\s+${NAME}`
        ];
        for (const source of sources) {
            for (const match of text.matchAll(pattern(source))) {
                const from: string = operand_clean(match[1] ?? '');
                const to: string = operand_clean(match[2] ?? '');
                if (from && to && !this.vocabulary.has(from.toLowerCase()) && !this.vocabulary.has(to.toLowerCase())) {
                    return `ren ${from} ${to}`;
                }
            }
        }
        return null;
    }

    private echo_extract(text: string): string | null {
        const quoted: RegExpMatchArray | null = text.match(/["']([^"']+)["']/);
        if (quoted) return `echo ${quoted[1].trim()}`;

        const labelled: RegExpMatchArray | null = text.match(/(?<![\w.])(?:text|message|content)\s+(.+)/i);
        if (labelled) return `echo ${labelled[1].trim()}`;

        const rest: RegExpMatchArray | null = text.match(/(?<![\w.])(?:echo|print|say|output)\s+(.+)/i);
        return rest ? `echo ${rest[1].trim()}` : null;
    }
}
