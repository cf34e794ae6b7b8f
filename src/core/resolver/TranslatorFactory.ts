/**
 * @file Translator Factory
 *
 * Builds the translation boundary named by configuration. Model-backed
 * providers fall back to the offline phrasebook when their service is
 * unreachable.
 *
 * @module core/resolver
 */

import type { CommandSpec } from '../registry/types.js';
import { FallbackTranslator } from './FallbackTranslator.js';
import { LLMTranslator } from './LLMTranslator.js';
import { PatternTranslator } from './PatternTranslator.js';
import { GeminiClient } from './providers/gemini.js';
import { OpenAIClient } from './providers/openai.js';
import type { ChatClient, ProviderName, TranslationBoundary } from './types.js';

export interface TranslatorOptions {
    provider: ProviderName;
    apiKey: string | null;
    model: string | null;
    catalog: readonly CommandSpec[];
    fetchFn?: typeof fetch;
}

/**
 * Create the configured boundary; null when translation is disabled.
 *
 * @throws Error when a model provider is selected without an API key.
 */
export function translator_create(options: TranslatorOptions): TranslationBoundary | null {
    switch (options.provider) {
        case 'none':
            return null;
        case 'patterns':
            return new PatternTranslator();
        case 'openai':
        case 'gemini': {
            if (!options.apiKey) {
                throw new Error(`Provider '${options.provider}' requires an API key`);
            }
            const clientOptions = {
                apiKey: options.apiKey,
                model: options.model ?? undefined,
                fetchFn: options.fetchFn
            };
            const client: ChatClient = options.provider === 'openai'
                ? new OpenAIClient(clientOptions)
                : new GeminiClient(clientOptions);
            return new FallbackTranslator(new LLMTranslator(client, options.catalog), new PatternTranslator());
        }
    }
}
