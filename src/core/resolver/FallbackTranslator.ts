/**
 * @file Fallback Translator
 *
 * Tries the primary boundary and falls back to the secondary when the
 * primary's transport fails. Unrecognized replies and cancellation are
 * not retried.
 *
 * @module core/resolver
 */

import { TransportError } from '../errors.js';
import type { TranslationBoundary, TranslationReply, TranslationRequest } from './types.js';

export class FallbackTranslator implements TranslationBoundary {
    public readonly name: string;

    constructor(
        private readonly primary: TranslationBoundary,
        private readonly fallback: TranslationBoundary
    ) {
        this.name = `${primary.name}+${fallback.name}`;
    }

    async translate(request: TranslationRequest, signal: AbortSignal): Promise<TranslationReply> {
        try {
            return await this.primary.translate(request, signal);
        } catch (error: unknown) {
            if (error instanceof TransportError && !signal.aborted) {
                return this.fallback.translate(request, signal);
            }
            throw error;
        }
    }
}
