/**
 * @file Gemini Client Wrapper
 *
 * Handles communication with the Google Gemini API. Gemini has no system
 * role, so system messages are folded into the first user turn.
 *
 * @module core/resolver/providers
 */

import { z } from 'zod';
import { TransportError, errorMessage_get } from '../../errors.js';
import type { ChatClient, ChatMessage } from '../types.js';
import type { ProviderClientOptions } from './openai.js';

export const GEMINI_DEFAULT_MODEL: string = 'gemini-flash-latest';
const GEMINI_BASE_URL: string = 'https://generativelanguage.googleapis.com/v1beta';

const GeminiChatResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.string().optional() })).optional()
        }).optional()
    })).optional()
});

const GeminiErrorSchema = z.object({
    error: z.object({ message: z.string() }).optional()
});

interface GeminiContent {
    role: 'user' | 'model';
    parts: Array<{ text: string }>;
}

/**
 * Client for interacting with the Google Gemini API.
 */
export class GeminiClient implements ChatClient {
    public readonly provider: string = 'gemini';
    private readonly apiKey: string;
    private readonly model: string;
    private readonly fetchFn: typeof fetch;

    constructor(options: ProviderClientOptions) {
        this.apiKey = options.apiKey;
        let modelId: string = options.model || GEMINI_DEFAULT_MODEL;
        // Ensure models/ prefix exists
        if (!modelId.startsWith('models/')) {
            modelId = `models/${modelId}`;
        }
        this.model = modelId;
        this.fetchFn = options.fetchFn ?? fetch;
    }

    /**
     * Sends a chat request to the Gemini API.
     *
     * @returns The text of the first candidate.
     * @throws TransportError on a network failure or non-2xx status.
     */
    async chat(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
        let response: Response;
        try {
            response = await this.fetchFn(`${GEMINI_BASE_URL}/${this.model}:generateContent?key=${encodeURIComponent(this.apiKey)}`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    contents: contents_build(messages),
                    generationConfig: { temperature: 0 }
                }),
                referrerPolicy: 'no-referrer',
                signal
            });
        } catch (error: unknown) {
            if (signal.aborted) throw error;
            throw new TransportError(`Gemini request failed: ${errorMessage_get(error)}`, null, { cause: error });
        }

        const body: unknown = await response.json().catch((): null => null);
        if (!response.ok) {
            const parsed = GeminiErrorSchema.safeParse(body);
            const detail: string = (parsed.success ? parsed.data.error?.message : undefined) ?? response.statusText;
            throw new TransportError(`Gemini API error ${response.status}: ${detail}`, response.status);
        }

        const parsed = GeminiChatResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new TransportError('Gemini API returned an unexpected response', response.status);
        }
        return parsed.data.candidates?.[0]?.content?.parts?.[0]?.text ?? '';
    }
}

/**
 * Map chat messages onto Gemini contents, prepending system context to
 * the first user message.
 */
export function contents_build(messages: readonly ChatMessage[]): GeminiContent[] {
    const systemContext: string = messages
        .filter((m: ChatMessage): boolean => m.role === 'system')
        .map((m: ChatMessage): string => m.content)
        .join('\n\n');

    const contents: GeminiContent[] = messages
        .filter((m: ChatMessage): boolean => m.role !== 'system')
        .map((m: ChatMessage): GeminiContent => ({
            role: m.role === 'user' ? 'user' : 'model',
            parts: [{ text: m.content }]
        }));

    if (contents.length > 0 && systemContext) {
        contents[0].parts[0].text = `SYSTEM CONTEXT:\n${systemContext}\n\nUSER REQUEST:\n${contents[0].parts[0].text}`;
    }
    return contents;
}
