/**
 * @file OpenAI Client Wrapper
 *
 * Handles direct communication with the OpenAI Chat Completions API.
 *
 * @module core/resolver/providers
 */

import { z } from 'zod';
import { TransportError, errorMessage_get } from '../../errors.js';
import type { ChatClient, ChatMessage } from '../types.js';

export const OPENAI_DEFAULT_MODEL: string = 'gpt-4o-mini';
const OPENAI_URL: string = 'https://api.openai.com/v1/chat/completions';

const OpenAIChatResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable() })
    }))
});

const OpenAIErrorSchema = z.object({
    error: z.object({ message: z.string() }).optional()
});

export interface ProviderClientOptions {
    apiKey: string;
    model?: string;
    fetchFn?: typeof fetch;
}

/**
 * Client for interacting with the OpenAI Chat Completions API.
 */
export class OpenAIClient implements ChatClient {
    public readonly provider: string = 'openai';
    private readonly apiKey: string;
    private readonly model: string;
    private readonly fetchFn: typeof fetch;

    constructor(options: ProviderClientOptions) {
        this.apiKey = options.apiKey;
        this.model = options.model || OPENAI_DEFAULT_MODEL;
        this.fetchFn = options.fetchFn ?? fetch;
    }

    /**
     * Sends a chat request to the OpenAI API.
     *
     * @returns The content of the assistant's response.
     * @throws TransportError on a network failure or non-2xx status.
     */
    async chat(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
        let response: Response;
        try {
            response = await this.fetchFn(OPENAI_URL, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.apiKey}`
                },
                body: JSON.stringify({
                    model: this.model,
                    messages,
                    temperature: 0
                }),
                signal
            });
        } catch (error: unknown) {
            if (signal.aborted) throw error;
            throw new TransportError(`OpenAI request failed: ${errorMessage_get(error)}`, null, { cause: error });
        }

        const body: unknown = await response.json().catch((): null => null);
        if (!response.ok) {
            const parsed = OpenAIErrorSchema.safeParse(body);
            const detail: string = (parsed.success ? parsed.data.error?.message : undefined) ?? response.statusText;
            throw new TransportError(`OpenAI API error ${response.status}: ${detail}`, response.status);
        }

        const parsed = OpenAIChatResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new TransportError('OpenAI API returned an unexpected response', response.status);
        }
        return parsed.data.choices[0]?.message.content ?? '';
    }
}
