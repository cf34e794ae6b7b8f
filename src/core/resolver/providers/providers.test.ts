import { describe, it, expect, vi, type Mock } from 'vitest';
import { OpenAIClient } from './openai.js';
import { GeminiClient, contents_build } from './gemini.js';
import { TransportError } from '../../errors.js';
import type { ChatMessage } from '../types.js';

const MESSAGES: ChatMessage[] = [
    { role: 'system', content: 'Reply with one command.' },
    { role: 'user', content: 'show files' }
];

function fetch_stub(status: number, body: unknown): Mock<typeof fetch> {
    return vi.fn<typeof fetch>(async (): Promise<Response> => new Response(JSON.stringify(body), { status }));
}

async function failure_capture(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error: unknown) {
        return error;
    }
    throw new Error('expected the request to fail');
}

describe('OpenAIClient', (): void => {
    it('posts the conversation and returns the first choice', async (): Promise<void> => {
        const fetchFn = fetch_stub(200, { choices: [{ message: { content: 'dir' } }] });
        const client: OpenAIClient = new OpenAIClient({ apiKey: 'test-secret', fetchFn });

        expect(await client.chat(MESSAGES, new AbortController().signal)).toBe('dir');

        const [url, init] = fetchFn.mock.calls[0];
        expect(url).toBe('https://api.openai.com/v1/chat/completions');
        expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
        expect(JSON.parse(String(init?.body))).toEqual({ model: 'gpt-4o-mini', messages: MESSAGES, temperature: 0 });
    });

    it('raises a TransportError carrying the API message', async (): Promise<void> => {
        const fetchFn = fetch_stub(401, { error: { message: 'Incorrect API key provided' } });
        const client: OpenAIClient = new OpenAIClient({ apiKey: 'test-secret', fetchFn });
        const error: unknown = await failure_capture(client.chat(MESSAGES, new AbortController().signal));

        expect(error).toBeInstanceOf(TransportError);
        expect(error instanceof TransportError && error.status).toBe(401);
        expect(error instanceof Error && error.message).toBe('OpenAI API error 401: Incorrect API key provided');
    });

    it('wraps network failures', async (): Promise<void> => {
        const fetchFn = vi.fn<typeof fetch>(async (): Promise<Response> => {
            throw new TypeError('fetch failed');
        });
        const client: OpenAIClient = new OpenAIClient({ apiKey: 'test-secret', fetchFn });
        const error: unknown = await failure_capture(client.chat(MESSAGES, new AbortController().signal));

        expect(error instanceof Error && error.message).toBe('OpenAI request failed: fetch failed');
    });

    it('rejects a malformed body', async (): Promise<void> => {
        const client: OpenAIClient = new OpenAIClient({ apiKey: 'test-secret', fetchFn: fetch_stub(200, { nope: true }) });
        await expect(client.chat(MESSAGES, new AbortController().signal)).rejects.toBeInstanceOf(TransportError);
    });
});

describe('GeminiClient', (): void => {
    it('calls the model endpoint and reads the first candidate', async (): Promise<void> => {
        const fetchFn = fetch_stub(200, { candidates: [{ content: { parts: [{ text: 'tasklist' }] } }] });
        const client: GeminiClient = new GeminiClient({ apiKey: 'test-secret', model: 'gemini-test', fetchFn });

        expect(await client.chat(MESSAGES, new AbortController().signal)).toBe('tasklist');
        expect(fetchFn.mock.calls[0][0]).toBe(
            'https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent?key=test-secret'
        );
    });

    it('returns an empty reply when there are no candidates', async (): Promise<void> => {
        const client: GeminiClient = new GeminiClient({ apiKey: 'test-secret', fetchFn: fetch_stub(200, {}) });
        expect(await client.chat(MESSAGES, new AbortController().signal)).toBe('');
    });

    it('folds system context into the first user turn', (): void => {
        expect(contents_build(MESSAGES)).toEqual([
            { role: 'user', parts: [{ text: 'SYSTEM CONTEXT:\nReply with one command.\n\nUSER REQUEST:\nshow files' }] }
        ]);
    });
});
