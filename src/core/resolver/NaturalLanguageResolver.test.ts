import { describe, it, expect, vi, type Mock } from 'vitest';
import * as fc from 'fast-check';
import { NaturalLanguageResolver, type Resolution } from './NaturalLanguageResolver.js';
import { reply_normalize } from './normalize.js';
import { registry_load, type CommandRegistry } from '../registry/CommandRegistry.js';
import { HANDLER_NAMES } from '../handlers/index.js';
import { CancelledError, ResolutionError, TransportError } from '../errors.js';
import type { TranslationBoundary, TranslationReply, TranslationRequest } from './types.js';

const registry: CommandRegistry = registry_load(HANDLER_NAMES);

type TranslateFn = (request: TranslationRequest, signal: AbortSignal) => Promise<TranslationReply>;

interface StubBoundary extends TranslationBoundary {
    translate: Mock<TranslateFn>;
}

function boundary_make(reply: TranslateFn): StubBoundary {
    return { name: 'stub', translate: vi.fn(reply) };
}

function replying(command: string): StubBoundary {
    return boundary_make(async (): Promise<TranslationReply> => ({ command }));
}

async function failure_capture(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error: unknown) {
        return error;
    }
    throw new Error('expected resolution to fail');
}

describe('NaturalLanguageResolver fast path', (): void => {
    it('never calls the boundary when the first word is a known token', async (): Promise<void> => {
        const boundary = replying('dir');
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({ registry, boundary });

        await fc.assert(fc.asyncProperty(
            fc.constantFrom(...registry.tokens_list()),
            fc.boolean(),
            fc.string({ maxLength: 40 }),
            async (token: string, upper: boolean, rest: string): Promise<boolean> => {
                const raw: string = `${upper ? token.toUpperCase() : token} ${rest}`;
                const resolution: Resolution = await resolver.resolve(raw);
                return resolution.command === raw && !resolution.translated;
            }
        ));
        expect(boundary.translate).not.toHaveBeenCalled();
    });
});

describe('NaturalLanguageResolver translation', (): void => {
    it('sends the text and canonical names to the boundary', async (): Promise<void> => {
        const boundary = replying('dir');
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({ registry, boundary });

        const resolution: Resolution = await resolver.resolve('  show me the files  ');
        expect(resolution).toEqual({ command: 'dir', translated: true });
        expect(boundary.translate).toHaveBeenCalledWith(
            { text: 'show me the files', commands: registry.names_list() },
            expect.any(AbortSignal)
        );
    });

    it('accepts a fenced and quoted reply', async (): Promise<void> => {
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({
            registry,
            boundary: replying('```bash\n"mkdir test"\n```')
        });
        expect((await resolver.resolve('create a folder called test')).command).toBe('mkdir test');
    });

    it.each([
        ['', "could not understand 'do something'"],
        ['dir\ncls', "translation of 'do something' spans more than one line"],
        ['dir | more', "translation 'dir | more' contains shell operators"],
        ['dir && del x', "translation 'dir && del x' contains shell operators"],
        ['format c:', "translation 'format c:' is not a known command"]
    ])('rejects the reply %j as Unrecognized', async (reply: string, message: string): Promise<void> => {
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({ registry, boundary: replying(reply) });
        const error: unknown = await failure_capture(resolver.resolve('do something'));

        expect(error).toBeInstanceOf(ResolutionError);
        expect(error instanceof ResolutionError && error.reason).toBe('Unrecognized');
        expect(error instanceof Error && error.message).toBe(message);
    });

    it('maps a transport failure to Unavailable', async (): Promise<void> => {
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({
            registry,
            boundary: boundary_make(async (): Promise<TranslationReply> => {
                throw new TransportError('down', 503);
            })
        });
        const error: unknown = await failure_capture(resolver.resolve('show files'));

        expect(error instanceof ResolutionError && error.kind).toBe('ResolutionError.Unavailable');
        expect(error instanceof Error && error.message).toBe('translation service unavailable: down');
    });

    it('times out a boundary that never answers', async (): Promise<void> => {
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({
            registry,
            timeoutMs: 20,
            boundary: boundary_make((): Promise<TranslationReply> => new Promise(() => undefined))
        });
        const error: unknown = await failure_capture(resolver.resolve('show files'));

        expect(error instanceof ResolutionError && error.reason).toBe('Unavailable');
        expect(error instanceof Error && error.message).toBe('translation timed out after 20 ms');
    });

    it('reports cancellation by the caller', async (): Promise<void> => {
        const controller: AbortController = new AbortController();
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({
            registry,
            boundary: boundary_make((): Promise<TranslationReply> => {
                controller.abort();
                return new Promise(() => undefined);
            })
        });

        expect(await failure_capture(resolver.resolve('show files', controller.signal))).toBeInstanceOf(CancelledError);
    });

    it('is Unavailable when translation is disabled', async (): Promise<void> => {
        const resolver: NaturalLanguageResolver = new NaturalLanguageResolver({ registry, boundary: null });
        const error: unknown = await failure_capture(resolver.resolve('show files'));

        expect(error instanceof ResolutionError && error.reason).toBe('Unavailable');
        expect(resolver.provider).toBe('none');
    });
});

describe('reply_normalize', (): void => {
    it.each([
        ['  dir  ', 'dir'],
        ['`dir`', 'dir'],
        ["'mkdir test'", 'mkdir test'],
        ['$ tasklist', 'tasklist'],
        ['> cpu', 'cpu'],
        ['```\nping example.test\n```', 'ping example.test'],
        ['```sh\n$ del hello.txt\n```', 'del hello.txt']
    ])('normalizes %j', (reply: string, expected: string): void => {
        expect(reply_normalize(reply)).toBe(expected);
    });

    it('leaves inner quotes alone', (): void => {
        expect(reply_normalize('echo "hi there"')).toBe('echo "hi there"');
    });
});
