/**
 * @file Natural-Language Resolver
 *
 * Turns raw input into a literal command line. Input whose first word is
 * a known command or alias passes through untouched and never reaches
 * the translation boundary; anything else is translated under a timeout,
 * then normalized and validated against the registry.
 *
 * @module core/resolver
 */

import { CancelledError, ResolutionError, TransportError, errorMessage_get } from '../errors.js';
import type { CommandRegistry } from '../registry/CommandRegistry.js';
import { leadingToken_get } from '../registry/tokenizer.js';
import { reply_normalize, reply_validate } from './normalize.js';
import type { TranslationBoundary, TranslationReply } from './types.js';

export const DEFAULT_RESOLVER_TIMEOUT_MS: number = 15000;

export interface ResolverOptions {
    registry: CommandRegistry;
    /** Null disables translation; every free-text request is then Unavailable. */
    boundary: TranslationBoundary | null;
    timeoutMs?: number;
}

/** How a line was resolved. */
export interface Resolution {
    command: string;
    translated: boolean;
}

export class NaturalLanguageResolver {
    private readonly registry: CommandRegistry;
    private readonly boundary: TranslationBoundary | null;
    private readonly timeoutMs: number;

    constructor(options: ResolverOptions) {
        this.registry = options.registry;
        this.boundary = options.boundary;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_RESOLVER_TIMEOUT_MS;
    }

    /** Name of the active translator, or 'none'. */
    public get provider(): string {
        return this.boundary?.name ?? 'none';
    }

    /**
     * True when the first word is a command name or alias.
     */
    public fastPath_matches(raw: string): boolean {
        return this.registry.lookup(leadingToken_get(raw)) !== null;
    }

    /**
     * Resolve raw input into a literal command line.
     *
     * @throws ResolutionError `Unrecognized` for replies that are not one known command.
     * @throws ResolutionError `Unavailable` on timeout or boundary failure.
     * @throws CancelledError when the caller aborts.
     */
    public async resolve(raw: string, signal?: AbortSignal): Promise<Resolution> {
        if (this.fastPath_matches(raw)) {
            return { command: raw, translated: false };
        }
        if (!this.boundary) {
            throw new ResolutionError('Unavailable', 'natural-language translation is disabled');
        }

        const reply: TranslationReply = await this.boundary_call(this.boundary, raw.trim(), signal);
        const command: string = reply_validate(reply_normalize(reply.command), raw.trim(), this.registry);
        return { command, translated: true };
    }

    private async boundary_call(
        boundary: TranslationBoundary,
        text: string,
        signal: AbortSignal | undefined
    ): Promise<TranslationReply> {
        if (signal?.aborted) {
            throw new CancelledError('translation cancelled');
        }

        const controller: AbortController = new AbortController();
        let timedOut: boolean = false;
        const timer: NodeJS.Timeout = setTimeout((): void => {
            timedOut = true;
            controller.abort();
        }, this.timeoutMs);
        const onAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            return await Promise.race([
                boundary.translate({ text, commands: this.registry.names_list() }, controller.signal),
                abort_wait(controller.signal)
            ]);
        } catch (error: unknown) {
            if (signal?.aborted) {
                throw new CancelledError('translation cancelled', { cause: error });
            }
            if (timedOut) {
                throw new ResolutionError('Unavailable', `translation timed out after ${this.timeoutMs} ms`, { cause: error });
            }
            if (error instanceof ResolutionError) {
                throw error;
            }
            if (error instanceof TransportError) {
                throw new ResolutionError('Unavailable', `translation service unavailable: ${error.message}`, { cause: error });
            }
            throw new ResolutionError('Unavailable', `translation failed: ${errorMessage_get(error)}`, { cause: error });
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }
}

/** Rejects once the signal aborts, for boundaries that ignore their signal. */
function abort_wait(signal: AbortSignal): Promise<never> {
    return new Promise((_resolve: (value: never) => void, reject: (reason?: unknown) => void): void => {
        if (signal.aborted) {
            reject(new Error('translation aborted'));
            return;
        }
        signal.addEventListener('abort', (): void => reject(new Error('translation aborted')), { once: true });
    });
}
