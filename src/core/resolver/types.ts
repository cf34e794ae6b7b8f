/**
 * @file Resolver Types
 *
 * Contracts between the resolver and the translation boundary that turns
 * free text into one literal command line.
 *
 * @module core/resolver
 */

export interface TranslationRequest {
    text: string;
    /** Canonical command names the reply may start with. */
    commands: readonly string[];
}

export interface TranslationReply {
    /** Literal command text, not yet normalized. */
    command: string;
}

/**
 * Natural-language boundary. Implementations must honor the signal.
 */
export interface TranslationBoundary {
    readonly name: string;
    /**
     * @throws TransportError when the backing service fails.
     * @throws ResolutionError `Unrecognized` when the text maps to nothing.
     */
    translate(request: TranslationRequest, signal: AbortSignal): Promise<TranslationReply>;
}

/**
 * Represents a message in the chat history.
 */
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

/** Chat-completion transport used by the LLM translator. */
export interface ChatClient {
    readonly provider: string;
    chat(messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

/** Translation provider selected by configuration. */
export type ProviderName = 'openai' | 'gemini' | 'patterns' | 'none';
