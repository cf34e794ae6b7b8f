/**
 * @file Console REPL
 *
 * Interactive readline loop over a TerminalBackend: the in-process engine
 * or a remote server reached through TerminalClient. Renders results via
 * TuiRenderer and honors the `clear` and `exit` directives.
 *
 * Lines are handled one at a time in arrival order, so piped input runs
 * as a script. Ctrl+C cancels the request in flight, or quits when idle.
 *
 * @module
 */

import * as readline from 'readline';
import type { EngineEvent, Result } from '../../core/engine/types.js';
import { errorMessage_get } from '../../core/errors.js';
import { completionWord_split, type CompletionWord } from '../../core/history/HistoryStore.js';
import {
    banner_render,
    error_render,
    notice_render,
    prompt_render,
    result_render,
    spinner_start,
    type SpinnerHandle
} from '../ui/tui/TuiRenderer.js';
import type { TerminalBackend } from './LocalBackend.js';

// ─── Completion ─────────────────────────────────────────────────────────────

export type ReplCompletionResult = [string[], string];
export type ReplCompleter = (line: string, callback: (err: null, result: ReplCompletionResult) => void) => void;
export type ReplCompleteBackend = Pick<TerminalBackend, 'complete'>;

/**
 * Local command hints, offered only in command position.
 */
export function replCompletionFallback_resolve(line: string, tokens: readonly string[]): string[] {
    const { word, first }: CompletionWord = completionWord_split(line);
    if (!first) return [];
    const lowered: string = word.toLowerCase();
    return tokens.filter((token: string): boolean => token.startsWith(lowered));
}

/**
 * Readline completer asking the backend first. An empty or failed answer
 * falls back to the local command hints.
 */
export function replCompleter_create(backend: ReplCompleteBackend, tokens: readonly string[]): ReplCompleter {
    return (line: string, callback: (err: null, result: ReplCompletionResult) => void): void => {
        const { word }: CompletionWord = completionWord_split(line);
        void backend.complete(line).then(
            (candidates: string[]): void => {
                callback(null, [candidates.length > 0 ? candidates : replCompletionFallback_resolve(line, tokens), word]);
            },
            (): void => {
                callback(null, [replCompletionFallback_resolve(line, tokens), word]);
            }
        );
    };
}

// ─── REPL Component ─────────────────────────────────────────────────────────

export interface ReplOptions {
    /** Shown in the banner, e.g. the server URL. */
    target: string;
    /** Command tokens for offline completion hints. */
    tokens?: readonly string[];
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    /** Animate a spinner while a request is in flight. */
    spinner?: boolean;
}

/**
 * State container for the interactive REPL.
 */
export class TerminalRepl {
    private rl: readline.Interface | null = null;
    private cwd: string = '';
    private queue: Promise<void> = Promise.resolve();
    private activeSpinner: SpinnerHandle | null = null;
    private commandInFlight: boolean = false;
    private closed: boolean = false;
    /** Set by the `exit` directive; remaining input is dropped. */
    private exiting: boolean = false;
    private readonly input: NodeJS.ReadableStream;
    private readonly output: NodeJS.WritableStream;
    private readonly tokens: readonly string[];
    private readonly spinnerEnabled: boolean;

    constructor(
        private readonly backend: TerminalBackend,
        private readonly options: ReplOptions
    ) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
        this.tokens = options.tokens ?? [];
        this.spinnerEnabled = options.spinner ?? process.stdout.isTTY === true;
    }

    /**
     * Open the session and run the loop until the input closes or the
     * user exits.
     */
    public async run(): Promise<void> {
        const { session, provider } = await this.backend.session_open();
        this.cwd = session.cwd;
        this.print(banner_render(this.options.target, provider));
        this.backend.onTelemetry = (event: EngineEvent): void => this.telemetry_render(event);

        const rl: readline.Interface = readline.createInterface({
            input: this.input,
            output: this.output,
            prompt: prompt_render(this.cwd),
            completer: replCompleter_create(this.backend, this.tokens)
        });
        this.rl = rl;

        const closed: Promise<void> = new Promise((resolve: () => void): void => {
            rl.once('close', (): void => {
                this.closed = true;
                resolve();
            });
        });
        rl.on('line', (line: string): void => {
            this.queue = this.queue.then((): Promise<void> => this.line_handle(line));
        });
        rl.on('SIGINT', (): void => this.interrupt_handle());
        rl.prompt();

        await closed;
        await this.queue;
        this.shutdown();
    }

    private async line_handle(line: string): Promise<void> {
        if (this.exiting) return;
        const input: string = line.trim();
        if (input) {
            const result: Result | null = await this.command_execute(input);
            if (result?.directive === 'clear') {
                readline.cursorTo(this.output, 0, 0);
                readline.clearScreenDown(this.output);
            } else if (result?.directive === 'exit') {
                this.exiting = true;
                this.rl?.close();
                return;
            }
        }
        if (!this.closed) this.rl?.prompt();
    }

    private async command_execute(input: string): Promise<Result | null> {
        this.commandInFlight = true;
        this.activeSpinner = this.spinnerEnabled ? spinner_start('running', this.output) : null;
        try {
            const result: Result = await this.backend.command_send(input);
            this.spinner_stop();
            const text: string = result_render(result, input);
            if (text) this.print(text);
            if (result.cwd) {
                this.cwd = result.cwd;
                this.rl?.setPrompt(prompt_render(this.cwd));
            }
            return result;
        } catch (e: unknown) {
            this.spinner_stop();
            this.print(error_render(errorMessage_get(e)));
            return null;
        } finally {
            this.commandInFlight = false;
        }
    }

    private telemetry_render(event: EngineEvent): void {
        if (!this.activeSpinner || event.type !== 'state') return;
        if (event.state === 'Classified' && event.detail === 'natural-language') {
            this.activeSpinner.label_set('translating');
        } else if (event.state === 'Resolved' && event.detail) {
            this.activeSpinner.label_set(`running ${event.detail}`);
        }
    }

    private interrupt_handle(): void {
        if (!this.commandInFlight) {
            this.rl?.close();
            return;
        }
        void this.backend.cancel().then(
            (cancelled: boolean): void => {
                if (!cancelled) this.print(notice_render('Nothing to cancel.'));
            },
            (e: unknown): void => {
                this.print(error_render(errorMessage_get(e)));
            }
        );
    }

    private spinner_stop(): void {
        this.activeSpinner?.stop();
        this.activeSpinner = null;
    }

    private print(text: string): void {
        this.output.write(`${text}\n`);
    }

    private shutdown(): void {
        if (!this.exiting) this.print(notice_render('Goodbye.'));
        this.backend.onTelemetry = null;
        this.backend.disconnect();
    }
}

/**
 * Run the REPL to completion over `backend`.
 */
export async function repl_start(backend: TerminalBackend, options: ReplOptions): Promise<void> {
    const repl: TerminalRepl = new TerminalRepl(backend, options);
    await repl.run();
}
