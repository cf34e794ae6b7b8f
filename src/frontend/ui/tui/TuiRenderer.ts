/**
 * @file TUI Renderer
 *
 * Terminal rendering for the console REPL: the in-flight spinner, the
 * prompt, and the text of a Result. Colors come from chalk, which drops
 * them when the output is not a color terminal.
 *
 * @module
 */

import chalk from 'chalk';
import type { Result } from '../../../core/engine/types.js';
import { VERSION } from '../../../version.js';

/** Line markers of the console dialect. */
export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>>',
    HINT: '»'
} as const;

const HIDE_CURSOR: string = '\x1b[?25l';
const SHOW_CURSOR: string = '\x1b[?25h';

/** Anything the renderer can write terminal text to. */
export interface TextSink {
    write(text: string): unknown;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Strip ANSI codes from string for length calculation. */
export function ansi_strip(str: string): string {
    return str.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');
}

// ─── Spinner ────────────────────────────────────────────────────────────────

export const SPINNER_FRAMES: readonly string[] = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
export const SPINNER_INTERVAL_MS: number = 80;

export interface SpinnerHandle {
    /** Replace the label shown beside the frame. */
    label_set: (label: string) => void;
    /** Clear the spinner line and restore the cursor. Idempotent. */
    stop: () => void;
}

/**
 * Start a spinner on the current line of `sink`.
 */
export function spinner_start(label: string = 'working', sink: TextSink = process.stdout): SpinnerHandle {
    let frameIdx: number = 0;
    let current: string = label;
    let widest: number = label.length;
    let stopped: boolean = false;
    sink.write(HIDE_CURSOR);

    const timer: NodeJS.Timeout = setInterval((): void => {
        const frame: string = SPINNER_FRAMES[frameIdx % SPINNER_FRAMES.length];
        sink.write(`\r${chalk.cyan(frame)} ${chalk.dim(`${current}...`)}  `);
        frameIdx++;
    }, SPINNER_INTERVAL_MS);

    return {
        label_set: (next: string): void => {
            current = next;
            widest = Math.max(widest, next.length);
        },
        stop: (): void => {
            if (stopped) return;
            stopped = true;
            clearInterval(timer);
            sink.write(`\r${' '.repeat(widest + 10)}\r`);
            sink.write(SHOW_CURSOR);
        }
    };
}

// ─── Output ─────────────────────────────────────────────────────────────────

/**
 * Render a Result as terminal text. Empty when there is nothing to show.
 *
 * @param input - What the user typed; the resolved command is echoed only
 *   when it differs.
 */
export function result_render(result: Result, input: string = ''): string {
    const lines: string[] = [];
    if (result.command && result.command !== input.trim()) {
        lines.push(chalk.dim(`${MARKERS.HINT} ${result.command}`));
    }
    if (result.stdout) {
        lines.push(result.stdout);
    }
    if (result.stderr) {
        lines.push(chalk.red(`${MARKERS.ERROR} ${result.stderr}`));
    }
    if (result.exitCode !== 0) {
        const kind: string = result.errorKind ? ` ${result.errorKind}` : '';
        lines.push(chalk.dim(`[exit ${result.exitCode}${kind}]`));
    }
    return lines.join('\n');
}

/**
 * Prompt showing the session's working directory.
 */
export function prompt_render(cwd: string): string {
    return `${chalk.green('nlterm')}:[${chalk.magenta(cwd)}]> `;
}

export function banner_render(target: string, provider: string): string {
    const innerWidth: number = 64;
    const title: string = `  NLTERM CONSOLE V${VERSION}`;
    const rule: string = '═'.repeat(innerWidth);
    return [
        chalk.cyan(`╔${rule}╗`),
        `${chalk.cyan('║')}${chalk.bold(title)}${' '.repeat(Math.max(0, innerWidth - title.length))}${chalk.cyan('║')}`,
        chalk.cyan(`╚${rule}╝`),
        chalk.dim(`${MARKERS.INFO} Connected to ${target}`),
        chalk.dim(`${MARKERS.INFO} Translator: ${provider}`),
        chalk.dim(`${MARKERS.HINT} Type a command or describe what you want. Ctrl+C cancels, 'exit' quits.`)
    ].join('\n');
}

export function error_render(message: string): string {
    return chalk.red(`${MARKERS.ERROR} ERROR: ${message}`);
}

export function notice_render(message: string): string {
    return chalk.yellow(`${MARKERS.INFO} ${message}`);
}
