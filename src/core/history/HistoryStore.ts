/**
 * @file History & Completion Store
 *
 * Per-session command history plus the tab-completion index. History is
 * append-only; readers iterate a snapshot so a concurrent append never
 * shows up mid-iteration. Completion ranks command tokens before
 * filesystem entries of the working directory, where the entries are a
 * live listing merged with names this session recently saw there.
 *
 * @module core/history
 */

import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { basename, dirname, resolve } from 'path';
import type { HistoryEntry } from '../engine/types.js';
import type { SeenEntry } from '../handlers/types.js';

export const DEFAULT_COMPLETION_LIMIT: number = 20;

export interface HistoryStoreOptions {
    /** Maximum completion candidates returned. */
    limit?: number;
    /** Every command token (names and aliases), used for first-word completion. */
    commandTokens: readonly string[];
}

/** Split of a completion line into its fixed prefix and the word under the cursor. */
export interface CompletionWord {
    word: string;
    /** True when the cursor is inside the first word. */
    first: boolean;
}

/**
 * History log and completion index of one session.
 */
export class HistoryStore {
    private readonly log: HistoryEntry[] = [];
    /** Directory (absolute) → entry name → is-directory. */
    private readonly seen: Map<string, Map<string, boolean>> = new Map();
    private readonly limit: number;
    private readonly commandTokens: readonly string[];

    constructor(options: HistoryStoreOptions) {
        this.limit = options.limit ?? DEFAULT_COMPLETION_LIMIT;
        this.commandTokens = [...options.commandTokens].sort();
    }

    // ─── History ────────────────────────────────────────────────────────────

    /**
     * Append a frozen copy of an entry.
     */
    public append(entry: HistoryEntry): HistoryEntry {
        const frozen: HistoryEntry = Object.freeze({
            ...entry,
            result: Object.freeze({ ...entry.result })
        });
        this.log.push(frozen);
        return frozen;
    }

    /**
     * Iterate the history as it stood at call time.
     */
    public *entries(): Generator<HistoryEntry, void, undefined> {
        const snapshot: readonly HistoryEntry[] = this.log.slice();
        for (const entry of snapshot) {
            yield entry;
        }
    }

    /** Snapshot array of the history. */
    public entries_list(): readonly HistoryEntry[] {
        return this.log.slice();
    }

    public get length(): number {
        return this.log.length;
    }

    // ─── Completion index ───────────────────────────────────────────────────

    /**
     * Remember filesystem entries a command created or listed.
     */
    public seen_record(entries: readonly SeenEntry[]): void {
        for (const entry of entries) {
            const directory: string = dirname(entry.path);
            let names: Map<string, boolean> | undefined = this.seen.get(directory);
            if (!names) {
                names = new Map();
                this.seen.set(directory, names);
            }
            names.set(basename(entry.path), entry.directory);
        }
    }

    /**
     * Drop entries that no longer exist, including anything recorded beneath them.
     */
    public seen_forget(paths: readonly string[]): void {
        for (const path of paths) {
            this.seen.get(dirname(path))?.delete(basename(path));
            for (const directory of [...this.seen.keys()]) {
                if (directory === path || directory.startsWith(`${path}/`)) {
                    this.seen.delete(directory);
                }
            }
        }
    }

    /**
     * Completion candidates for the word under the cursor.
     *
     * @param line - Input line up to the cursor.
     * @param cwd - Session working directory.
     * @returns Command tokens first (first word only), then filesystem
     *   entries with `/` marking directories; each group sorted.
     */
    public async complete(line: string, cwd: string): Promise<string[]> {
        const { word, first }: CompletionWord = completionWord_split(line);
        const candidates: string[] = [];

        if (first) {
            const lowered: string = word.toLowerCase();
            for (const token of this.commandTokens) {
                if (token.startsWith(lowered)) {
                    candidates.push(token);
                }
            }
        }

        const slash: number = word.lastIndexOf('/');
        const dirPart: string = slash >= 0 ? word.slice(0, slash + 1) : '';
        const namePart: string = word.slice(slash + 1);
        const directory: string = resolve(cwd, dirPart || '.');

        const entries: Map<string, boolean> = new Map(this.seen.get(directory) ?? []);
        for (const [name, isDir] of await directory_list(directory)) {
            entries.set(name, isDir);
        }

        const paths: string[] = [...entries.entries()]
            .filter(([name]: [string, boolean]): boolean => name.startsWith(namePart))
            .filter(([name]: [string, boolean]): boolean => !name.startsWith('.') || namePart.startsWith('.'))
            .map(([name, isDir]: [string, boolean]): string => `${dirPart}${name}${isDir ? '/' : ''}`)
            .sort();

        for (const path of paths) {
            if (!candidates.includes(path)) {
                candidates.push(path);
            }
        }
        return candidates.slice(0, this.limit);
    }
}

/**
 * Find the word under the cursor. A trailing space starts a new, empty word.
 */
export function completionWord_split(line: string): CompletionWord {
    const leading: string = line.replace(/^\s+/, '');
    const match: RegExpMatchArray | null = leading.match(/(\S*)$/);
    const word: string = match ? match[1] : '';
    const first: boolean = !/\s/.test(leading.slice(0, leading.length - word.length));
    return { word, first };
}

/**
 * Live listing of a directory. An unreadable directory contributes nothing.
 */
async function directory_list(directory: string): Promise<Map<string, boolean>> {
    const listing: Map<string, boolean> = new Map();
    let dirents: Dirent[];
    try {
        dirents = await readdir(directory, { withFileTypes: true });
    } catch {
        return listing;
    }
    for (const dirent of dirents) {
        listing.set(dirent.name, dirent.isDirectory());
    }
    return listing;
}
