import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { HistoryStore, completionWord_split } from './HistoryStore.js';
import type { HistoryEntry } from '../engine/types.js';

const TOKENS: string[] = ['dir', 'ls', 'del', 'cd', 'copy', 'cpu', 'cls', 'chdir'];

function entry_make(raw: string): HistoryEntry {
    return {
        raw,
        command: raw,
        timestamp: '2026-01-01T00:00:00.000Z',
        result: { stdout: '', stderr: '', exitCode: 0 }
    };
}

describe('HistoryStore history', (): void => {
    it('appends frozen entries in order', (): void => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        store.append(entry_make('dir'));
        const second: HistoryEntry = store.append(entry_make('pwd'));

        expect(store.length).toBe(2);
        expect(Object.isFrozen(second)).toBe(true);
        expect(Object.isFrozen(second.result)).toBe(true);
        expect([...store.entries()].map((entry: HistoryEntry): string => entry.raw)).toEqual(['dir', 'pwd']);
    });

    it('iterates the snapshot taken when iteration began', (): void => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        store.append(entry_make('one'));
        const iterator: Generator<HistoryEntry, void, undefined> = store.entries();
        const first: IteratorResult<HistoryEntry, void> = iterator.next();
        store.append(entry_make('two'));

        expect(first.value).toMatchObject({ raw: 'one' });
        expect(iterator.next().done).toBe(true);
        expect(store.length).toBe(2);
    });

    it('does not let callers mutate the log through snapshots', (): void => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        store.append(entry_make('one'));
        const snapshot: readonly HistoryEntry[] = store.entries_list();
        expect(snapshot).not.toBe(store.entries_list());
        expect(snapshot).toHaveLength(1);
    });
});

describe('completionWord_split', (): void => {
    it('finds the word under the cursor', (): void => {
        expect(completionWord_split('di')).toEqual({ word: 'di', first: true });
        expect(completionWord_split('  di')).toEqual({ word: 'di', first: true });
        expect(completionWord_split('dir  su')).toEqual({ word: 'su', first: false });
        expect(completionWord_split('dir ')).toEqual({ word: '', first: false });
        expect(completionWord_split('')).toEqual({ word: '', first: true });
    });
});

describe('HistoryStore completion', (): void => {
    let root: string;

    beforeEach(async (): Promise<void> => {
        root = await mkdtemp(join(tmpdir(), 'nlterm-complete-'));
        await mkdir(join(root, 'docs'));
        await writeFile(join(root, 'data.csv'), '');
        await writeFile(join(root, 'cats.txt'), '');
        await writeFile(join(root, '.hidden'), '');
    });

    afterEach(async (): Promise<void> => {
        await rm(root, { recursive: true, force: true });
    });

    it('ranks command tokens before filesystem entries', async (): Promise<void> => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        expect(await store.complete('d', root)).toEqual(['del', 'dir', 'data.csv', 'docs/']);
        expect(await store.complete('c', root)).toEqual(['cd', 'chdir', 'cls', 'copy', 'cpu', 'cats.txt']);
    });

    it('completes only paths after the first word', async (): Promise<void> => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        expect(await store.complete('type d', root)).toEqual(['data.csv', 'docs/']);
        expect(await store.complete('type ', root)).toEqual(['cats.txt', 'data.csv', 'docs/']);
    });

    it('shows dot entries only for a dot prefix', async (): Promise<void> => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        expect(await store.complete('type .h', root)).toEqual(['.hidden']);
    });

    it('completes inside a subdirectory', async (): Promise<void> => {
        await writeFile(join(root, 'docs', 'guide.md'), '');
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        expect(await store.complete('type docs/g', root)).toEqual(['docs/guide.md']);
    });

    it('merges seen names and honours forgetting', async (): Promise<void> => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        const ghost: string = join(root, 'drafts');
        store.seen_record([{ path: ghost, directory: true }]);
        expect(await store.complete('cd dr', root)).toEqual(['drafts/']);

        store.seen_forget([ghost]);
        expect(await store.complete('cd dr', root)).toEqual([]);
    });

    it('falls back to command tokens for an unreadable cwd', async (): Promise<void> => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS });
        expect(await store.complete('c', join(root, 'missing'))).toEqual(['cd', 'chdir', 'cls', 'copy', 'cpu']);
    });

    it('applies the candidate limit', async (): Promise<void> => {
        const store: HistoryStore = new HistoryStore({ commandTokens: TOKENS, limit: 2 });
        expect(await store.complete('c', root)).toEqual(['cd', 'chdir']);
    });
});
