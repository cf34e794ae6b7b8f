/**
 * `dir` operation: list a directory (or describe a single file).
 *
 * Entries are sorted by name. Directories carry a trailing `/` and
 * `<DIR>` in the size column; files show their size in bytes.
 */

import { lstat, readdir } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { basename, dirname, join } from 'path';
import { handlerError_fromErrno } from '../errors.js';
import type { HandlerOutput, OperationDescriptor, SeenEntry } from './types.js';
import { path_resolve, stat_maybe, stat_require } from './_shared.js';

interface ListedEntry {
    name: string;
    directory: boolean;
    size: number;
}

export const operation: OperationDescriptor = {
    name: 'dir',
    create: ({ system }) => ({
        async execute(args, ctx): Promise<HandlerOutput> {
            const operand: string = args[0] ?? '.';
            const target: string = path_resolve(ctx.cwd, operand, system.homedir());
            const info: Stats = await stat_require(target, operand);

            if (!info.isDirectory()) {
                const entry: ListedEntry = { name: basename(target), directory: false, size: info.size };
                return {
                    stdout: listing_render(dirname(target), [entry]),
                    seen: [{ path: target, directory: false }]
                };
            }

            let dirents: Dirent[];
            try {
                dirents = await readdir(target, { withFileTypes: true });
            } catch (error: unknown) {
                throw handlerError_fromErrno(error, operand);
            }
            dirents.sort((a: Dirent, b: Dirent): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

            const entries: ListedEntry[] = await Promise.all(
                dirents.map((dirent: Dirent): Promise<ListedEntry> => entry_describe(target, dirent))
            );

            return {
                stdout: listing_render(target, entries),
                seen: entries.map((entry: ListedEntry): SeenEntry => ({
                    path: join(target, entry.name),
                    directory: entry.directory
                }))
            };
        }
    })
};

async function entry_describe(directory: string, dirent: Dirent): Promise<ListedEntry> {
    const path: string = join(directory, dirent.name);
    let isDirectory: boolean = dirent.isDirectory();
    if (dirent.isSymbolicLink()) {
        const targetStat: Stats | null = await stat_maybe(path, dirent.name);
        isDirectory = targetStat?.isDirectory() ?? false;
    }
    try {
        const own: Stats = await lstat(path);
        return { name: dirent.name, directory: isDirectory, size: isDirectory ? 0 : own.size };
    } catch (error: unknown) {
        throw handlerError_fromErrno(error, dirent.name);
    }
}

function listing_render(directory: string, entries: readonly ListedEntry[]): string {
    const lines: string[] = [`Directory of ${directory}`, ''];
    let files: number = 0;
    let dirs: number = 0;

    for (const entry of entries) {
        if (entry.directory) {
            dirs++;
            lines.push(`${'<DIR>'.padStart(12)}  ${entry.name}/`);
        } else {
            files++;
            lines.push(`${String(entry.size).padStart(12)}  ${entry.name}`);
        }
    }
    if (entries.length === 0) {
        lines.push('  (empty)');
    }

    lines.push('', `${files} file(s), ${dirs} dir(s)`);
    return lines.join('\n');
}
