/**
 * `copy` operation.
 *
 * Directories are copied recursively and merged into an existing
 * destination. A file copied onto an existing directory lands inside it;
 * otherwise the destination's parent is created first.
 */

import { copyFile, cp, mkdir } from 'fs/promises';
import type { Stats } from 'fs';
import { basename, dirname, join, relative, isAbsolute } from 'path';
import { HandlerError, ValidationError, handlerError_fromErrno } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { path_resolve, stat_maybe, stat_require } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'copy',
    create: ({ system }) => ({
        validate(args): void {
            if (args[0] === args[1]) {
                throw new ValidationError(`'${args[0]}' and '${args[1]}' are the same path`);
            }
        },

        async execute(args, ctx): Promise<HandlerOutput> {
            const [sourceArg, destArg] = args;
            const home: string = system.homedir();
            const source: string = path_resolve(ctx.cwd, sourceArg, home);
            let dest: string = path_resolve(ctx.cwd, destArg, home);

            const sourceInfo: Stats = await stat_require(source, sourceArg);
            const destInfo: Stats | null = await stat_maybe(dest, destArg);

            if (sourceInfo.isDirectory()) {
                if (path_isInside(dest, source)) {
                    throw new HandlerError('InvalidArgument', `${sourceArg}: cannot copy a directory into itself`);
                }
                if (destInfo && !destInfo.isDirectory()) {
                    throw new HandlerError('InvalidArgument', `${destArg}: Not a directory`);
                }
                try {
                    await cp(source, dest, { recursive: true, force: true });
                } catch (error: unknown) {
                    throw handlerError_fromErrno(error, sourceArg);
                }
                return {
                    stdout: `Copied ${sourceArg} to ${destArg}`,
                    seen: [{ path: dest, directory: true }]
                };
            }

            if (destInfo?.isDirectory()) {
                dest = join(dest, basename(source));
            }
            if (dest === source) {
                throw new HandlerError('InvalidArgument', `${sourceArg}: source and destination are the same file`);
            }
            try {
                await mkdir(dirname(dest), { recursive: true });
                await copyFile(source, dest);
            } catch (error: unknown) {
                throw handlerError_fromErrno(error, destArg);
            }
            return {
                stdout: `Copied ${sourceArg} to ${destArg}`,
                seen: [{ path: dest, directory: false }]
            };
        }
    })
};

/**
 * True when `candidate` equals `parent` or lies beneath it.
 */
export function path_isInside(candidate: string, parent: string): boolean {
    const rel: string = relative(parent, candidate);
    return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}
