/**
 * `move` operation. Moving onto an existing directory places the source
 * inside it. Across devices the move falls back to copy-then-remove.
 */

import { cp, rename, rm } from 'fs/promises';
import type { Stats } from 'fs';
import { basename, join } from 'path';
import { HandlerError, ValidationError, errnoCode_get, handlerError_fromErrno } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { path_resolve, stat_maybe, stat_require } from './_shared.js';
import { path_isInside } from './copy.js';

export const operation: OperationDescriptor = {
    name: 'move',
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
            if (destInfo?.isDirectory()) {
                dest = join(dest, basename(source));
            }
            if (sourceInfo.isDirectory() && path_isInside(dest, source)) {
                throw new HandlerError('InvalidArgument', `${sourceArg}: cannot move a directory into itself`);
            }

            try {
                await rename(source, dest);
            } catch (error: unknown) {
                if (errnoCode_get(error) !== 'EXDEV') {
                    throw handlerError_fromErrno(error, destArg);
                }
                try {
                    await cp(source, dest, { recursive: true, force: true });
                    await rm(source, { recursive: true });
                } catch (fallbackError: unknown) {
                    throw handlerError_fromErrno(fallbackError, destArg);
                }
            }

            return {
                stdout: `Moved ${sourceArg} to ${destArg}`,
                seen: [{ path: dest, directory: sourceInfo.isDirectory() }],
                forgotten: [source]
            };
        }
    })
};
