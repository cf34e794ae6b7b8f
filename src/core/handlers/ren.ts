/**
 * `ren` operation: rename in place. The new name is a bare name, never a
 * path, and must not collide with an existing entry.
 */

import { rename } from 'fs/promises';
import type { Stats } from 'fs';
import { dirname, join } from 'path';
import { HandlerError, ValidationError, handlerError_fromErrno } from '../errors.js';
import type { HandlerOutput, OperationDescriptor } from './types.js';
import { path_resolve, stat_maybe, stat_require } from './_shared.js';

export const operation: OperationDescriptor = {
    name: 'ren',
    create: ({ system }) => ({
        validate(args): void {
            const newName: string = args[1];
            if (/[\\/]/.test(newName)) {
                throw new ValidationError(`new name '${newName}' must not contain a path separator`);
            }
            if (newName === '.' || newName === '..') {
                throw new ValidationError(`new name '${newName}' is reserved`);
            }
        },

        async execute(args, ctx): Promise<HandlerOutput> {
            const [oldArg, newName] = args;
            const source: string = path_resolve(ctx.cwd, oldArg, system.homedir());
            const info: Stats = await stat_require(source, oldArg);
            const target: string = join(dirname(source), newName);

            if (await stat_maybe(target, newName)) {
                throw new HandlerError('InvalidArgument', `${newName}: File exists`);
            }
            try {
                await rename(source, target);
            } catch (error: unknown) {
                throw handlerError_fromErrno(error, oldArg);
            }
            return {
                stdout: `Renamed ${oldArg} to ${newName}`,
                seen: [{ path: target, directory: info.isDirectory() }],
                forgotten: [source]
            };
        }
    })
};
