import os from 'os';
import type { HandlerDeps, OperationDescriptor, OperationHandler, SystemProbe } from './types.js';
import { systemRunner } from './runner.js';
import { operation as dir } from './dir.js';
import { operation as cd } from './cd.js';
import { operation as pwd } from './pwd.js';
import { operation as mkdir } from './mkdir.js';
import { operation as rmdir } from './rmdir.js';
import { operation as del } from './del.js';
import { operation as copy } from './copy.js';
import { operation as move } from './move.js';
import { operation as ren } from './ren.js';
import { operation as type } from './type.js';
import { operation as touch } from './touch.js';
import { operation as echo } from './echo.js';
import { operation as tasklist } from './tasklist.js';
import { operation as taskkill } from './taskkill.js';
import { operation as cpu } from './cpu.js';
import { operation as mem } from './mem.js';
import { operation as ipconfig } from './ipconfig.js';
import { operation as ping } from './ping.js';
import { operation as netstat } from './netstat.js';
import { operation as cls } from './cls.js';
import { operation as history } from './history.js';
import { operation as help } from './help.js';
import { operation as exit } from './exit.js';

const OPERATIONS: readonly OperationDescriptor[] = [
    dir,
    cd,
    pwd,
    mkdir,
    rmdir,
    del,
    copy,
    move,
    ren,
    type,
    touch,
    echo,
    tasklist,
    taskkill,
    cpu,
    mem,
    ipconfig,
    ping,
    netstat,
    cls,
    history,
    help,
    exit
];

/** Names every catalog entry may bind to. */
export const HANDLER_NAMES: ReadonlySet<string> = new Set(
    OPERATIONS.map((operation: OperationDescriptor): string => operation.name)
);

/** Host probe backed by the `os` module. */
export const systemProbe: SystemProbe = {
    cpus: () => os.cpus(),
    totalmem: () => os.totalmem(),
    freemem: () => os.freemem(),
    networkInterfaces: () => os.networkInterfaces(),
    homedir: () => os.homedir(),
    sampleDelayMs: 200
};

/**
 * Build the operation handler table.
 *
 * @param deps - Shared dependencies; defaults to the real host.
 * @returns Handler-name keyed table.
 */
export function handlers_create(deps: Partial<HandlerDeps> = {}): ReadonlyMap<string, OperationHandler> {
    const resolved: HandlerDeps = {
        runner: deps.runner ?? systemRunner,
        system: deps.system ?? systemProbe,
        platform: deps.platform ?? process.platform
    };
    const table: Map<string, OperationHandler> = new Map();
    for (const operation of OPERATIONS) {
        table.set(operation.name, operation.create(resolved));
    }
    return table;
}
