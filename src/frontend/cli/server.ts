#!/usr/bin/env node
/**
 * @file Server Entry Point
 *
 * Starts the HTTP + WebSocket terminal server.
 *
 * Usage:
 *   nlterm-server
 *   nlterm-server --host 0.0.0.0 --port 9090 --provider patterns
 *
 * @module
 */

import { engine_create } from '../../core/engine/factory.js';
import { errorMessage_get } from '../../core/errors.js';
import { terminalServer_start, type TerminalServerHandle } from '../server/TerminalServer.js';
import { CLI_USAGE, cliArgs_parse, cliSettings_resolve } from './args.js';

function server_main(): void {
    const { options, unknown } = cliArgs_parse(process.argv.slice(2));
    if (options.help) {
        console.log(CLI_USAGE.replace('nlterm [options]', 'nlterm-server [options]'));
        return;
    }
    for (const flag of unknown) {
        console.warn(`Ignoring unknown option ${flag}`);
    }

    const { config, warnings } = cliSettings_resolve(options);
    for (const warning of warnings) {
        console.warn(`[config] ${warning}`);
    }

    const handle: TerminalServerHandle = terminalServer_start(engine_create(config), config);

    handle.server.on('error', (error: Error): void => {
        console.error(`Server error: ${error.message}`);
        process.exit(1);
    });

    process.once('SIGINT', (): void => {
        console.log('\nShutting down...');
        handle.close().then(
            (): void => {
                console.log('Goodbye.');
                process.exit(0);
            },
            (error: unknown): void => {
                console.error(`Shutdown failed: ${errorMessage_get(error)}`);
                process.exit(1);
            }
        );
    });
}

try {
    server_main();
} catch (e: unknown) {
    console.error(`Fatal error: ${errorMessage_get(e)}`);
    process.exit(1);
}
