#!/usr/bin/env node
/**
 * @file Console Entry Point
 *
 * Starts the REPL against an in-process engine, or against a running
 * server when `--url` is given.
 *
 * Usage:
 *   nlterm
 *   nlterm --provider patterns --cwd ~/projects
 *   nlterm --url ws://remote:8081/nlterm/ws
 *
 * @module
 */

import { engine_create } from '../../core/engine/factory.js';
import type { SessionExecutionEngine } from '../../core/engine/SessionExecutionEngine.js';
import { errorMessage_get } from '../../core/errors.js';
import { HANDLER_NAMES } from '../../core/handlers/index.js';
import { registry_load } from '../../core/registry/CommandRegistry.js';
import { TerminalClient } from '../client/TerminalClient.js';
import { error_render, notice_render } from '../ui/tui/TuiRenderer.js';
import { CLI_USAGE, cliArgs_parse, cliSettings_resolve } from './args.js';
import { LocalBackend, type TerminalBackend } from './LocalBackend.js';
import { repl_start } from './Repl.js';

async function main(): Promise<void> {
    const { options, unknown } = cliArgs_parse(process.argv.slice(2));
    if (options.help) {
        console.log(CLI_USAGE);
        return;
    }
    for (const flag of unknown) {
        console.warn(notice_render(`Ignoring unknown option ${flag}`));
    }

    const { config, warnings } = cliSettings_resolve(options);
    for (const warning of warnings) {
        console.warn(notice_render(warning));
    }

    if (options.url || options.host || options.port) {
        const client: TerminalClient = new TerminalClient({ url: options.url, host: config.host, port: config.port });
        const target: string = options.url || `ws://${config.host}:${config.port}`;
        try {
            await client.connect();
        } catch (e: unknown) {
            throw new Error(`Cannot connect to nlterm server at ${target}: ${errorMessage_get(e)}`);
        }
        const backend: TerminalBackend = client;
        await repl_start(backend, { target, tokens: registry_load(HANDLER_NAMES).tokens_list() });
        return;
    }

    const engine: SessionExecutionEngine = engine_create(config);
    await repl_start(new LocalBackend(engine), {
        target: `local engine (${config.cwd})`,
        tokens: engine.commands.tokens_list()
    });
}

main().then(
    (): void => {
        process.exit(0);
    },
    (e: unknown): void => {
        console.error(error_render(errorMessage_get(e)));
        process.exit(1);
    }
);
