/**
 * @file Command-Line Arguments
 *
 * Flag parsing and settings resolution shared by the console and server
 * entry points.
 *
 * @module
 */

import { engineConfig_resolve, env_load, type EnvSource, type ResolvedSettings } from '../../config/settings.js';

export interface CliOptions {
    host?: string;
    port?: number;
    /** Remote server WebSocket URL; selects remote mode in the console. */
    url?: string;
    provider?: string;
    cwd?: string;
    /** Path of the `.env` file to load. */
    envFile?: string;
    help: boolean;
}

export const CLI_USAGE: string = `Usage: nlterm [options]

  --url <ws-url>        Attach to a running server instead of a local engine
  --host <host>         Server host (default NLTERM_HOST or localhost)
  --port <port>         Server port (default NLTERM_PORT or 8081)
  --provider <name>     Translator: openai, gemini, patterns or none
  --cwd <dir>           Starting directory of new sessions
  --env <file>          Environment file to load (default ./.env)
  -h, --help            Show this help`;

/**
 * Parse simple `--flag value` arguments. Unknown flags are reported in
 * `unknown` rather than rejected.
 */
export function cliArgs_parse(args: readonly string[]): { options: CliOptions; unknown: string[] } {
    const options: CliOptions = { help: false };
    const unknown: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const flag: string = args[i];
        const value: string | undefined = args[i + 1];
        if (flag === '-h' || flag === '--help') {
            options.help = true;
            continue;
        }
        if (value === undefined || value.startsWith('-')) {
            unknown.push(flag);
            continue;
        }
        switch (flag) {
            case '--host': options.host = value; break;
            case '--port': options.port = Number.parseInt(value, 10); break;
            case '--url': options.url = value; break;
            case '--provider': options.provider = value; break;
            case '--cwd': options.cwd = value; break;
            case '--env': options.envFile = value; break;
            default:
                unknown.push(flag);
                continue;
        }
        i++;
    }
    return { options, unknown };
}

/**
 * Load the `.env` file, then resolve settings with flags taking
 * precedence over the environment.
 */
export function cliSettings_resolve(options: CliOptions, env: Record<string, string | undefined> = process.env): ResolvedSettings {
    env_load(options.envFile, env);
    const source: EnvSource = options.provider ? { ...env, NLTERM_PROVIDER: options.provider } : env;
    return engineConfig_resolve(source, { host: options.host, port: options.port, cwd: options.cwd });
}
