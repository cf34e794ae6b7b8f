/**
 * @file Runtime Settings
 *
 * Builds the engine configuration struct with central validation and
 * deterministic precedence (explicit override > env > defaults).
 * Out-of-range numbers are clamped; unparseable values fall back to
 * their defaults. Both cases are reported as warnings rather than
 * printed, so callers decide where they go.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { GEMINI_DEFAULT_MODEL } from '../core/resolver/providers/gemini.js';
import { OPENAI_DEFAULT_MODEL } from '../core/resolver/providers/openai.js';
import type { ProviderName } from '../core/resolver/types.js';

export const DEFAULT_PORT: number = 8081;
export const DEFAULT_HOST: string = 'localhost';

export interface EngineConfig {
    provider: ProviderName;
    apiKey: string | null;
    model: string | null;
    resolverTimeoutMs: number;
    handlerTimeoutMs: number;
    idleTimeoutMs: number;
    completionLimit: number;
    host: string;
    port: number;
    /** Working directory of new sessions. */
    cwd: string;
}

export interface ResolvedSettings {
    config: EngineConfig;
    warnings: string[];
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumericSetting {
    env: string;
    fallback: number;
    min: number;
    max: number;
}

const NUMERIC_SETTINGS = {
    resolverTimeoutMs: { env: 'NLTERM_RESOLVER_TIMEOUT_MS', fallback: 15000, min: 1000, max: 60000 },
    handlerTimeoutMs: { env: 'NLTERM_HANDLER_TIMEOUT_MS', fallback: 10000, min: 1000, max: 120000 },
    idleTimeoutMs: { env: 'NLTERM_IDLE_TIMEOUT_MS', fallback: 30 * 60 * 1000, min: 1000, max: Number.MAX_SAFE_INTEGER },
    completionLimit: { env: 'NLTERM_COMPLETION_LIMIT', fallback: 20, min: 1, max: 200 }
} satisfies Record<string, NumericSetting>;

const ProviderSchema = z.enum(['openai', 'gemini', 'patterns', 'none']);

const EngineConfigSchema = z.object({
    provider: ProviderSchema,
    apiKey: z.string().min(1).nullable(),
    model: z.string().min(1).nullable(),
    resolverTimeoutMs: z.number().int().positive(),
    handlerTimeoutMs: z.number().int().positive(),
    idleTimeoutMs: z.number().int().positive(),
    completionLimit: z.number().int().positive(),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    cwd: z.string().min(1)
});

// ─── Environment Loading ───────────────────────────────────────────────────

/**
 * Parse `.env` text into key/value pairs. Blank lines and `#` comments
 * are skipped; matching surrounding quotes are stripped from values.
 */
export function envFile_parse(content: string): Record<string, string> {
    const values: Record<string, string> = {};
    for (const line of content.split(/\r?\n/)) {
        const trimmed: string = line.trim();
        if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) {
            continue;
        }
        const eq: number = trimmed.indexOf('=');
        const key: string = trimmed.slice(0, eq).trim().replace(/^export\s+/, '');
        const value: string = trimmed.slice(eq + 1).trim().replace(/^(["'])(.*)\1$/, '$2');
        if (key) {
            values[key] = value;
        }
    }
    return values;
}

/**
 * Hydrate an environment from a `.env` file without overriding values
 * already present.
 *
 * @returns True when a file was found and applied.
 */
export function env_load(
    envPath: string = path.join(process.cwd(), '.env'),
    target: Record<string, string | undefined> = process.env
): boolean {
    if (!fs.existsSync(envPath)) {
        return false;
    }
    const values: Record<string, string> = envFile_parse(fs.readFileSync(envPath, 'utf-8'));
    for (const [key, value] of Object.entries(values)) {
        if (!target[key]) {
            target[key] = value;
        }
    }
    return true;
}

// ─── Resolution ────────────────────────────────────────────────────────────

/**
 * Resolve the engine configuration.
 *
 * @param env - Environment variables (usually `process.env` after `env_load`).
 * @param overrides - Explicit values, e.g. from command-line flags.
 * @throws Error when the merged configuration fails validation.
 */
export function engineConfig_resolve(env: EnvSource, overrides: Partial<EngineConfig> = {}): ResolvedSettings {
    const warnings: string[] = [];
    const keys: ApiKeys = apiKeys_resolve(env);

    let provider: ProviderName = overrides.provider ?? provider_resolve(env, keys, warnings);
    let apiKey: string | null = overrides.apiKey !== undefined ? overrides.apiKey : providerKey_get(provider, keys);
    if ((provider === 'openai' || provider === 'gemini') && !apiKey) {
        warnings.push(`Provider '${provider}' selected but no API key is set. Falling back to patterns.`);
        provider = 'patterns';
        apiKey = null;
    }

    const candidate: EngineConfig = {
        provider,
        apiKey,
        model: overrides.model !== undefined ? overrides.model : model_resolve(provider, env.NLTERM_MODEL),
        resolverTimeoutMs: overrides.resolverTimeoutMs ?? numeric_resolve(NUMERIC_SETTINGS.resolverTimeoutMs, env, warnings),
        handlerTimeoutMs: overrides.handlerTimeoutMs ?? numeric_resolve(NUMERIC_SETTINGS.handlerTimeoutMs, env, warnings),
        idleTimeoutMs: overrides.idleTimeoutMs ?? numeric_resolve(NUMERIC_SETTINGS.idleTimeoutMs, env, warnings),
        completionLimit: overrides.completionLimit ?? numeric_resolve(NUMERIC_SETTINGS.completionLimit, env, warnings),
        host: overrides.host || env.NLTERM_HOST || DEFAULT_HOST,
        port: port_resolve(overrides.port, env.NLTERM_PORT, warnings),
        cwd: path.resolve(overrides.cwd || env.NLTERM_CWD || process.cwd())
    };

    const result = EngineConfigSchema.safeParse(candidate);
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return { config: result.data, warnings };
}

/**
 * True when `port` is an integer TCP port.
 */
export function port_isValid(port: number): boolean {
    return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * Resolve the listening port from an explicit option or the environment.
 *
 * @param optionPort - Port passed by the caller.
 * @param envPort - Environment provided port string.
 */
export function port_resolve(optionPort: number | undefined, envPort: string | undefined, warnings: string[] = []): number {
    if (optionPort !== undefined) {
        if (port_isValid(optionPort)) {
            return optionPort;
        }
        warnings.push(`Invalid port ${optionPort}. Falling back to ${DEFAULT_PORT}.`);
        return DEFAULT_PORT;
    }

    const parsedPort: number = Number(envPort || DEFAULT_PORT);
    if (port_isValid(parsedPort)) {
        return parsedPort;
    }
    warnings.push(`Invalid NLTERM_PORT value "${envPort}". Falling back to ${DEFAULT_PORT}.`);
    return DEFAULT_PORT;
}

// ─── Helpers ───────────────────────────────────────────────────────────────

interface ApiKeys {
    openai: string | null;
    gemini: string | null;
}

/**
 * Read both provider keys. When one key was pasted into both variables,
 * its prefix decides which provider owns it.
 */
function apiKeys_resolve(env: EnvSource): ApiKeys {
    let openai: string | null = env.OPENAI_API_KEY?.trim() || null;
    let gemini: string | null = env.GEMINI_API_KEY?.trim() || null;

    if (openai && openai === gemini) {
        if (openai.startsWith('sk-')) {
            gemini = null;
        } else if (openai.startsWith('AIza')) {
            openai = null;
        }
    }
    return { openai, gemini };
}

function provider_resolve(env: EnvSource, keys: ApiKeys, warnings: string[]): ProviderName {
    const raw: string | undefined = env.NLTERM_PROVIDER?.trim().toLowerCase();
    if (raw) {
        const parsed = ProviderSchema.safeParse(raw);
        if (parsed.success) {
            return parsed.data;
        }
        warnings.push(`Unknown NLTERM_PROVIDER "${env.NLTERM_PROVIDER}". Inferring from API keys.`);
    }
    if (keys.openai) return 'openai';
    if (keys.gemini) return 'gemini';
    return 'patterns';
}

function providerKey_get(provider: ProviderName, keys: ApiKeys): string | null {
    switch (provider) {
        case 'openai':
            return keys.openai;
        case 'gemini':
            return keys.gemini;
        default:
            return null;
    }
}

function model_resolve(provider: ProviderName, envModel: string | undefined): string | null {
    if (provider === 'patterns' || provider === 'none') {
        return null;
    }
    const configured: string | undefined = envModel?.trim();
    if (configured) {
        return configured;
    }
    return provider === 'openai' ? OPENAI_DEFAULT_MODEL : GEMINI_DEFAULT_MODEL;
}

function numeric_resolve(setting: NumericSetting, env: EnvSource, warnings: string[]): number {
    const raw: string | undefined = env[setting.env];
    if (raw === undefined || raw.trim() === '') {
        return setting.fallback;
    }

    const parsed: number = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed)) {
        warnings.push(`Invalid ${setting.env} value "${raw}". Falling back to ${setting.fallback}.`);
        return setting.fallback;
    }

    const clamped: number = Math.max(setting.min, Math.min(setting.max, parsed));
    if (clamped !== parsed) {
        warnings.push(`${setting.env}=${parsed} is out of range; using ${clamped}.`);
    }
    return clamped;
}
