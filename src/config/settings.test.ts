import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
    DEFAULT_PORT,
    engineConfig_resolve,
    env_load,
    envFile_parse,
    port_isValid,
    port_resolve
} from './settings.js';

describe('engineConfig_resolve', (): void => {
    it('resolves defaults when the environment is empty', (): void => {
        const { config, warnings } = engineConfig_resolve({}, { cwd: '/srv/work' });

        expect(config).toEqual({
            provider: 'patterns',
            apiKey: null,
            model: null,
            resolverTimeoutMs: 15000,
            handlerTimeoutMs: 10000,
            idleTimeoutMs: 1800000,
            completionLimit: 20,
            host: 'localhost',
            port: 8081,
            cwd: '/srv/work'
        });
        expect(warnings).toEqual([]);
    });

    it('infers the provider from the key that is present', (): void => {
        const openai = engineConfig_resolve({ OPENAI_API_KEY: 'test-secret' }).config;
        expect(openai.provider).toBe('openai');
        expect(openai.apiKey).toBe('test-secret');
        expect(openai.model).toBe('gpt-4o-mini');

        const gemini = engineConfig_resolve({ GEMINI_API_KEY: 'test-secret' }).config;
        expect(gemini.provider).toBe('gemini');
        expect(gemini.model).toBe('gemini-flash-latest');
    });

    it('uses the key prefix when one key is set in both variables', (): void => {
        const sk = engineConfig_resolve({ OPENAI_API_KEY: 'sk-test', GEMINI_API_KEY: 'sk-test' }).config;
        expect(sk.provider).toBe('openai');

        const aiza = engineConfig_resolve({ OPENAI_API_KEY: 'AIza-test', GEMINI_API_KEY: 'AIza-test' }).config;
        expect(aiza.provider).toBe('gemini');
        expect(aiza.apiKey).toBe('AIza-test');
    });

    it('honours an explicit provider and model', (): void => {
        const { config } = engineConfig_resolve({
            NLTERM_PROVIDER: 'Gemini',
            NLTERM_MODEL: 'gemini-test',
            OPENAI_API_KEY: 'test-secret',
            GEMINI_API_KEY: 'test-secret-2'
        });
        expect(config.provider).toBe('gemini');
        expect(config.apiKey).toBe('test-secret-2');
        expect(config.model).toBe('gemini-test');
    });

    it('falls back to patterns when the chosen provider has no key', (): void => {
        const { config, warnings } = engineConfig_resolve({ NLTERM_PROVIDER: 'openai' });
        expect(config.provider).toBe('patterns');
        expect(warnings).toEqual(["Provider 'openai' selected but no API key is set. Falling back to patterns."]);
    });

    it('warns on an unknown provider and infers instead', (): void => {
        const { config, warnings } = engineConfig_resolve({ NLTERM_PROVIDER: 'claude' });
        expect(config.provider).toBe('patterns');
        expect(warnings).toEqual(['Unknown NLTERM_PROVIDER "claude". Inferring from API keys.']);
    });

    it('clamps out-of-range numbers with a warning', (): void => {
        const { config, warnings } = engineConfig_resolve({
            NLTERM_RESOLVER_TIMEOUT_MS: '500',
            NLTERM_COMPLETION_LIMIT: '900'
        });
        expect(config.resolverTimeoutMs).toBe(1000);
        expect(config.completionLimit).toBe(200);
        expect(warnings).toEqual([
            'NLTERM_RESOLVER_TIMEOUT_MS=500 is out of range; using 1000.',
            'NLTERM_COMPLETION_LIMIT=900 is out of range; using 200.'
        ]);
    });

    it('falls back on non-numeric values', (): void => {
        const { config, warnings } = engineConfig_resolve({ NLTERM_HANDLER_TIMEOUT_MS: 'soon' });
        expect(config.handlerTimeoutMs).toBe(10000);
        expect(warnings).toEqual(['Invalid NLTERM_HANDLER_TIMEOUT_MS value "soon". Falling back to 10000.']);
    });

    it('prefers overrides over the environment', (): void => {
        const { config } = engineConfig_resolve(
            { NLTERM_HOST: 'example.test', NLTERM_PORT: '9000', NLTERM_PROVIDER: 'patterns' },
            { host: '0.0.0.0', port: 9100, provider: 'none' }
        );
        expect(config.host).toBe('0.0.0.0');
        expect(config.port).toBe(9100);
        expect(config.provider).toBe('none');
    });
});

describe('port_resolve', (): void => {
    it('validates ports', (): void => {
        expect(port_isValid(8081)).toBe(true);
        expect(port_isValid(0)).toBe(false);
        expect(port_isValid(70000)).toBe(false);
        expect(port_isValid(80.5)).toBe(false);
    });

    it('falls back to the default with a warning', (): void => {
        const warnings: string[] = [];
        expect(port_resolve(undefined, 'http', warnings)).toBe(DEFAULT_PORT);
        expect(warnings).toEqual(['Invalid NLTERM_PORT value "http". Falling back to 8081.']);
        expect(port_resolve(undefined, '9001')).toBe(9001);
        expect(port_resolve(undefined, undefined)).toBe(8081);
    });
});

describe('env_load', (): void => {
    let root: string;

    beforeEach((): void => {
        root = mkdtempSync(path.join(tmpdir(), 'nlterm-env-'));
    });

    afterEach((): void => {
        rmSync(root, { recursive: true, force: true });
    });

    it('parses comments, quotes and export prefixes', (): void => {
        expect(envFile_parse('# comment\nA=1\nexport B="two words"\nC=\'x=y\'\n\nnot a pair\n')).toEqual({
            A: '1',
            B: 'two words',
            C: 'x=y'
        });
    });

    it('does not override existing values', (): void => {
        const envPath: string = path.join(root, '.env');
        writeFileSync(envPath, 'OPENAI_API_KEY=test-secret\nNLTERM_PORT=9000\n');
        const target: Record<string, string | undefined> = { NLTERM_PORT: '8082' };

        expect(env_load(envPath, target)).toBe(true);
        expect(target).toEqual({ NLTERM_PORT: '8082', OPENAI_API_KEY: 'test-secret' });
    });

    it('reports a missing file', (): void => {
        expect(env_load(path.join(root, 'absent.env'), {})).toBe(false);
    });
});
