/**
 * @file Engine Factory
 *
 * Wires registry, handler table, translator and resolver from an
 * `EngineConfig`. The only place the core's parts meet.
 *
 * @module core/engine
 */

import type { EngineConfig } from '../../config/settings.js';
import { handlers_create, HANDLER_NAMES } from '../handlers/index.js';
import type { HandlerDeps, OperationHandler } from '../handlers/types.js';
import { registry_load, type CommandRegistry } from '../registry/CommandRegistry.js';
import { NaturalLanguageResolver } from '../resolver/NaturalLanguageResolver.js';
import { translator_create } from '../resolver/TranslatorFactory.js';
import type { TranslationBoundary } from '../resolver/types.js';
import { SessionExecutionEngine } from './SessionExecutionEngine.js';
import type { TelemetryBus } from './TelemetryBus.js';

export interface EngineOverrides {
    /** Alternate command catalog file. */
    catalogPath?: string;
    handlerDeps?: Partial<HandlerDeps>;
    /** Replaces the translator the config would build; null disables translation. */
    boundary?: TranslationBoundary | null;
    fetchFn?: typeof fetch;
    bus?: TelemetryBus;
    clock?: () => number;
}

/**
 * Build a ready engine.
 *
 * @throws RegistryError when the command catalog is invalid.
 */
export function engine_create(config: EngineConfig, overrides: EngineOverrides = {}): SessionExecutionEngine {
    const registry: CommandRegistry = registry_load(HANDLER_NAMES, overrides.catalogPath);
    const handlers: ReadonlyMap<string, OperationHandler> = handlers_create(overrides.handlerDeps);
    const boundary: TranslationBoundary | null = overrides.boundary !== undefined
        ? overrides.boundary
        : translator_create({
            provider: config.provider,
            apiKey: config.apiKey,
            model: config.model,
            catalog: registry.specs_list(),
            fetchFn: overrides.fetchFn
        });

    return new SessionExecutionEngine({
        registry,
        handlers,
        resolver: new NaturalLanguageResolver({ registry, boundary, timeoutMs: config.resolverTimeoutMs }),
        cwd: config.cwd,
        handlerTimeoutMs: config.handlerTimeoutMs,
        idleTimeoutMs: config.idleTimeoutMs,
        completionLimit: config.completionLimit,
        bus: overrides.bus,
        clock: overrides.clock
    });
}
