/**
 * @file Command Registry
 *
 * Process-wide, read-only map from command tokens (canonical names and
 * aliases) to their CommandSpec. Built once from `commands.yaml`; every
 * catalog invariant is checked at construction and a violation aborts
 * startup with a RegistryError.
 *
 * @module core/registry
 */

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { RegistryError } from '../errors.js';
import { ARG_KIND_SCHEMAS, CatalogSchema, type RawCatalog, type RawCommandEntry } from './schemas.js';
import type { ArgKind, ArgumentCheck, CommandSpec } from './types.js';

/** Resolve path relative to this module's directory. */
function modulePath_resolve(relativePath: string): string {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    return resolve(__dirname, relativePath);
}

export const DEFAULT_CATALOG_PATH: string = modulePath_resolve('commands.yaml');

/**
 * Immutable command lookup table.
 */
export class CommandRegistry {
    private constructor(
        private readonly specs: readonly CommandSpec[],
        private readonly tokens: ReadonlyMap<string, CommandSpec>
    ) {}

    /**
     * Build a registry from a validated catalog.
     *
     * @param catalog - Parsed catalog document.
     * @param handlerNames - Names of the operation handlers available for binding.
     * @throws RegistryError on duplicate names, alias collisions, bad arity or unbound handlers.
     */
    public static catalog_build(catalog: RawCatalog, handlerNames: ReadonlySet<string>): CommandRegistry {
        const specs: CommandSpec[] = [];
        const tokens: Map<string, CommandSpec> = new Map();

        for (const entry of catalog.commands) {
            if (tokens.has(entry.name)) {
                throw new RegistryError(`Duplicate command name: '${entry.name}'`);
            }
            const spec: CommandSpec = spec_build(entry, handlerNames);
            tokens.set(spec.name, spec);
            specs.push(spec);
        }

        for (const spec of specs) {
            for (const alias of spec.aliases) {
                const owner: CommandSpec | undefined = tokens.get(alias);
                if (owner) {
                    throw new RegistryError(`Alias '${alias}' of '${spec.name}' already maps to '${owner.name}'`);
                }
                tokens.set(alias, spec);
            }
        }

        return new CommandRegistry(Object.freeze(specs), tokens);
    }

    /**
     * Parse and validate catalog YAML text.
     *
     * @throws RegistryError when the document does not match the catalog schema.
     */
    public static catalog_parse(yamlStr: string): RawCatalog {
        let raw: unknown;
        try {
            raw = yaml.load(yamlStr);
        } catch (error: unknown) {
            throw new RegistryError(`Command catalog is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
        }

        const result = CatalogSchema.safeParse(raw);
        if (!result.success) {
            const issues: string = result.error.issues
                .map(i => `[${i.path.join('.')}] ${i.message}`)
                .join('; ');
            throw new RegistryError(`Invalid command catalog: ${issues}`);
        }
        return result.data;
    }

    /**
     * Case-insensitive lookup of a command name or alias.
     */
    public lookup(token: string): CommandSpec | null {
        return this.tokens.get(token.toLowerCase()) ?? null;
    }

    /** All specs in catalog order. */
    public specs_list(): readonly CommandSpec[] {
        return this.specs;
    }

    /** Canonical names in catalog order. */
    public names_list(): string[] {
        return this.specs.map((spec: CommandSpec): string => spec.name);
    }

    /** Every accepted token (names and aliases), sorted. */
    public tokens_list(): string[] {
        return [...this.tokens.keys()].sort();
    }

    /**
     * Check argument count and per-position shape against a spec.
     */
    public arguments_validate(spec: CommandSpec, args: readonly string[]): ArgumentCheck {
        if (args.length < spec.minArgs) {
            return { ok: false, message: `${spec.name}: missing operand (usage: ${spec.usage})` };
        }
        if (spec.maxArgs !== null && args.length > spec.maxArgs) {
            return { ok: false, message: `${spec.name}: too many arguments (usage: ${spec.usage})` };
        }

        for (let i = 0; i < args.length; i++) {
            const kind: ArgKind = spec.shape[Math.min(i, spec.shape.length - 1)];
            const result = ARG_KIND_SCHEMAS[kind].safeParse(args[i]);
            if (!result.success) {
                const reason: string = result.error.issues[0]?.message ?? `expected ${kind}`;
                return { ok: false, message: `${spec.name}: invalid argument '${args[i]}': ${reason}` };
            }
        }
        return { ok: true };
    }
}

/**
 * Load the registry from a catalog file.
 *
 * @param handlerNames - Names of the operation handlers available for binding.
 * @param catalogPath - YAML catalog location; defaults to the bundled `commands.yaml`.
 */
export function registry_load(handlerNames: ReadonlySet<string>, catalogPath: string = DEFAULT_CATALOG_PATH): CommandRegistry {
    let yamlStr: string;
    try {
        yamlStr = readFileSync(catalogPath, 'utf-8');
    } catch (error: unknown) {
        throw new RegistryError(`Cannot read command catalog ${catalogPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return CommandRegistry.catalog_build(CommandRegistry.catalog_parse(yamlStr), handlerNames);
}

function spec_build(entry: RawCommandEntry, handlerNames: ReadonlySet<string>): CommandSpec {
    if (!handlerNames.has(entry.handler)) {
        throw new RegistryError(`Command '${entry.name}' binds to unknown handler '${entry.handler}'`);
    }
    if (entry.max !== null && entry.max < entry.min) {
        throw new RegistryError(`Command '${entry.name}' declares max ${entry.max} below min ${entry.min}`);
    }
    const acceptsArgs: boolean = entry.max === null || entry.max > 0;
    if (acceptsArgs && entry.shape.length === 0) {
        throw new RegistryError(`Command '${entry.name}' accepts arguments but declares no shape`);
    }
    if (new Set(entry.aliases).size !== entry.aliases.length || entry.aliases.includes(entry.name)) {
        throw new RegistryError(`Command '${entry.name}' repeats an alias`);
    }

    return Object.freeze({
        name: entry.name,
        aliases: Object.freeze([...entry.aliases]),
        category: entry.category,
        summary: entry.summary,
        usage: entry.usage,
        minArgs: entry.min,
        maxArgs: entry.max,
        shape: Object.freeze([...entry.shape]),
        handler: entry.handler
    });
}
