/**
 * @file Command Registry Types
 *
 * @module core/registry
 */

export type CommandCategory = 'filesystem' | 'process' | 'system' | 'network' | 'session';

/** Kind of a single positional argument. */
export type ArgKind = 'path' | 'pid_or_name' | 'host' | 'count' | 'text';

/**
 * Static description of one supported command.
 */
export interface CommandSpec {
    readonly name: string;
    readonly aliases: readonly string[];
    readonly category: CommandCategory;
    readonly summary: string;
    readonly usage: string;
    readonly minArgs: number;
    /** `null` means variadic: the last shape kind repeats. */
    readonly maxArgs: number | null;
    readonly shape: readonly ArgKind[];
    /** Name of the operation handler this command binds to. */
    readonly handler: string;
}

export type ArgumentCheck =
    | { ok: true }
    | { ok: false; message: string };
