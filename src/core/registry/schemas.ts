/**
 * @file Command Catalog Schemas
 *
 * Zod schemas for `commands.yaml`. The raw document is validated here
 * before the registry reads any field.
 *
 * @module core/registry/schemas
 */

import { z } from 'zod';

// ─── Catalog entry ───────────────────────────────────────────────────────────

/** Command tokens are lowercase identifiers. */
const TokenSchema = z
    .string()
    .regex(/^[a-z][a-z0-9_-]*$/, 'must be a lowercase identifier');

export const ArgKindSchema = z.enum(['path', 'pid_or_name', 'host', 'count', 'text']);

export const CommandEntrySchema = z.object({
    name:     TokenSchema,
    aliases:  z.array(TokenSchema).default([]),
    category: z.enum(['filesystem', 'process', 'system', 'network', 'session']),
    summary:  z.string().min(1),
    usage:    z.string().min(1),
    min:      z.number().int().nonnegative().default(0),
    max:      z.number().int().nonnegative().nullable().default(0),
    shape:    z.array(ArgKindSchema).default([]),
    handler:  TokenSchema
});

export type RawCommandEntry = z.infer<typeof CommandEntrySchema>;

// ─── Document ────────────────────────────────────────────────────────────────

export const CatalogSchema = z.object({
    commands: z.array(CommandEntrySchema).min(1)
});

export type RawCatalog = z.infer<typeof CatalogSchema>;

// ─── Argument kinds ──────────────────────────────────────────────────────────

/**
 * Per-kind argument validators. Each returns a failure message naming
 * what the argument should have been.
 */
export const ARG_KIND_SCHEMAS: Readonly<Record<z.infer<typeof ArgKindSchema>, z.ZodType<string>>> = {
    path: z
        .string()
        .min(1, 'expected a path')
        .refine((value: string): boolean => !value.includes('\0'), 'path contains a NUL byte'),
    pid_or_name: z
        .string()
        .regex(/^(\d+|[A-Za-z0-9._][A-Za-z0-9._-]*)$/, 'expected a process id or name'),
    host: z
        .string()
        .max(253, 'host name too long')
        .regex(/^[A-Za-z0-9:][A-Za-z0-9.:-]*$/, 'expected a host name or IP address'),
    count: z
        .string()
        .regex(/^[1-9]\d*$/, 'expected a positive integer'),
    text: z.string()
};
