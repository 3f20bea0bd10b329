import { z } from 'zod';

/**
 * Configuration schema (`.clipscript/config.yaml`)
 *
 * Every field has a default, so an empty or missing file is valid.
 */

const logLevelSchema = z.enum(['error', 'warning', 'note', 'debug']);

export const configSchema = z.object({
    plugins: z.object({
        /** Directories scanned for *.js plugin scripts, relative to the project root */
        installPaths: z.array(z.string().min(1)).default(['.clipscript/scripts']),
    }).default({}),
    storage: z.object({
        /** SQLite database holding the tabs */
        path: z.string().min(1).default('.clipscript/items.db'),
    }).default({}),
    logging: z.object({
        level: logLevelSchema.default('note'),
        /** Optional log file, appended to */
        file: z.string().min(1).optional(),
        color: z.boolean().default(true),
    }).default({}),
    sandbox: z.object({
        memoryLimitBytes: z.number().int().nonnegative().default(64 * 1024 * 1024),
        maxStackSizeBytes: z.number().int().nonnegative().default(0),
    }).default({}),
});

export type ClipscriptConfig = z.infer<typeof configSchema>;
