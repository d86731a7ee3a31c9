import { readFileSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, resolveConfiguration, validateConfiguration } from '@mcc-registry/core';
import type { Configuration } from '@mcc-registry/shared';
import { bundledDataPath, resolveConfigPath } from './paths.js';
import type { LoadConfigurationOptions } from '../types.js';

/**
 * Keys accepted in mcc.config.yaml. Values are type-checked again by
 * resolveConfiguration; this only rejects unknown keys.
 */
const FileConfigSchema = z
    .object({
        dataPath: z.string().optional(),
        defaultDescriptionSource: z.string().optional(),
        cacheEnabled: z.boolean().optional(),
        includeReservedRanges: z.boolean().optional(),
    })
    .strict();

const BooleanFlag = z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
    MCC_DATA_PATH: z.string().optional(),
    MCC_DESCRIPTION_SOURCE: z.string().optional(),
    MCC_CACHE_ENABLED: BooleanFlag.optional(),
    MCC_INCLUDE_RESERVED_RANGES: BooleanFlag.optional(),
});

type ConfigLayer = z.infer<typeof FileConfigSchema>;

/**
 * Resolves the CLI configuration. Later layers win:
 * 1. Defaults (bundled dataset)
 * 2. mcc.config.yaml in cwd, or the explicit config file
 * 3. MCC_* environment variables
 *
 * Relative data paths resolve against the config file's directory (file
 * layer) or cwd (environment layer).
 *
 * @throws ConfigurationError for unreadable files, unknown keys or invalid values
 */
export function loadConfiguration(options: LoadConfigurationOptions = {}): Configuration {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    const merged: ConfigLayer = {
        dataPath: bundledDataPath(),
        ...loadFileLayer(resolveConfigPath(cwd, options.configPath)),
        ...loadEnvLayer(env, cwd),
    };

    const config = resolveConfiguration(merged);
    validateConfiguration(config);
    return config;
}

function loadFileLayer(path: string | null): ConfigLayer {
    if (path === null) return {};
    if (!existsSync(path)) {
        throw new ConfigurationError(`Config file not found: ${path}`);
    }

    let data: unknown;
    try {
        data = parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Cannot read config file ${path}: ${reason}`);
    }
    // An empty file parses to null
    if (data === null || data === undefined) return {};

    const result = FileConfigSchema.safeParse(data);
    if (!result.success) {
        throw new ConfigurationError(
            `Invalid config file ${path}:\n${formatIssues(result.error.issues)}`,
            result.error.issues
        );
    }

    const layer = result.data;
    if (layer.dataPath !== undefined && layer.dataPath.trim() !== '') {
        layer.dataPath = resolve(dirname(path), layer.dataPath);
    }
    return layer;
}

function loadEnvLayer(env: NodeJS.ProcessEnv, cwd: string): ConfigLayer {
    // Unset and empty variables both mean "not configured"
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

    const result = EnvSchema.safeParse(present);
    if (!result.success) {
        throw new ConfigurationError(
            `Invalid environment:\n${formatIssues(result.error.issues)}`,
            result.error.issues
        );
    }

    const vars = result.data;
    const layer: ConfigLayer = {};
    if (vars.MCC_DATA_PATH !== undefined) layer.dataPath = resolve(cwd, vars.MCC_DATA_PATH);
    if (vars.MCC_DESCRIPTION_SOURCE !== undefined) layer.defaultDescriptionSource = vars.MCC_DESCRIPTION_SOURCE;
    if (vars.MCC_CACHE_ENABLED !== undefined) layer.cacheEnabled = vars.MCC_CACHE_ENABLED;
    if (vars.MCC_INCLUDE_RESERVED_RANGES !== undefined) {
        layer.includeReservedRanges = vars.MCC_INCLUDE_RESERVED_RANGES;
    }
    return layer;
}

function formatIssues(issues: z.ZodIssue[]): string {
    return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}
