/**
 * Configuration resolution and validation.
 *
 * The core only consumes a resolved value; reading files or environment
 * variables is the caller's job.
 */

import { ConfigurationSchema, DESCRIPTION_SOURCES } from '../types/index.js';
import type { Configuration, ConfigurationInput } from '../types/index.js';
import { ConfigurationError } from './errors.js';

/**
 * Apply defaults and check types.
 *
 * @throws ConfigurationError listing every schema issue
 */
export function resolveConfiguration(input: ConfigurationInput | Record<string, unknown> = {}): Configuration {
    const result = ConfigurationSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        throw new ConfigurationError(`Invalid configuration:\n${details}`, result.error.issues);
    }
    return Object.freeze(result.data);
}

/**
 * Semantic checks on a resolved configuration.
 *
 * @throws ConfigurationError if dataPath is blank or the description source is unknown
 */
export function validateConfiguration(config: Configuration): true {
    if (config.dataPath.trim() === '') {
        throw new ConfigurationError('dataPath cannot be blank');
    }

    const sources: readonly string[] = DESCRIPTION_SOURCES;
    if (!sources.includes(config.defaultDescriptionSource)) {
        throw new ConfigurationError(
            `defaultDescriptionSource must be one of: ${DESCRIPTION_SOURCES.join(', ')}`
        );
    }

    return true;
}

export const DEFAULT_CONFIGURATION: Configuration = resolveConfiguration();
