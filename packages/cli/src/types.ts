/**
 * MCC CLI - Command option types
 */

import type { DescriptionSource } from '@mcc-registry/shared';

// Type alias: commander's opts<T>() requires an index-signature-compatible type
export type GlobalOptions = {
    config?: string;
};

export interface FindOptions {
    source?: DescriptionSource;
    json?: boolean;
}

export interface JsonOptions {
    json?: boolean;
}

export interface RangesOptions {
    all?: boolean;
}

export interface ValidateOptions {
    lenient?: boolean;
    deny?: string[];
    allow?: string[];
}

export interface LoadConfigurationOptions {
    /** Explicit config file; must exist when given. */
    configPath?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}
