import { Collection } from '@mcc-registry/core';
import { YamlDataSource } from '../data/yaml-source.js';
import { loadConfiguration } from './config.js';
import type { LoadConfigurationOptions } from '../types.js';

/**
 * Collection over the configured YAML dataset. Nothing is read until the
 * first query.
 */
export function openCollection(options: LoadConfigurationOptions = {}): Collection {
    const configuration = loadConfiguration(options);
    return new Collection(new YamlDataSource(configuration.dataPath), configuration);
}
