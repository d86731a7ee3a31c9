import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { DATA_FILES, type DatasetKind, type MccDataSource } from '@mcc-registry/core';

/**
 * Reads mcc_codes.yml, ranges.yml and risk_categories.yml from a directory.
 * Files are read on every call; caching is the collection's concern.
 */
export class YamlDataSource implements MccDataSource {
    constructor(readonly dataPath: string) {}

    locate(kind: DatasetKind): string {
        return join(this.dataPath, DATA_FILES[kind]);
    }

    read(kind: DatasetKind): unknown {
        return parse(readFileSync(this.locate(kind), 'utf-8'));
    }
}
