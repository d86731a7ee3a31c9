/**
 * Data source protocol consumed by Collection.
 *
 * A source hands back raw, unvalidated records for each dataset kind:
 * - codes: array of code records
 * - ranges: array of range records
 * - categories: mapping of category id to { name, description, codes }
 *
 * The core never touches storage; file or network access lives in the source.
 */

import type { DatasetKind } from '../types/index.js';

export interface MccDataSource {
    /**
     * Identifier of the record set, used in DataLoadError (e.g. a file path).
     */
    locate(kind: DatasetKind): string;

    /**
     * Raw records for the given kind. May throw; Collection wraps the failure.
     */
    read(kind: DatasetKind): unknown;
}

export interface InMemoryRecords {
    codes: unknown;
    ranges: unknown;
    categories: unknown;
}

/**
 * Source backed by records already in memory.
 * Useful for embedding a dataset and for tests.
 */
export class InMemoryDataSource implements MccDataSource {
    constructor(
        private readonly records: InMemoryRecords,
        private readonly name: string = 'memory'
    ) {}

    locate(kind: DatasetKind): string {
        return `${this.name}:${kind}`;
    }

    read(kind: DatasetKind): unknown {
        return this.records[kind];
    }
}
