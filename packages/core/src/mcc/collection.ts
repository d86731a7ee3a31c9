/**
 * In-memory MCC dataset: loading, indexing and queries.
 *
 * State is one immutable snapshot (codes, ranges, categories, lazily built
 * index). Loads build a complete new snapshot and swap it in with a single
 * assignment; readers hold one snapshot per operation.
 *
 * ARCHITECTURAL NOTE: No console.* calls, no file system access. Records come
 * from an MccDataSource; failures surface as DataLoadError.
 */

import { Code } from './code.js';
import { Range } from './range.js';
import { Category } from './category.js';
import { compileConditions, type WhereConditions } from './filter.js';
import { CategoryNotFoundError, DataLoadError, NotFoundError } from './errors.js';
import { DEFAULT_CONFIGURATION } from './configuration.js';
import { normalizeCategoryId, normalizeCode, type CodeInput } from '../utils/normalize.js';
import {
    CODE_TEXT_FIELDS,
    CategoryRecordMapSchema,
    CodeRecordListSchema,
    RangeRecordListSchema,
} from '../types/index.js';
import type { MccDataSource } from './data-source.js';
import type { CodeContext } from './code.js';
import type { Configuration, DatasetKind, DescriptionSource } from '../types/index.js';

class Snapshot {
    private index: Map<string, Code> | undefined;

    constructor(
        readonly codes: readonly Code[],
        readonly ranges: readonly Range[],
        readonly categories: readonly Category[]
    ) {}

    /**
     * mcc -> Code, built on first lookup. Belongs to this snapshot only, so it
     * always matches `codes`.
     */
    lookup(mcc: string): Code | undefined {
        if (this.index === undefined) {
            this.index = new Map(this.codes.map((code) => [code.mcc, code]));
        }
        return this.index.get(mcc);
    }
}

interface RecordParser<T> {
    parse(data: unknown): T;
}

function searchableText(code: Code): string {
    const parts: string[] = [code.mcc];
    for (const field of CODE_TEXT_FIELDS) {
        const value = code[field];
        if (value !== undefined) parts.push(value);
    }
    return parts.join(' ').toLowerCase();
}

export class Collection implements CodeContext {
    private snapshot: Snapshot | undefined;
    private loading = false;

    constructor(
        private readonly source: MccDataSource,
        readonly configuration: Configuration = DEFAULT_CONFIGURATION
    ) {}

    get descriptionSource(): DescriptionSource {
        return this.configuration.defaultDescriptionSource;
    }

    // ========================================================================
    // Loading
    // ========================================================================

    isLoaded(): boolean {
        return this.snapshot !== undefined;
    }

    /**
     * Discard the current data and load it again from the source.
     * On failure the previous snapshot stays in place.
     */
    reload(): this {
        this.exclusive(() => {
            this.snapshot = this.build();
        });
        return this;
    }

    /**
     * Current snapshot, loading it if needed. With caching disabled every
     * call reloads.
     */
    private current(): Snapshot {
        const cached = this.snapshot;
        if (cached !== undefined && this.configuration.cacheEnabled) return cached;

        return this.exclusive(() => {
            // Re-test after entering the gate
            if (this.snapshot !== undefined && this.configuration.cacheEnabled) return this.snapshot;
            const fresh = this.build();
            this.snapshot = fresh;
            return fresh;
        });
    }

    /**
     * Single-writer gate around load bodies. Loads are synchronous, so the
     * only contention possible is a source calling back into this collection.
     */
    private exclusive<T>(body: () => T): T {
        if (this.loading) {
            throw new DataLoadError(
                this.source.locate('codes'),
                new Error('Collection accessed while a load is in progress')
            );
        }
        this.loading = true;
        try {
            return body();
        } finally {
            this.loading = false;
        }
    }

    private build(): Snapshot {
        // Ranges and categories first: codes hold no references to them
        const ranges = this.readKind('ranges', RangeRecordListSchema, (records) =>
            records.map((record) => new Range(record))
        );
        const categories = this.readKind('categories', CategoryRecordMapSchema, (records) =>
            Object.entries(records).map(([id, record]) => new Category({ id, ...record }))
        );
        const codes = this.readKind('codes', CodeRecordListSchema, (records) =>
            records.map((record) => new Code(record, this))
        );

        const seen = new Set<string>();
        for (const category of categories) {
            if (seen.has(category.id)) {
                throw new DataLoadError(
                    this.source.locate('categories'),
                    new Error(`Duplicate category id: ${category.id}`)
                );
            }
            seen.add(category.id);
        }

        return new Snapshot(Object.freeze(codes), Object.freeze(ranges), Object.freeze(categories));
    }

    private readKind<Input, Output>(
        kind: DatasetKind,
        schema: RecordParser<Input>,
        construct: (records: Input) => Output[]
    ): Output[] {
        try {
            return construct(schema.parse(this.source.read(kind)));
        } catch (err) {
            throw new DataLoadError(this.source.locate(kind), err);
        }
    }

    // ========================================================================
    // Code queries
    // ========================================================================

    /**
     * Every code, in source order. The same frozen array is returned until the
     * next load.
     */
    all(): readonly Code[] {
        return this.current().codes;
    }

    /**
     * O(1) lookup. Malformed input is a miss, not an error.
     */
    find(value: CodeInput): Code | undefined {
        const snapshot = this.current();
        const mcc = normalizeCode(value);
        return mcc === null ? undefined : snapshot.lookup(mcc);
    }

    /**
     * @throws NotFoundError if no code matches
     */
    findOrThrow(value: CodeInput): Code {
        const code = this.find(value);
        if (code === undefined) {
            throw new NotFoundError(value);
        }
        return code;
    }

    /**
     * AND of every condition. Empty conditions return all codes.
     * An unknown key is an error, not a condition that never matches.
     *
     * @throws ConfigurationError for keys outside FILTER_KEYS
     */
    where(conditions: WhereConditions = {}): readonly Code[] {
        const snapshot = this.current();
        if (Object.keys(conditions).length === 0) return snapshot.codes;
        const predicate = compileConditions(conditions);
        return snapshot.codes.filter(predicate);
    }

    /**
     * Codes inside the range whose name matches case-insensitively.
     */
    inRange(rangeName: string): Code[] {
        const snapshot = this.current();
        const range = this.findRangeIn(snapshot, rangeName);
        if (range === undefined) return [];
        return snapshot.codes.filter((code) => range.includes(code));
    }

    /**
     * Case-insensitive substring search over the mcc and every text field.
     * A blank query returns all codes.
     */
    search(query: string): readonly Code[] {
        const snapshot = this.current();
        if (query.trim() === '') return snapshot.codes;

        const needle = query.toLowerCase();
        return snapshot.codes.filter((code) => searchableText(code).includes(needle));
    }

    inCategory(category: Category | string): Code[] {
        const snapshot = this.current();
        const found = this.findCategoryIn(snapshot, category);
        if (found === undefined) return [];
        return snapshot.codes.filter((code) => found.includes(code));
    }

    valid(value: CodeInput): boolean {
        return this.find(value) !== undefined;
    }

    exists(value: CodeInput): boolean {
        return this.valid(value);
    }

    count(): number {
        return this.all().length;
    }

    // ========================================================================
    // Range and category access
    // ========================================================================

    ranges(): readonly Range[] {
        return this.current().ranges;
    }

    /**
     * Ranges callers should offer. Reserved ranges are left out unless
     * includeReservedRanges is set.
     */
    eligibleRanges(): readonly Range[] {
        const ranges = this.ranges();
        if (this.configuration.includeReservedRanges) return ranges;
        return ranges.filter((range) => !range.reserved);
    }

    findRange(rangeName: string): Range | undefined {
        return this.findRangeIn(this.current(), rangeName);
    }

    rangeFor(value: CodeInput): Range | undefined {
        return this.ranges().find((range) => range.includes(value));
    }

    categories(): readonly Category[] {
        return this.current().categories;
    }

    findCategory(category: Category | string): Category | undefined {
        return this.findCategoryIn(this.current(), category);
    }

    /**
     * @throws CategoryNotFoundError if the id is not loaded
     */
    getCategory(category: Category | string): Category {
        const found = this.findCategory(category);
        if (found === undefined) {
            throw new CategoryNotFoundError(category instanceof Category ? category.id : category);
        }
        return found;
    }

    categoriesFor(value: CodeInput): Category[] {
        return this.categories().filter((category) => category.includes(value));
    }

    private findRangeIn(snapshot: Snapshot, rangeName: string): Range | undefined {
        const wanted = rangeName.toLowerCase();
        return snapshot.ranges.find((range) => range.name.toLowerCase() === wanted);
    }

    private findCategoryIn(snapshot: Snapshot, category: Category | string): Category | undefined {
        const id = category instanceof Category ? category.id : normalizeCategoryId(category);
        return snapshot.categories.find((c) => c.id === id);
    }
}
