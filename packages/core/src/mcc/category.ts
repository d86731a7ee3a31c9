/**
 * Risk category: a named, arbitrary set of codes.
 *
 * Entries are single codes ("7995") or ranges ("3000-3350"). Membership is
 * computed on demand; a category never holds Code references.
 */

import { normalizeCategoryId, normalizeCode, padCode, type CodeInput } from '../utils/normalize.js';
import { MCC_FORMAT } from '../types/index.js';
import type { CategoryView } from '../types/index.js';

export interface CategoryInit {
    id: string;
    name?: string | null;
    description?: string | null;
    codes?: ReadonlyArray<string | number> | null;
}

function normalizeEntry(entry: string | number): string {
    // Integers become padded codes; strings (including ranges) keep their form
    return typeof entry === 'number' ? padCode(String(entry)) : entry.trim();
}

/**
 * Test one entry against an already normalized code.
 */
function entryMatches(entry: string, code: string): boolean {
    const separator = entry.indexOf(MCC_FORMAT.RANGE_SEPARATOR);
    if (separator === -1) {
        return padCode(entry) === code;
    }
    const start = padCode(entry.slice(0, separator));
    const end = padCode(entry.slice(separator + 1));
    return code >= start && code <= end;
}

export class Category {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly codes: readonly string[];

    constructor(init: CategoryInit) {
        this.id = normalizeCategoryId(init.id);
        this.name = init.name ?? '';
        this.description = init.description ?? '';
        this.codes = Object.freeze((init.codes ?? []).map(normalizeEntry));
        Object.freeze(this);
    }

    /**
     * True if the code matches any single entry or falls inside any range
     * entry. Malformed values are never included.
     */
    includes(value: CodeInput): boolean {
        const code = normalizeCode(value);
        if (code === null) return false;
        return this.codes.some((entry) => entryMatches(entry, code));
    }

    equals(other: unknown): boolean {
        return other instanceof Category && other.id === this.id;
    }

    toString(): string {
        return this.name;
    }

    toRecord(): CategoryView {
        return {
            id: this.id,
            name: this.name,
            description: this.description,
            codes: [...this.codes],
        };
    }
}
