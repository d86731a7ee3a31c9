/**
 * ISO 18245 range: a closed interval of codes sharing an industry segment.
 */

import { normalizeCode, normalizeCodeOrThrow, padCode, type CodeInput } from '../utils/normalize.js';
import { InvalidFormatError, InvalidRangeError } from './errors.js';
import type { RangeRecordInput, RangeView } from '../types/index.js';

/**
 * Range boundaries may be given as start/end or start_code/end_code.
 */
export type RangeInit = Pick<RangeRecordInput, 'start' | 'end' | 'start_code' | 'end_code' | 'reserved'> & {
    name?: string | null;
    description?: string | null;
};

function boundary(value: string | number | undefined): string {
    if (value === undefined) {
        throw new InvalidFormatError(value);
    }
    return normalizeCodeOrThrow(value);
}

export class Range implements Iterable<string> {
    readonly start_code: string;
    readonly end_code: string;
    readonly name: string;
    readonly description: string;
    readonly reserved: boolean;

    /**
     * @throws InvalidFormatError if a boundary is missing or not a 1-4 digit code
     * @throws InvalidRangeError if start > end
     */
    constructor(init: RangeInit) {
        this.start_code = boundary(init.start ?? init.start_code);
        this.end_code = boundary(init.end ?? init.end_code);
        this.name = init.name ?? '';
        this.description = init.description ?? '';
        this.reserved = init.reserved === true;

        if (Number(this.start_code) > Number(this.end_code)) {
            throw new InvalidRangeError(this.start_code, this.end_code);
        }
        Object.freeze(this);
    }

    /**
     * Fixed-width codes compare the same lexicographically and numerically.
     * Malformed values are never included.
     */
    includes(value: CodeInput): boolean {
        const code = normalizeCode(value);
        if (code === null) return false;
        return code >= this.start_code && code <= this.end_code;
    }

    size(): number {
        return Number(this.end_code) - Number(this.start_code) + 1;
    }

    /**
     * Every code from start to end inclusive. Builds a new array on each call.
     */
    enumerate(): string[] {
        const first = Number(this.start_code);
        return Array.from({ length: this.size() }, (_, i) => padCode(String(first + i)));
    }

    *[Symbol.iterator](): Iterator<string> {
        yield* this.enumerate();
    }

    equals(other: unknown): boolean {
        return other instanceof Range && other.start_code === this.start_code && other.end_code === this.end_code;
    }

    toString(): string {
        return `${this.start_code}-${this.end_code}`;
    }

    toRecord(): RangeView {
        return {
            start_code: this.start_code,
            end_code: this.end_code,
            name: this.name,
            description: this.description,
            reserved: this.reserved,
        };
    }
}
