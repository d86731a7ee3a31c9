/**
 * Error taxonomy for the MCC registry.
 *
 * Construction errors (InvalidFormat, InvalidRange) signal corrupt data and
 * always propagate. Lookup misses are not errors except through the strict
 * variants (findOrThrow, getCategory).
 */

import type { ZodIssue } from 'zod';

export type MccErrorCode =
    | 'INVALID_FORMAT'
    | 'INVALID_RANGE'
    | 'NOT_FOUND'
    | 'CATEGORY_NOT_FOUND'
    | 'DATA_LOAD_ERROR'
    | 'CONFIGURATION_ERROR';

function describe(value: unknown): string {
    return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Base class for all registry errors.
 */
export abstract class MccError extends Error {
    public readonly code: MccErrorCode;

    constructor(message: string, code: MccErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
        this.code = code;
    }
}

/**
 * A code value cannot be normalized to 4 digits.
 */
export class InvalidFormatError extends MccError {
    constructor(public readonly value: unknown) {
        super(
            `Invalid MCC code format: ${describe(value)}. Expected a 4-digit string or integer.`,
            'INVALID_FORMAT'
        );
    }
}

export class InvalidRangeError extends MccError {
    constructor(
        public readonly startCode: string,
        public readonly endCode: string
    ) {
        super(`Start code (${startCode}) cannot be greater than end code (${endCode})`, 'INVALID_RANGE');
    }
}

export class NotFoundError extends MccError {
    constructor(public readonly value: unknown) {
        super(`MCC code not found: ${describe(value)}`, 'NOT_FOUND');
    }
}

export class CategoryNotFoundError extends MccError {
    constructor(public readonly categoryId: string) {
        super(`Category not found: ${describe(categoryId)}`, 'CATEGORY_NOT_FOUND');
    }
}

/**
 * A data source failed to produce valid records.
 * `source` identifies the record set (usually a file path).
 */
export class DataLoadError extends MccError {
    constructor(
        public readonly source: string,
        cause?: unknown
    ) {
        const detail = cause instanceof Error ? ` (${cause.message})` : '';
        super(`Failed to load MCC data from: ${source}${detail}`, 'DATA_LOAD_ERROR', { cause });
    }
}

export class ConfigurationError extends MccError {
    constructor(
        message: string,
        public readonly issues: ZodIssue[] = []
    ) {
        super(message, 'CONFIGURATION_ERROR');
    }
}
