/**
 * Code normalization.
 *
 * Every public operation that takes a code funnels it through here.
 */

import { MCC_FORMAT } from '../types/index.js';
import { InvalidFormatError } from '../mcc/errors.js';

/**
 * Anything that names a code: "5411", "742", 742, or an object carrying an
 * mcc (a Code instance).
 */
export type CodeInput = string | number | { readonly mcc: string };

function rawText(value: CodeInput): string {
    if (typeof value === 'object') {
        return value.mcc;
    }
    return String(value);
}

/**
 * Trim and left-pad to 4 characters without checking the result.
 * Category and range entries are padded this way before comparison.
 */
export function padCode(text: string): string {
    return text.trim().padStart(MCC_FORMAT.LENGTH, MCC_FORMAT.PAD_CHAR);
}

/**
 * Normalize a code to its canonical 4-digit form.
 *
 * Transformations:
 * - Stringify (numbers, Code instances)
 * - Trim surrounding whitespace
 * - Left-pad with zeros to 4 characters ("" becomes "0000")
 *
 * @returns The 4-digit string, or null when the result is not 4 digits
 */
export function normalizeCode(value: CodeInput): string | null {
    const padded = padCode(rawText(value));
    return MCC_FORMAT.CANONICAL.test(padded) ? padded : null;
}

/**
 * Same as normalizeCode but throws InvalidFormatError on malformed input.
 */
export function normalizeCodeOrThrow(value: CodeInput): string {
    const normalized = normalizeCode(value);
    if (normalized === null) {
        throw new InvalidFormatError(value);
    }
    return normalized;
}

/**
 * Narrow an unknown value to a CodeInput.
 */
export function isCodeInput(value: unknown): value is CodeInput {
    if (typeof value === 'string' || typeof value === 'number') {
        return true;
    }
    return (
        typeof value === 'object' &&
        value !== null &&
        'mcc' in value &&
        typeof value.mcc === 'string'
    );
}

/**
 * Category ids are compared trimmed and lower-cased.
 */
export function normalizeCategoryId(id: string): string {
    return id.trim().toLowerCase();
}
