/**
 * Rule-based MCC validation for data-entry pipelines.
 *
 * Rules run in order and stop at the first failure:
 * 1. format   - 1 to 4 digits after trimming
 * 2. (non-strict mode stops here)
 * 3. exists   - the code is in the collection
 * 4. deny     - the code is in none of denyCategories
 * 5. allow    - if allowCategories is set, the code is in one of them
 *
 * ARCHITECTURAL NOTE: Never throws for a bad value. Failures are returned as
 * messages for any record-validation framework to forward. Errors loading the
 * collection still propagate.
 */

import { MCC_FORMAT, VALIDATION_MESSAGES, ValidatorOptionsSchema } from '../types/index.js';
import type { ValidatorOptions, ValidatorOptionsInput } from '../types/index.js';
import { isCodeInput } from '../utils/normalize.js';
import type { Collection } from './collection.js';

/**
 * Text to check against the format rule, or null for values with no code
 * text (other objects are never stringified).
 */
function candidateText(value: unknown): string | null {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'bigint') return String(value);
    if (isCodeInput(value) && typeof value === 'object') return value.mcc.trim();
    return null;
}

export class Validator {
    readonly options: ValidatorOptions;

    /**
     * @param collection - Dataset used for existence and category rules
     * @param options - strict (default true), denyCategories, allowCategories
     */
    constructor(
        private readonly collection: Collection,
        options: ValidatorOptionsInput = {}
    ) {
        this.options = ValidatorOptionsSchema.parse(options);
    }

    /**
     * @returns Error messages; empty when the value is valid or absent
     */
    validate(value: unknown): string[] {
        if (value === null || value === undefined) return [];

        const candidate = candidateText(value);
        if (candidate === null || !MCC_FORMAT.CANDIDATE.test(candidate)) {
            return [VALIDATION_MESSAGES.invalid_format];
        }

        if (!this.options.strict) return [];

        const code = this.collection.find(candidate);
        if (code === undefined) {
            return [VALIDATION_MESSAGES.not_found];
        }

        // Deny is checked before allow and wins
        if (this.options.denyCategories.some((id) => code.inCategory(id))) {
            return [VALIDATION_MESSAGES.denied_category];
        }

        const allowed = this.options.allowCategories;
        if (allowed !== undefined && !allowed.some((id) => code.inCategory(id))) {
            return [VALIDATION_MESSAGES.denied_category];
        }

        return [];
    }

    valid(value: unknown): boolean {
        return this.validate(value).length === 0;
    }
}

/**
 * One-shot validation without keeping a Validator around.
 */
export function validate(
    collection: Collection,
    value: unknown,
    options: ValidatorOptionsInput = {}
): string[] {
    return new Validator(collection, options).validate(value);
}

export function valid(collection: Collection, value: unknown, options: ValidatorOptionsInput = {}): boolean {
    return validate(collection, value, options).length === 0;
}
