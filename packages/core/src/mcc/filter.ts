/**
 * Attribute filtering for Collection.where().
 *
 * Filter keys come from a fixed accessor table instead of reflective lookup,
 * so a misspelled key fails loudly rather than matching nothing.
 */

import { ConfigurationError } from './errors.js';
import type { Code } from './code.js';

export type FilterValue = string | number | boolean | null;

/**
 * A condition is a literal (strict equality), a list (membership) or a
 * RegExp (matched against the stringified value).
 */
export type FilterCondition = FilterValue | readonly FilterValue[] | RegExp;

const FILTER_ACCESSORS = {
    mcc: (code) => code.mcc,
    iso_description: (code) => code.iso_description ?? null,
    usda_description: (code) => code.usda_description ?? null,
    stripe_description: (code) => code.stripe_description ?? null,
    stripe_code: (code) => code.stripe_code ?? null,
    visa_description: (code) => code.visa_description ?? null,
    visa_clearing_name: (code) => code.visa_clearing_name ?? null,
    mastercard_description: (code) => code.mastercard_description ?? null,
    amex_description: (code) => code.amex_description ?? null,
    alipay_description: (code) => code.alipay_description ?? null,
    irs_description: (code) => code.irs_description ?? null,
    irs_reportable: (code) => code.irs_reportable ?? null,
    description: (code) => code.description() ?? null,
} satisfies Record<string, (code: Code) => FilterValue>;

export type FilterKey = keyof typeof FILTER_ACCESSORS;

export type WhereConditions = Partial<Record<FilterKey, FilterCondition>>;

function isFilterKey(key: string): key is FilterKey {
    return Object.prototype.hasOwnProperty.call(FILTER_ACCESSORS, key);
}

export const FILTER_KEYS: readonly FilterKey[] = Object.keys(FILTER_ACCESSORS).filter(isFilterKey);

function isList(condition: FilterCondition): condition is readonly FilterValue[] {
    return Array.isArray(condition);
}

function matchesCondition(value: FilterValue, condition: FilterCondition): boolean {
    if (condition instanceof RegExp) {
        // match() ignores lastIndex, so global patterns behave the same on every code
        return String(value ?? '').match(condition) !== null;
    }
    if (isList(condition)) {
        return condition.includes(value);
    }
    return value === condition;
}

/**
 * Compile conditions into a single predicate (AND of every condition).
 *
 * @throws ConfigurationError for keys outside FILTER_KEYS
 */
export function compileConditions(conditions: WhereConditions): (code: Code) => boolean {
    const checks: Array<(code: Code) => boolean> = [];

    for (const [key, condition] of Object.entries(conditions)) {
        if (!isFilterKey(key)) {
            throw new ConfigurationError(
                `Unknown filter attribute "${key}". Expected one of: ${FILTER_KEYS.join(', ')}`
            );
        }
        if (condition === undefined) continue;
        const accessor: (code: Code) => FilterValue = FILTER_ACCESSORS[key];
        checks.push((code) => matchesCondition(accessor(code), condition));
    }

    return (code) => checks.every((check) => check(code));
}
