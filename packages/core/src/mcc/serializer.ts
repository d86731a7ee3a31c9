/**
 * Stable JSON shapes for API responses.
 */

import type { Code } from './code.js';
import type { Range } from './range.js';
import type { Category } from './category.js';
import type { RangeView, SerializedCategory, SerializedCode } from '../types/index.js';

export interface SerializeCodeOptions {
    includeAllDescriptions?: boolean;
    includeCategories?: boolean;
    includeRange?: boolean;
}

export interface SerializeCategoryOptions {
    includeCodes?: boolean;
}

const DEFAULT_CODE_OPTIONS: Required<SerializeCodeOptions> = {
    includeAllDescriptions: false,
    includeCategories: true,
    includeRange: true,
};

export function serializeCode(code: Code, options: SerializeCodeOptions = {}): SerializedCode {
    const opts = { ...DEFAULT_CODE_OPTIONS, ...options };
    const result: SerializedCode = {
        mcc: code.mcc,
        description: code.description() ?? null,
        stripe_code: code.stripe_code ?? null,
        irs_reportable: code.irsReportable(),
    };

    if (opts.includeAllDescriptions) {
        const record = code.toRecord();
        result.iso_description = record.iso_description;
        result.usda_description = record.usda_description;
        result.stripe_description = record.stripe_description;
        result.visa_description = record.visa_description;
        result.visa_clearing_name = record.visa_clearing_name;
        result.mastercard_description = record.mastercard_description;
        result.amex_description = record.amex_description;
        result.alipay_description = record.alipay_description;
        result.irs_description = record.irs_description;
    }
    if (opts.includeCategories) {
        result.categories = code.categories().map((c) => c.id);
    }
    if (opts.includeRange) {
        result.range = code.range()?.name ?? null;
    }

    return result;
}

export function serializeRange(range: Range): RangeView {
    return range.toRecord();
}

export function serializeCategory(category: Category, options: SerializeCategoryOptions = {}): SerializedCategory {
    const result: SerializedCategory = {
        id: category.id,
        name: category.name,
        description: category.description,
    };
    if (options.includeCodes) {
        result.codes = [...category.codes];
    }
    return result;
}

export function serializeCollection(codes: readonly Code[], options: SerializeCodeOptions = {}): SerializedCode[] {
    return codes.map((code) => serializeCode(code, options));
}
