/**
 * A single Merchant Category Code with its multi-source descriptions.
 */

import { normalizeCategoryId, normalizeCode, normalizeCodeOrThrow } from '../utils/normalize.js';
import { Category } from './category.js';
import {
    DEFAULT_DESCRIPTION_SOURCE,
    DESCRIPTION_FIELDS,
    DESCRIPTION_SOURCES,
} from '../types/index.js';
import type { Range } from './range.js';
import type { CodePublicView, CodeRecordInput, CodeView, DescriptionSource } from '../types/index.js';

/**
 * What a code needs from its owning collection to answer range, category
 * and default-description questions. Collection implements this.
 */
export interface CodeContext {
    readonly descriptionSource: DescriptionSource;
    ranges(): readonly Range[];
    categories(): readonly Category[];
    inCategory(id: string): readonly Code[];
}

/**
 * Blank values are stored as absent, never as "".
 */
function presence(value: string | number | null | undefined): string | undefined {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text === '' ? undefined : text;
}

export class Code {
    readonly mcc: string;
    readonly iso_description: string | undefined;
    readonly usda_description: string | undefined;
    readonly stripe_description: string | undefined;
    readonly stripe_code: string | undefined;
    readonly visa_description: string | undefined;
    readonly visa_clearing_name: string | undefined;
    readonly mastercard_description: string | undefined;
    readonly amex_description: string | undefined;
    readonly alipay_description: string | undefined;
    readonly irs_description: string | undefined;
    readonly irs_reportable: boolean | undefined;

    readonly #context: CodeContext | undefined;

    /**
     * @param record - Raw code record
     * @param context - Owning collection; codes built standalone have none
     * @throws InvalidFormatError if mcc does not normalize to 4 digits
     */
    constructor(record: CodeRecordInput, context?: CodeContext) {
        this.mcc = normalizeCodeOrThrow(record.mcc);
        this.iso_description = presence(record.iso_description);
        this.usda_description = presence(record.usda_description);
        this.stripe_description = presence(record.stripe_description);
        this.stripe_code = presence(record.stripe_code);
        this.visa_description = presence(record.visa_description);
        this.visa_clearing_name = presence(record.visa_clearing_name);
        this.mastercard_description = presence(record.mastercard_description);
        this.amex_description = presence(record.amex_description);
        this.alipay_description = presence(record.alipay_description);
        this.irs_description = presence(record.irs_description);
        this.irs_reportable = record.irs_reportable ?? undefined;
        this.#context = context;
        Object.freeze(this);
    }

    /**
     * Resolve a human-readable description.
     *
     * Tries the requested source (or the configured default), then every
     * source in DESCRIPTION_SOURCES order. Returns undefined when all are blank.
     */
    description(source?: DescriptionSource): string | undefined {
        const preferred = source ?? this.#context?.descriptionSource ?? DEFAULT_DESCRIPTION_SOURCE;
        const first = this[DESCRIPTION_FIELDS[preferred]];
        if (first !== undefined) return first;

        for (const fallback of DESCRIPTION_SOURCES) {
            const value = this[DESCRIPTION_FIELDS[fallback]];
            if (value !== undefined) return value;
        }
        return undefined;
    }

    /**
     * Absent and false both read as not reportable.
     */
    irsReportable(): boolean {
        return this.irs_reportable === true;
    }

    /**
     * Containing ISO range, if any.
     */
    range(): Range | undefined {
        return this.#context?.ranges().find((r) => r.includes(this));
    }

    categories(): Category[] {
        return (this.#context?.categories() ?? []).filter((c) => c.includes(this));
    }

    inCategory(category: Category | string): boolean {
        if (this.#context === undefined) {
            return category instanceof Category && category.includes(this);
        }
        const id = category instanceof Category ? category.id : normalizeCategoryId(category);
        return this.#context.inCategory(id).some((code) => code.mcc === this.mcc);
    }

    /**
     * Equal to another Code, or to a raw value, with the same normalized mcc.
     */
    equals(other: unknown): boolean {
        if (other instanceof Code) return other.mcc === this.mcc;
        if (typeof other === 'string' || typeof other === 'number') {
            return normalizeCode(other) === this.mcc;
        }
        return false;
    }

    toNumber(): number {
        return Number(this.mcc);
    }

    toString(): string {
        return this.mcc;
    }

    toRecord(): CodeView {
        return {
            mcc: this.mcc,
            iso_description: this.iso_description ?? null,
            usda_description: this.usda_description ?? null,
            stripe_description: this.stripe_description ?? null,
            stripe_code: this.stripe_code ?? null,
            visa_description: this.visa_description ?? null,
            visa_clearing_name: this.visa_clearing_name ?? null,
            mastercard_description: this.mastercard_description ?? null,
            amex_description: this.amex_description ?? null,
            alipay_description: this.alipay_description ?? null,
            irs_description: this.irs_description ?? null,
            irs_reportable: this.irs_reportable ?? null,
        };
    }

    toPublicView(): CodePublicView {
        return {
            ...this.toRecord(),
            description: this.description() ?? null,
            categories: this.categories().map((c) => c.id),
            range: this.range()?.name ?? null,
        };
    }
}
