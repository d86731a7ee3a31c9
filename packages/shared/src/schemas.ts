/**
 * Zod schemas for MCC registry data structures.
 *
 * Raw record schemas describe what a data source hands to the collection.
 * They accept loosely typed input (YAML turns 5411 into a number) and leave
 * normalization to the entity constructors.
 */

import { z } from 'zod';
import { DESCRIPTION_SOURCES } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Code value as found in source data: "0742", "742" or 742.
 */
const codeValue = z.union([z.string(), z.number()]);

/**
 * Optional text field. Numbers are accepted and stringified.
 */
const textField = z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? undefined : String(value)));

/**
 * Canonical 4-digit MCC string.
 */
const mccString = z.string().regex(/^\d{4}$/, 'Must be a 4-digit MCC');

// ============================================================================
// Raw Record Schemas
// ============================================================================

/**
 * One entry of mcc_codes.yml.
 */
export const CodeRecordSchema = z.object({
    mcc: codeValue,
    iso_description: textField,
    usda_description: textField,
    stripe_description: textField,
    stripe_code: textField,
    visa_description: textField,
    visa_clearing_name: textField,
    mastercard_description: textField,
    amex_description: textField,
    alipay_description: textField,
    irs_description: textField,
    irs_reportable: z.boolean().nullish(),
});

export type CodeRecord = z.infer<typeof CodeRecordSchema>;
export type CodeRecordInput = z.input<typeof CodeRecordSchema>;

/**
 * One entry of ranges.yml.
 * Boundaries may be given as start/end or start_code/end_code.
 */
export const RangeRecordSchema = z
    .object({
        start: codeValue.optional(),
        end: codeValue.optional(),
        start_code: codeValue.optional(),
        end_code: codeValue.optional(),
        name: textField,
        description: textField,
        reserved: z.boolean().nullish(),
    })
    .refine(
        (r) => (r.start ?? r.start_code) !== undefined && (r.end ?? r.end_code) !== undefined,
        'Range requires a start and an end code'
    );

export type RangeRecord = z.infer<typeof RangeRecordSchema>;
export type RangeRecordInput = z.input<typeof RangeRecordSchema>;

/**
 * One category body of risk_categories.yml (the id is the mapping key).
 */
export const CategoryRecordSchema = z.object({
    name: textField,
    description: textField,
    codes: z.array(codeValue).nullish(),
});

export type CategoryRecord = z.infer<typeof CategoryRecordSchema>;
export type CategoryRecordInput = z.input<typeof CategoryRecordSchema>;

export const CodeRecordListSchema = z.array(CodeRecordSchema);
export const RangeRecordListSchema = z.array(RangeRecordSchema);
export const CategoryRecordMapSchema = z.record(z.string(), CategoryRecordSchema);

export type CategoryRecordMap = z.infer<typeof CategoryRecordMapSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

/**
 * Resolved registry configuration.
 * dataPath is opaque to the core and only handed to the data source.
 */
export const ConfigurationSchema = z.object({
    defaultDescriptionSource: z.enum(DESCRIPTION_SOURCES).default('iso'),
    includeReservedRanges: z.boolean().default(false),
    cacheEnabled: z.boolean().default(true),
    dataPath: z.string().default('data'),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type ConfigurationInput = z.input<typeof ConfigurationSchema>;

/**
 * Validator options.
 * allowCategories left undefined means no allow-list.
 */
export const ValidatorOptionsSchema = z.object({
    strict: z.boolean().default(true),
    denyCategories: z.array(z.string()).default([]),
    allowCategories: z.array(z.string()).optional(),
});

export type ValidatorOptions = z.infer<typeof ValidatorOptionsSchema>;
export type ValidatorOptionsInput = z.input<typeof ValidatorOptionsSchema>;

// ============================================================================
// Output Schemas
// ============================================================================

/**
 * Full field dump of a code. Absent fields are null.
 */
export const CodeViewSchema = z.object({
    mcc: mccString,
    iso_description: z.string().nullable(),
    usda_description: z.string().nullable(),
    stripe_description: z.string().nullable(),
    stripe_code: z.string().nullable(),
    visa_description: z.string().nullable(),
    visa_clearing_name: z.string().nullable(),
    mastercard_description: z.string().nullable(),
    amex_description: z.string().nullable(),
    alipay_description: z.string().nullable(),
    irs_description: z.string().nullable(),
    irs_reportable: z.boolean().nullable(),
});

export type CodeView = z.infer<typeof CodeViewSchema>;

/**
 * Code view enriched with resolved description, category ids and range name.
 */
export const CodePublicViewSchema = CodeViewSchema.extend({
    description: z.string().nullable(),
    categories: z.array(z.string()),
    range: z.string().nullable(),
});

export type CodePublicView = z.infer<typeof CodePublicViewSchema>;

export const RangeViewSchema = z.object({
    start_code: mccString,
    end_code: mccString,
    name: z.string(),
    description: z.string(),
    reserved: z.boolean(),
});

export type RangeView = z.infer<typeof RangeViewSchema>;

export const CategoryViewSchema = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    codes: z.array(z.string()),
});

export type CategoryView = z.infer<typeof CategoryViewSchema>;

/**
 * Serializer output for API responses.
 * Optional keys appear only when the matching serializer option is on.
 */
export const SerializedCodeSchema = z.object({
    mcc: mccString,
    description: z.string().nullable(),
    stripe_code: z.string().nullable(),
    irs_reportable: z.boolean(),
    iso_description: z.string().nullable().optional(),
    usda_description: z.string().nullable().optional(),
    stripe_description: z.string().nullable().optional(),
    visa_description: z.string().nullable().optional(),
    visa_clearing_name: z.string().nullable().optional(),
    mastercard_description: z.string().nullable().optional(),
    amex_description: z.string().nullable().optional(),
    alipay_description: z.string().nullable().optional(),
    irs_description: z.string().nullable().optional(),
    categories: z.array(z.string()).optional(),
    range: z.string().nullable().optional(),
});

export type SerializedCode = z.infer<typeof SerializedCodeSchema>;

export const SerializedCategorySchema = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    codes: z.array(z.string()).optional(),
});

export type SerializedCategory = z.infer<typeof SerializedCategorySchema>;
