/**
 * Constants for the MCC registry.
 */

/**
 * Recognized description sources, in fallback order.
 * `Code.description()` walks this list when the requested source is blank.
 */
export const DESCRIPTION_SOURCES = [
    'iso',
    'usda',
    'stripe',
    'visa',
    'mastercard',
    'amex',
    'alipay',
    'irs',
] as const;

export type DescriptionSource = (typeof DESCRIPTION_SOURCES)[number];

/**
 * Record field holding each source's description.
 * NOTE: `stripe` maps to stripe_description, never to the stripe_code identifier.
 */
export const DESCRIPTION_FIELDS = {
    iso: 'iso_description',
    usda: 'usda_description',
    stripe: 'stripe_description',
    visa: 'visa_description',
    mastercard: 'mastercard_description',
    amex: 'amex_description',
    alipay: 'alipay_description',
    irs: 'irs_description',
} as const satisfies Record<DescriptionSource, string>;

/**
 * Optional text fields of a code record, in record order.
 * Search text is built from the mcc followed by these.
 */
export const CODE_TEXT_FIELDS = [
    'iso_description',
    'usda_description',
    'stripe_description',
    'stripe_code',
    'visa_description',
    'visa_clearing_name',
    'mastercard_description',
    'amex_description',
    'alipay_description',
    'irs_description',
] as const;

export type CodeTextField = (typeof CODE_TEXT_FIELDS)[number];

/**
 * MCC format rules.
 */
export const MCC_FORMAT = {
    LENGTH: 4,
    PAD_CHAR: '0',
    // Canonical form after padding
    CANONICAL: /^\d{4}$/,
    // Raw candidate accepted by the validator before padding
    CANDIDATE: /^\d{1,4}$/,
    RANGE_SEPARATOR: '-',
} as const;

/**
 * Validator error messages, keyed by rule.
 */
export const VALIDATION_MESSAGES = {
    invalid_format: 'must be a valid 4-digit MCC code',
    not_found: 'is not a recognized MCC code',
    denied_category: 'is in a denied category',
} as const;

export type ValidationRule = keyof typeof VALIDATION_MESSAGES;

/**
 * Data file names inside the configured data path.
 */
export const DATA_FILES = {
    codes: 'mcc_codes.yml',
    ranges: 'ranges.yml',
    categories: 'risk_categories.yml',
} as const;

export type DatasetKind = keyof typeof DATA_FILES;

export const DEFAULT_DESCRIPTION_SOURCE: DescriptionSource = 'iso';
