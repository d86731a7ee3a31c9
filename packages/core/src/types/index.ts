/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    CodeRecord,
    CodeRecordInput,
    RangeRecord,
    RangeRecordInput,
    CategoryRecord,
    CategoryRecordInput,
    CategoryRecordMap,
    Configuration,
    ConfigurationInput,
    ValidatorOptions,
    ValidatorOptionsInput,
    CodeView,
    CodePublicView,
    RangeView,
    CategoryView,
    SerializedCode,
    SerializedCategory,
    DescriptionSource,
    CodeTextField,
    ValidationRule,
    DatasetKind,
} from '@mcc-registry/shared';

export {
    CodeRecordSchema,
    RangeRecordSchema,
    CategoryRecordSchema,
    CodeRecordListSchema,
    RangeRecordListSchema,
    CategoryRecordMapSchema,
    ConfigurationSchema,
    ValidatorOptionsSchema,
    CodeViewSchema,
    CodePublicViewSchema,
    RangeViewSchema,
    CategoryViewSchema,
    SerializedCodeSchema,
    SerializedCategorySchema,
    DESCRIPTION_SOURCES,
    DESCRIPTION_FIELDS,
    CODE_TEXT_FIELDS,
    MCC_FORMAT,
    VALIDATION_MESSAGES,
    DATA_FILES,
    DEFAULT_DESCRIPTION_SOURCE,
} from '@mcc-registry/shared';
