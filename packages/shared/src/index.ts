// Schemas
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
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    DESCRIPTION_SOURCES,
    DESCRIPTION_FIELDS,
    CODE_TEXT_FIELDS,
    MCC_FORMAT,
    VALIDATION_MESSAGES,
    DATA_FILES,
    DEFAULT_DESCRIPTION_SOURCE,
} from './constants.js';

export type { DescriptionSource, CodeTextField, ValidationRule, DatasetKind } from './constants.js';
