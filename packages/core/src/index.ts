// Types (re-exported from shared)
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
    DatasetKind,
} from './types/index.js';

export {
    CodeRecordSchema,
    RangeRecordSchema,
    CategoryRecordSchema,
    ConfigurationSchema,
    ValidatorOptionsSchema,
    DESCRIPTION_SOURCES,
    VALIDATION_MESSAGES,
    DATA_FILES,
} from './types/index.js';

// Utils
export { normalizeCode, normalizeCodeOrThrow, normalizeCategoryId, isCodeInput } from './utils/index.js';
export type { CodeInput } from './utils/index.js';

// MCC
export {
    Code,
    Range,
    Category,
    Collection,
    Validator,
    validate,
    valid,
    InMemoryDataSource,
    resolveConfiguration,
    validateConfiguration,
    DEFAULT_CONFIGURATION,
    FILTER_KEYS,
    serializeCode,
    serializeRange,
    serializeCategory,
    serializeCollection,
    MccError,
    InvalidFormatError,
    InvalidRangeError,
    NotFoundError,
    CategoryNotFoundError,
    DataLoadError,
    ConfigurationError,
} from './mcc/index.js';
export type {
    MccDataSource,
    InMemoryRecords,
    FilterKey,
    FilterValue,
    FilterCondition,
    WhereConditions,
    SerializeCodeOptions,
    SerializeCategoryOptions,
    MccErrorCode,
} from './mcc/index.js';
