/**
 * MCC module: reference data model, collection queries and validation.
 */

export { Code } from './code.js';
export { Range } from './range.js';
export { Category } from './category.js';
export { Collection } from './collection.js';
export { Validator, validate, valid } from './validator.js';
export { InMemoryDataSource } from './data-source.js';
export { resolveConfiguration, validateConfiguration, DEFAULT_CONFIGURATION } from './configuration.js';
export { compileConditions, FILTER_KEYS } from './filter.js';
export { serializeCode, serializeRange, serializeCategory, serializeCollection } from './serializer.js';
export {
    MccError,
    InvalidFormatError,
    InvalidRangeError,
    NotFoundError,
    CategoryNotFoundError,
    DataLoadError,
    ConfigurationError,
} from './errors.js';
export type { CodeContext } from './code.js';
export type { RangeInit } from './range.js';
export type { CategoryInit } from './category.js';
export type { MccDataSource, InMemoryRecords } from './data-source.js';
export type { FilterKey, FilterValue, FilterCondition, WhereConditions } from './filter.js';
export type { SerializeCodeOptions, SerializeCategoryOptions } from './serializer.js';
export type { MccErrorCode } from './errors.js';
