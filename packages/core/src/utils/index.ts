export { normalizeCode, normalizeCodeOrThrow, normalizeCategoryId, padCode, isCodeInput } from './normalize.js';
export type { CodeInput } from './normalize.js';
