export * from './schemas/index.js';
export { isIsoTimestamp, normalizeDateTimeSeparator, normalizeUtcSuffix } from './dates.js';
