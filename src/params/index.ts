// ============================================================================
// Parameter Normalizer: public API
// ============================================================================

export type { FieldMap, FieldValue, Clock } from './types.js';
export { systemClock } from './types.js';
export { parseUuid, isUuid, resolveIdentifier, setIdentifier } from './identifiers.js';
export { formatDate, formatTime, today, startOfToday, endOfToday, setDates, setDatetimes } from './temporal.js';
export * from './builders.js';
