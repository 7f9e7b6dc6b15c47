// ============================================================================
// Field Map Types
// ============================================================================
// The request side of every remote operation is a flat, ordered map of field
// names to scalar values. Dates and times are already rendered in their
// xsd:date / xsd:time lexical form when they land here.
// ============================================================================

export type FieldValue = string | boolean;

/** Insertion-ordered; absent optional fields are left out rather than set to null. */
export type FieldMap = Record<string, FieldValue>;

/** Source of "now". Injected wherever a default date is derived. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
