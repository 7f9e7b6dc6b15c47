import { warn } from '../config.js';
import type { FieldMap } from './types.js';

const HEX_32 = /^[0-9a-f]{32}$/i;

// Hyphenated 8-4-4-4-12 groups, with optional braces or urn prefix
const UUID_SHAPE = /^\{?(?:urn:uuid:)?[^-{}]{8}-[^-]{4}-[^-]{4}-[^-]{4}-[^-{}]{12}\}?$/i;

/**
 * Parse a UUID in any of the usual spellings: hyphenated, bare 32 hex digits,
 * wrapped in braces, or prefixed with `urn:uuid:`. Returns the lower-case
 * hyphenated form, or null when the value is not a UUID.
 */
export function parseUuid(value: string): string | null {
  const hex = value
    .replace(/urn:/gi, '')
    .replace(/uuid:/gi, '')
    .replace(/^[{}]+|[{}]+$/g, '')
    .replace(/-/g, '');

  if (!HEX_32.test(hex)) return null;

  const lower = hex.toLowerCase();
  return [
    lower.slice(0, 8),
    lower.slice(8, 12),
    lower.slice(12, 16),
    lower.slice(16, 20),
    lower.slice(20),
  ].join('-');
}

export function isUuid(value: string): boolean {
  return parseUuid(value) !== null;
}

/**
 * Field contribution for one identifier slot. Exactly one of
 * `<prefix>UUIDIdentifier` or `<prefix>Identifier` is produced for a supplied
 * value; nothing for an absent one.
 *
 * Anything that does not parse as a UUID goes out as a plain code. Values
 * shaped like a UUID that still fail to parse take the same path, but are
 * warned about since they are most likely a mistyped UUID.
 */
export function resolveIdentifier(prefix: string, value: string | undefined): FieldMap {
  if (value === undefined) return {};

  const uuid = parseUuid(value);
  if (uuid !== null) {
    return { [`${prefix}UUIDIdentifier`]: uuid };
  }

  if (UUID_SHAPE.test(value)) {
    warn(`identifiers: "${value}" looks like a UUID but does not parse, sending as ${prefix}Identifier`);
  }
  return { [`${prefix}Identifier`]: value };
}

/** Merge the identifier slot into `fields`, keeping insertion order. */
export function setIdentifier(prefix: string, value: string | undefined, fields: FieldMap): FieldMap {
  return Object.assign(fields, resolveIdentifier(prefix, value));
}
