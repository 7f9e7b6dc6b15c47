import { describe, it, expect, afterEach, vi } from 'vitest';
import { isUuid, parseUuid, resolveIdentifier, setIdentifier } from '../../src/params/identifiers.js';

const UUID = '3b4ce7a2-1d8b-4f0e-9c3e-2a5b6c7d8e9f';

describe('Identifiers', () => {
  const originalEnv = process.env.SD_ENV;

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.SD_ENV;
    } else {
      process.env.SD_ENV = originalEnv;
    }
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // parseUuid
  // ==========================================================================

  describe('parseUuid', () => {
    it('should accept the hyphenated form', () => {
      expect(parseUuid(UUID)).toBe(UUID);
    });

    it('should lower-case the result', () => {
      expect(parseUuid(UUID.toUpperCase())).toBe(UUID);
    });

    it('should accept 32 bare hex digits', () => {
      expect(parseUuid('3b4ce7a21d8b4f0e9c3e2a5b6c7d8e9f')).toBe(UUID);
    });

    it('should accept braces and a urn prefix', () => {
      expect(parseUuid(`{${UUID}}`)).toBe(UUID);
      expect(parseUuid(`urn:uuid:${UUID}`)).toBe(UUID);
    });

    it('should reject short codes', () => {
      expect(parseUuid('AB')).toBeNull();
      expect(parseUuid('XY1234')).toBeNull();
      expect(parseUuid('')).toBeNull();
    });

    it('should reject surrounding whitespace', () => {
      expect(parseUuid(` ${UUID}`)).toBeNull();
      expect(parseUuid(`${UUID}\n`)).toBeNull();
    });

    it('should reject non-hex digits', () => {
      expect(parseUuid('3b4ce7a2-1d8b-4f0e-9c3e-2a5b6c7d8e9g')).toBeNull();
    });

    it('should back isUuid', () => {
      expect(isUuid(UUID)).toBe(true);
      expect(isUuid('AB')).toBe(false);
    });
  });

  // ==========================================================================
  // resolveIdentifier
  // ==========================================================================

  describe('resolveIdentifier', () => {
    it('should emit nothing for an absent value', () => {
      expect(resolveIdentifier('Institution', undefined)).toEqual({});
    });

    it('should emit a code slot for a plain code', () => {
      expect(resolveIdentifier('Institution', 'AB')).toEqual({ InstitutionIdentifier: 'AB' });
    });

    it('should emit a UUID slot for a UUID, normalized', () => {
      expect(resolveIdentifier('Department', UUID.toUpperCase())).toEqual({ DepartmentUUIDIdentifier: UUID });
    });

    it('should send a padded UUID unchanged as a code', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(resolveIdentifier('Department', ` ${UUID} `)).toEqual({ DepartmentIdentifier: ` ${UUID} ` });
    });

    it('should send a malformed UUID as a code and warn outside dev', () => {
      delete process.env.SD_ENV;
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const bad = '3b4ce7a2-1d8b-4f0e-9c3e-2a5b6c7d8e9g';

      expect(resolveIdentifier('Department', bad)).toEqual({ DepartmentIdentifier: bad });
      expect(spy).toHaveBeenCalledWith(
        `[sd-connector] identifiers: "${bad}" looks like a UUID but does not parse, sending as DepartmentIdentifier`
      );
    });

    it('should not warn about ordinary codes', () => {
      process.env.SD_ENV = 'dev';
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      resolveIdentifier('Department', 'XY12');

      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('setIdentifier', () => {
    it('should append to the map in call order', () => {
      const fields = setIdentifier('Department', UUID, setIdentifier('Institution', 'AB', {}));

      expect(Object.keys(fields)).toEqual(['InstitutionIdentifier', 'DepartmentUUIDIdentifier']);
    });

    it('should leave the map untouched for an absent value', () => {
      const fields = { UUIDIndicator: true };

      expect(setIdentifier('Region', undefined, fields)).toBe(fields);
      expect(fields).toEqual({ UUIDIndicator: true });
    });
  });
});
