import { describe, it, expect, afterEach, vi } from 'vitest';
import { ZodError } from 'zod';
import {
  buildDepartmentParams,
  buildDepartmentParentParams,
  buildEmploymentChangedAtDateParams,
  buildEmploymentChangedParams,
  buildEmploymentParams,
  buildInstitutionParams,
  buildOrganizationParams,
  buildPersonChangedAtDateParams,
  buildPersonParams,
  buildProfessionParams,
} from '../../src/params/builders.js';

const clock = () => new Date(2024, 2, 15, 10, 30, 0);
const UUID = '3b4ce7a2-1d8b-4f0e-9c3e-2a5b6c7d8e9f';

const EMPLOYMENT_DETAIL = {
  DepartmentIndicator: true,
  EmploymentStatusIndicator: true,
  ProfessionIndicator: true,
  SalaryAgreementIndicator: false,
  SalaryCodeGroupIndicator: false,
  WorkingTimeIndicator: false,
  UUIDIndicator: true,
};

describe('Query builders', () => {
  // ==========================================================================
  // Organization
  // ==========================================================================

  describe('buildDepartmentParams', () => {
    it('should fill in the window and indicator defaults', () => {
      const fields = buildDepartmentParams({ institutionIdentifier: 'AB' }, clock);

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        ActivationDate: '2024-03-15',
        DeactivationDate: '2024-03-15',
        ContactInformationIndicator: false,
        DepartmentNameIndicator: true,
        EmploymentDepartmentIndicator: false,
        PostalAddressIndicator: false,
        ProductionUnitIndicator: false,
        UUIDIndicator: true,
      });
      expect(Object.keys(fields).slice(0, 3)).toEqual(['InstitutionIdentifier', 'ActivationDate', 'DeactivationDate']);
    });

    it('should route UUIDs and codes to their own slots', () => {
      const fields = buildDepartmentParams(
        { institutionIdentifier: UUID.toUpperCase(), departmentIdentifier: 'XY12', departmentLevelIdentifier: 'NY1' },
        clock
      );

      expect(Object.keys(fields).slice(0, 4)).toEqual([
        'InstitutionUUIDIdentifier',
        'DepartmentIdentifier',
        'DepartmentLevelIdentifier',
        'ActivationDate',
      ]);
      expect(fields.InstitutionUUIDIdentifier).toBe(UUID);
      expect(fields.DepartmentLevelIdentifier).toBe('NY1');
    });

    it('should omit an empty department level', () => {
      const fields = buildDepartmentParams({ departmentLevelIdentifier: '' }, clock);

      expect(fields).not.toHaveProperty('DepartmentLevelIdentifier');
    });

    it('should omit identifier slots that were not given', () => {
      const fields = buildDepartmentParams({}, clock);

      expect(Object.keys(fields)[0]).toBe('ActivationDate');
    });

    it('should honour explicit indicators and dates', () => {
      const fields = buildDepartmentParams(
        { startDate: new Date(2020, 0, 1), postalAddressIndicator: true, uuidIndicator: false },
        clock
      );

      expect(fields.ActivationDate).toBe('2020-01-01');
      expect(fields.DeactivationDate).toBe('2024-03-15');
      expect(fields.PostalAddressIndicator).toBe(true);
      expect(fields.UUIDIndicator).toBe(false);
    });

    it('should reject unknown query keys', () => {
      const query = { institutionIdentifier: 'AB', colour: 'red' };

      expect(() => buildDepartmentParams(query, clock)).toThrow(ZodError);
    });
  });

  describe('buildDepartmentParentParams', () => {
    it('should put the effective date first and normalize the UUID', () => {
      const fields = buildDepartmentParentParams({ departmentUuidIdentifier: `{${UUID.toUpperCase()}}` }, clock);

      expect(fields).toEqual({ EffectiveDate: '2024-03-15', DepartmentUUIDIdentifier: UUID });
      expect(Object.keys(fields)).toEqual(['EffectiveDate', 'DepartmentUUIDIdentifier']);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should pass a non-UUID through as given and warn', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const fields = buildDepartmentParentParams(
        { departmentUuidIdentifier: 'XY12', effectiveDate: new Date(2023, 6, 1) },
        clock
      );

      expect(fields).toEqual({ EffectiveDate: '2023-07-01', DepartmentUUIDIdentifier: 'XY12' });
      expect(spy).toHaveBeenCalledWith(
        '[sd-connector] builders: department parent lookup with non-UUID identifier "XY12"'
      );
    });
  });

  describe('buildInstitutionParams', () => {
    it('should produce only indicators for an empty query', () => {
      expect(buildInstitutionParams()).toEqual({
        AdministrationIndicator: false,
        ContactInformationIndicator: false,
        PostalAddressIndicator: false,
        ProductionUnitIndicator: false,
        UUIDIndicator: true,
      });
    });

    it('should place region before institution', () => {
      const fields = buildInstitutionParams({ institutionIdentifier: UUID, regionIdentifier: 'RR' });

      expect(Object.keys(fields).slice(0, 2)).toEqual(['RegionIdentifier', 'InstitutionUUIDIdentifier']);
    });
  });

  describe('buildOrganizationParams', () => {
    it('should emit identifier, window, then UUID indicator', () => {
      const fields = buildOrganizationParams({ institutionIdentifier: 'AB' }, clock);

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        ActivationDate: '2024-03-15',
        DeactivationDate: '2024-03-15',
        UUIDIndicator: true,
      });
      expect(Object.keys(fields)).toEqual(['InstitutionIdentifier', 'ActivationDate', 'DeactivationDate', 'UUIDIndicator']);
    });
  });

  // ==========================================================================
  // Person and employment
  // ==========================================================================

  describe('buildEmploymentParams', () => {
    it('should emit scope, effective date, status and detail flags in order', () => {
      const fields = buildEmploymentParams(
        { institutionIdentifier: 'AB', personCivilRegistrationIdentifier: '0101010000' },
        clock
      );

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        PersonCivilRegistrationIdentifier: '0101010000',
        EffectiveDate: '2024-03-15',
        StatusActiveIndicator: true,
        StatusPassiveIndicator: false,
        ...EMPLOYMENT_DETAIL,
      });
      expect(Object.keys(fields).slice(0, 4)).toEqual([
        'InstitutionIdentifier',
        'PersonCivilRegistrationIdentifier',
        'EffectiveDate',
        'StatusActiveIndicator',
      ]);
    });

    it('should send the institution as given, even when it is a UUID', () => {
      const fields = buildEmploymentParams({ institutionIdentifier: UUID }, clock);

      expect(fields.InstitutionIdentifier).toBe(UUID);
      expect(fields).not.toHaveProperty('InstitutionUUIDIdentifier');
    });
  });

  describe('buildEmploymentChangedParams', () => {
    it('should use a date window', () => {
      const fields = buildEmploymentChangedParams(
        { institutionIdentifier: 'AB', employmentIdentifier: '00042', startDate: new Date(2024, 0, 1) },
        clock
      );

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        EmploymentIdentifier: '00042',
        ActivationDate: '2024-01-01',
        DeactivationDate: '2024-03-15',
        ...EMPLOYMENT_DETAIL,
      });
    });
  });

  describe('buildEmploymentChangedAtDateParams', () => {
    it('should use a datetime window and end with the future flag', () => {
      const fields = buildEmploymentChangedAtDateParams({ institutionIdentifier: 'AB' }, clock);

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        ActivationDate: '2024-03-15',
        ActivationTime: '00:00:00',
        DeactivationDate: '2024-03-15',
        DeactivationTime: '23:59:59',
        ...EMPLOYMENT_DETAIL,
        FutureInformationIndicator: false,
      });
      expect(Object.keys(fields).at(-1)).toBe('FutureInformationIndicator');
    });
  });

  describe('buildPersonParams', () => {
    it('should emit scope, effective date, status and person flags', () => {
      const fields = buildPersonParams({ institutionIdentifier: 'AB', departmentIdentifier: 'XY12' }, clock);

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        DepartmentIdentifier: 'XY12',
        EffectiveDate: '2024-03-15',
        StatusActiveIndicator: true,
        StatusPassiveIndicator: false,
        ContactInformationIndicator: false,
        PostalAddressIndicator: false,
      });
    });
  });

  describe('buildPersonChangedAtDateParams', () => {
    it('should use a datetime window', () => {
      const fields = buildPersonChangedAtDateParams(
        {
          institutionIdentifier: 'AB',
          startDatetime: new Date(2024, 2, 14, 6, 0, 0),
          endDatetime: new Date(2024, 2, 14, 18, 0, 0),
          contactInformationIndicator: true,
        },
        clock
      );

      expect(fields).toEqual({
        InstitutionIdentifier: 'AB',
        ActivationDate: '2024-03-14',
        ActivationTime: '06:00:00',
        DeactivationDate: '2024-03-14',
        DeactivationTime: '18:00:00',
        ContactInformationIndicator: true,
        PostalAddressIndicator: false,
      });
    });
  });

  // ==========================================================================
  // Profession
  // ==========================================================================

  describe('buildProfessionParams', () => {
    it('should emit the institution alone by default', () => {
      expect(buildProfessionParams({ institutionIdentifier: 'AB' })).toEqual({ InstitutionIdentifier: 'AB' });
    });

    it('should add a job position when given', () => {
      expect(buildProfessionParams({ institutionIdentifier: 'AB', jobPositionIdentifier: '9000' })).toEqual({
        InstitutionIdentifier: 'AB',
        JobPositionIdentifier: '9000',
      });
    });
  });

  // ==========================================================================
  // Purity
  // ==========================================================================

  describe('purity', () => {
    it('should build equal maps from equal input and leave the input alone', () => {
      const query = { institutionIdentifier: 'AB', employmentIdentifier: '00042' };
      const first = buildEmploymentParams(query, clock);
      const second = buildEmploymentParams(query, clock);

      expect(first).toEqual(second);
      expect(first).not.toBe(second);
      expect(query).toEqual({ institutionIdentifier: 'AB', employmentIdentifier: '00042' });
    });
  });
});
