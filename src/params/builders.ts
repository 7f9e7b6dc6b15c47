// ============================================================================
// Query Builders
// ============================================================================
// One builder per remote query. Each takes a loosely specified query struct,
// fills in defaults through its zod schema, and emits the exact field map the
// bound operation expects: identifiers first, then the temporal window, then
// indicator flags.
// ============================================================================

import { z } from 'zod';
import { warn } from '../config.js';
import { parseUuid, setIdentifier } from './identifiers.js';
import { formatDate, setDates, setDatetimes, today } from './temporal.js';
import { systemClock, type Clock, type FieldMap } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const flag = (fallback: boolean) => z.boolean().default(fallback);

const identifier = z.string().optional();

const EmploymentScope = {
  institutionIdentifier: z.string(),
  personCivilRegistrationIdentifier: z.string().optional(),
  employmentIdentifier: z.string().optional(),
  departmentIdentifier: z.string().optional(),
  departmentLevelIdentifier: z.string().optional(),
};

const EmploymentDetail = {
  departmentIndicator: flag(true),
  employmentStatusIndicator: flag(true),
  professionIndicator: flag(true),
  salaryAgreementIndicator: flag(false),
  salaryCodeGroupIndicator: flag(false),
  workingTimeIndicator: flag(false),
  uuidIndicator: flag(true),
};

export const DepartmentQuerySchema = z
  .object({
    institutionIdentifier: identifier,
    departmentIdentifier: identifier,
    departmentLevelIdentifier: z.string().optional(),
    startDate: z.date().optional(),
    endDate: z.date().optional(),
    contactInformationIndicator: flag(false),
    departmentNameIndicator: flag(true),
    employmentDepartmentIndicator: flag(false),
    postalAddressIndicator: flag(false),
    productionUnitIndicator: flag(false),
    uuidIndicator: flag(true),
  })
  .strict();

export const DepartmentParentQuerySchema = z
  .object({
    departmentUuidIdentifier: z.string(),
    effectiveDate: z.date().optional(),
  })
  .strict();

export const InstitutionQuerySchema = z
  .object({
    regionIdentifier: identifier,
    institutionIdentifier: identifier,
    administrationIndicator: flag(false),
    contactInformationIndicator: flag(false),
    postalAddressIndicator: flag(false),
    productionUnitIndicator: flag(false),
    uuidIndicator: flag(true),
  })
  .strict();

export const OrganizationQuerySchema = z
  .object({
    institutionIdentifier: identifier,
    startDate: z.date().optional(),
    endDate: z.date().optional(),
    uuidIndicator: flag(true),
  })
  .strict();

export const EmploymentQuerySchema = z
  .object({
    ...EmploymentScope,
    effectiveDate: z.date().optional(),
    statusActiveIndicator: flag(true),
    statusPassiveIndicator: flag(false),
    ...EmploymentDetail,
  })
  .strict();

export const EmploymentChangedQuerySchema = z
  .object({
    ...EmploymentScope,
    startDate: z.date().optional(),
    endDate: z.date().optional(),
    ...EmploymentDetail,
  })
  .strict();

export const EmploymentChangedAtDateQuerySchema = z
  .object({
    ...EmploymentScope,
    startDatetime: z.date().optional(),
    endDatetime: z.date().optional(),
    ...EmploymentDetail,
    futureInformationIndicator: flag(false),
  })
  .strict();

export const PersonQuerySchema = z
  .object({
    ...EmploymentScope,
    effectiveDate: z.date().optional(),
    statusActiveIndicator: flag(true),
    statusPassiveIndicator: flag(false),
    contactInformationIndicator: flag(false),
    postalAddressIndicator: flag(false),
  })
  .strict();

export const PersonChangedAtDateQuerySchema = z
  .object({
    ...EmploymentScope,
    startDatetime: z.date().optional(),
    endDatetime: z.date().optional(),
    contactInformationIndicator: flag(false),
    postalAddressIndicator: flag(false),
  })
  .strict();

export const ProfessionQuerySchema = z
  .object({
    institutionIdentifier: z.string(),
    jobPositionIdentifier: z.string().optional(),
  })
  .strict();

export type DepartmentQuery = z.input<typeof DepartmentQuerySchema>;
export type DepartmentParentQuery = z.input<typeof DepartmentParentQuerySchema>;
export type InstitutionQuery = z.input<typeof InstitutionQuerySchema>;
export type OrganizationQuery = z.input<typeof OrganizationQuerySchema>;
export type EmploymentQuery = z.input<typeof EmploymentQuerySchema>;
export type EmploymentChangedQuery = z.input<typeof EmploymentChangedQuerySchema>;
export type EmploymentChangedAtDateQuery = z.input<typeof EmploymentChangedAtDateQuerySchema>;
export type PersonQuery = z.input<typeof PersonQuerySchema>;
export type PersonChangedAtDateQuery = z.input<typeof PersonChangedAtDateQuerySchema>;
export type ProfessionQuery = z.input<typeof ProfessionQuerySchema>;

// ============================================================================
// Helpers
// ============================================================================

function setOptional(fields: FieldMap, name: string, value: string | undefined): void {
  if (value !== undefined) fields[name] = value;
}

// Presence of the field, not an empty value, is what narrows the query
function setDepartmentLevel(fields: FieldMap, value: string | undefined): void {
  if (value) fields.DepartmentLevelIdentifier = value;
}

function setEmploymentScope(
  fields: FieldMap,
  scope: {
    institutionIdentifier: string;
    personCivilRegistrationIdentifier?: string;
    employmentIdentifier?: string;
    departmentIdentifier?: string;
    departmentLevelIdentifier?: string;
  }
): void {
  fields.InstitutionIdentifier = scope.institutionIdentifier;
  setOptional(fields, 'PersonCivilRegistrationIdentifier', scope.personCivilRegistrationIdentifier);
  setOptional(fields, 'EmploymentIdentifier', scope.employmentIdentifier);
  setOptional(fields, 'DepartmentIdentifier', scope.departmentIdentifier);
  setDepartmentLevel(fields, scope.departmentLevelIdentifier);
}

function setEmploymentDetail(
  fields: FieldMap,
  detail: {
    departmentIndicator: boolean;
    employmentStatusIndicator: boolean;
    professionIndicator: boolean;
    salaryAgreementIndicator: boolean;
    salaryCodeGroupIndicator: boolean;
    workingTimeIndicator: boolean;
    uuidIndicator: boolean;
  }
): void {
  fields.DepartmentIndicator = detail.departmentIndicator;
  fields.EmploymentStatusIndicator = detail.employmentStatusIndicator;
  fields.ProfessionIndicator = detail.professionIndicator;
  fields.SalaryAgreementIndicator = detail.salaryAgreementIndicator;
  fields.SalaryCodeGroupIndicator = detail.salaryCodeGroupIndicator;
  fields.WorkingTimeIndicator = detail.workingTimeIndicator;
  fields.UUIDIndicator = detail.uuidIndicator;
}

// ============================================================================
// Organization
// ============================================================================

export function buildDepartmentParams(query: DepartmentQuery = {}, clock: Clock = systemClock): FieldMap {
  const q = DepartmentQuerySchema.parse(query);
  const fields: FieldMap = {};

  setIdentifier('Institution', q.institutionIdentifier, fields);
  setIdentifier('Department', q.departmentIdentifier, fields);
  setDepartmentLevel(fields, q.departmentLevelIdentifier);
  setDates(q.startDate, q.endDate, fields, clock);

  fields.ContactInformationIndicator = q.contactInformationIndicator;
  fields.DepartmentNameIndicator = q.departmentNameIndicator;
  fields.EmploymentDepartmentIndicator = q.employmentDepartmentIndicator;
  fields.PostalAddressIndicator = q.postalAddressIndicator;
  fields.ProductionUnitIndicator = q.productionUnitIndicator;
  fields.UUIDIndicator = q.uuidIndicator;
  return fields;
}

export function buildDepartmentParentParams(query: DepartmentParentQuery, clock: Clock = systemClock): FieldMap {
  const q = DepartmentParentQuerySchema.parse(query);

  const uuid = parseUuid(q.departmentUuidIdentifier);
  if (uuid === null) {
    warn(`builders: department parent lookup with non-UUID identifier "${q.departmentUuidIdentifier}"`);
  }

  return {
    EffectiveDate: formatDate(q.effectiveDate ?? today(clock)),
    DepartmentUUIDIdentifier: uuid ?? q.departmentUuidIdentifier,
  };
}

export function buildInstitutionParams(query: InstitutionQuery = {}): FieldMap {
  const q = InstitutionQuerySchema.parse(query);
  const fields: FieldMap = {};

  setIdentifier('Region', q.regionIdentifier, fields);
  setIdentifier('Institution', q.institutionIdentifier, fields);

  fields.AdministrationIndicator = q.administrationIndicator;
  fields.ContactInformationIndicator = q.contactInformationIndicator;
  fields.PostalAddressIndicator = q.postalAddressIndicator;
  fields.ProductionUnitIndicator = q.productionUnitIndicator;
  fields.UUIDIndicator = q.uuidIndicator;
  return fields;
}

export function buildOrganizationParams(query: OrganizationQuery = {}, clock: Clock = systemClock): FieldMap {
  const q = OrganizationQuerySchema.parse(query);
  const fields: FieldMap = {};

  setIdentifier('Institution', q.institutionIdentifier, fields);
  setDates(q.startDate, q.endDate, fields, clock);
  fields.UUIDIndicator = q.uuidIndicator;
  return fields;
}

// ============================================================================
// Person and employment
// ============================================================================

export function buildEmploymentParams(query: EmploymentQuery, clock: Clock = systemClock): FieldMap {
  const q = EmploymentQuerySchema.parse(query);
  const fields: FieldMap = {};

  setEmploymentScope(fields, q);
  fields.EffectiveDate = formatDate(q.effectiveDate ?? today(clock));
  fields.StatusActiveIndicator = q.statusActiveIndicator;
  fields.StatusPassiveIndicator = q.statusPassiveIndicator;
  setEmploymentDetail(fields, q);
  return fields;
}

export function buildEmploymentChangedParams(query: EmploymentChangedQuery, clock: Clock = systemClock): FieldMap {
  const q = EmploymentChangedQuerySchema.parse(query);
  const fields: FieldMap = {};

  setEmploymentScope(fields, q);
  setDates(q.startDate, q.endDate, fields, clock);
  setEmploymentDetail(fields, q);
  return fields;
}

export function buildEmploymentChangedAtDateParams(
  query: EmploymentChangedAtDateQuery,
  clock: Clock = systemClock
): FieldMap {
  const q = EmploymentChangedAtDateQuerySchema.parse(query);
  const fields: FieldMap = {};

  setEmploymentScope(fields, q);
  setDatetimes(q.startDatetime, q.endDatetime, fields, clock);
  setEmploymentDetail(fields, q);
  fields.FutureInformationIndicator = q.futureInformationIndicator;
  return fields;
}

export function buildPersonParams(query: PersonQuery, clock: Clock = systemClock): FieldMap {
  const q = PersonQuerySchema.parse(query);
  const fields: FieldMap = {};

  setEmploymentScope(fields, q);
  fields.EffectiveDate = formatDate(q.effectiveDate ?? today(clock));
  fields.StatusActiveIndicator = q.statusActiveIndicator;
  fields.StatusPassiveIndicator = q.statusPassiveIndicator;
  fields.ContactInformationIndicator = q.contactInformationIndicator;
  fields.PostalAddressIndicator = q.postalAddressIndicator;
  return fields;
}

export function buildPersonChangedAtDateParams(
  query: PersonChangedAtDateQuery,
  clock: Clock = systemClock
): FieldMap {
  const q = PersonChangedAtDateQuerySchema.parse(query);
  const fields: FieldMap = {};

  setEmploymentScope(fields, q);
  setDatetimes(q.startDatetime, q.endDatetime, fields, clock);
  fields.ContactInformationIndicator = q.contactInformationIndicator;
  fields.PostalAddressIndicator = q.postalAddressIndicator;
  return fields;
}

// ============================================================================
// Profession
// ============================================================================

export function buildProfessionParams(query: ProfessionQuery): FieldMap {
  const q = ProfessionQuerySchema.parse(query);
  const fields: FieldMap = { InstitutionIdentifier: q.institutionIdentifier };

  setOptional(fields, 'JobPositionIdentifier', q.jobPositionIdentifier);
  return fields;
}
