// ============================================================================
// CLI Arguments
// ============================================================================
// Argument parsing for `sd-connector <query> [options]`, kept apart from the
// entry point so it can be exercised without a network.
// ============================================================================

import { parseUuid } from '../params/identifiers.js';
import type { QueryName } from '../registry/descriptors.js';

export const CLI_QUERIES: Record<string, QueryName> = {
  department: 'getDepartment',
  'department-parent': 'getDepartmentParent',
  institution: 'getInstitution',
  organization: 'getOrganization',
  employment: 'getEmployment',
  'employment-changed': 'getEmploymentChanged',
  'employment-changed-at-date': 'getEmploymentChangedAtDate',
  person: 'getPerson',
  'person-changed-at-date': 'getPersonChangedAtDate',
  profession: 'getProfession',
};

export interface CliArgs {
  query: QueryName;
  institutionIdentifier?: string;
  institutionUuidIdentifier?: string;
  regionIdentifier?: string;
  departmentIdentifier?: string;
  departmentUuidIdentifier?: string;
  departmentLevelIdentifier?: string;
  personCivilRegistrationIdentifier?: string;
  employmentIdentifier?: string;
  jobPositionIdentifier?: string;
  effectiveDate?: Date;
  startDate?: Date;
  endDate?: Date;
  startDatetime?: Date;
  endDatetime?: Date;
  username?: string;
  password?: string;
  configPath?: string;
  wsdlPrefix?: string;
  timeoutMs?: number;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

/** `YYYY-MM-DD` as local midnight. */
export function parseLocalDate(value: string, flag: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new CliUsageError(`${flag} expects YYYY-MM-DD, got "${value}"`);
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    throw new CliUsageError(`${flag} is not a calendar date: "${value}"`);
  }
  return date;
}

/** `YYYY-MM-DDTHH:MM[:SS]` as local time. */
export function parseLocalDatetime(value: string, flag: string): Date {
  const match = DATETIME_PATTERN.exec(value);
  if (!match) {
    throw new CliUsageError(`${flag} expects YYYY-MM-DDTHH:MM:SS, got "${value}"`);
  }
  const [, year, month, day, hours, minutes, seconds] = match;
  const date = parseLocalDate(`${year}-${month}-${day}`, flag);
  date.setHours(Number(hours), Number(minutes), Number(seconds ?? '0'));
  return date;
}

function optionValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function dateOption(args: string[], flag: string): Date | undefined {
  const value = optionValue(args, flag);
  return value === undefined ? undefined : parseLocalDate(value, flag);
}

function datetimeOption(args: string[], flag: string): Date | undefined {
  const value = optionValue(args, flag);
  return value === undefined ? undefined : parseLocalDatetime(value, flag);
}

/**
 * Parse argv (without the node and script entries).
 */
export function parseCliArgs(args: string[]): CliArgs {
  const [command] = args;
  if (command === undefined || command.startsWith('--')) {
    throw new CliUsageError(`Missing query. One of: ${Object.keys(CLI_QUERIES).join(', ')}`);
  }
  const query = CLI_QUERIES[command];
  if (query === undefined) {
    throw new CliUsageError(`Unknown query "${command}". One of: ${Object.keys(CLI_QUERIES).join(', ')}`);
  }

  const institutionUuidIdentifier = optionValue(args, '--institution-uuid-identifier');
  if (institutionUuidIdentifier !== undefined && parseUuid(institutionUuidIdentifier) === null) {
    throw new CliUsageError(`--institution-uuid-identifier is not a UUID: "${institutionUuidIdentifier}"`);
  }

  const timeout = optionValue(args, '--timeout-ms');
  const timeoutMs = timeout === undefined ? undefined : parseInt(timeout, 10);
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new CliUsageError(`--timeout-ms expects a positive integer, got "${timeout}"`);
  }

  return {
    query,
    institutionIdentifier: optionValue(args, '--institution-identifier'),
    institutionUuidIdentifier,
    regionIdentifier: optionValue(args, '--region-identifier'),
    departmentIdentifier: optionValue(args, '--department-identifier'),
    departmentUuidIdentifier: optionValue(args, '--department-uuid-identifier'),
    departmentLevelIdentifier: optionValue(args, '--department-level-identifier'),
    personCivilRegistrationIdentifier: optionValue(args, '--cpr'),
    employmentIdentifier: optionValue(args, '--employment-identifier'),
    jobPositionIdentifier: optionValue(args, '--job-position-identifier'),
    effectiveDate: dateOption(args, '--effective-date'),
    startDate: dateOption(args, '--start-date'),
    endDate: dateOption(args, '--end-date'),
    startDatetime: datetimeOption(args, '--start-datetime'),
    endDatetime: datetimeOption(args, '--end-datetime'),
    username: optionValue(args, '--username'),
    password: optionValue(args, '--password'),
    configPath: optionValue(args, '--config'),
    wsdlPrefix: optionValue(args, '--wsdl-prefix'),
    timeoutMs,
  };
}

/** Institution from either flag. At most one of the two may be given. */
export function optionalInstitution(args: CliArgs): string | undefined {
  const { institutionIdentifier, institutionUuidIdentifier } = args;
  if (institutionIdentifier !== undefined && institutionUuidIdentifier !== undefined) {
    throw new CliUsageError('Only one of --institution-identifier or --institution-uuid-identifier may be set');
  }
  return institutionIdentifier ?? institutionUuidIdentifier;
}

/** Institution for queries that cannot run without one. */
export function requireInstitution(args: CliArgs): string {
  const institution = optionalInstitution(args);
  if (institution === undefined) {
    throw new CliUsageError('One of --institution-identifier or --institution-uuid-identifier must be set');
  }
  return institution;
}
