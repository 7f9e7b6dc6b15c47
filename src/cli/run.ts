import type { AsyncSDConnector } from '../client/async-sd-connector.js';
import type { QueryName } from '../registry/descriptors.js';
import { CliUsageError, optionalInstitution, requireInstitution, type CliArgs } from './args.js';

export type QueryRunner = Pick<AsyncSDConnector, QueryName>;

export type PreparedQuery = (connector: QueryRunner) => Promise<unknown>;

function employmentScope(args: CliArgs) {
  return {
    institutionIdentifier: requireInstitution(args),
    personCivilRegistrationIdentifier: args.personCivilRegistrationIdentifier,
    employmentIdentifier: args.employmentIdentifier,
    departmentIdentifier: args.departmentIdentifier,
    departmentLevelIdentifier: args.departmentLevelIdentifier,
  };
}

/**
 * Check the flags of the query named by `args` and build its input, passing
 * only the flags that query understands. Throws CliUsageError before any
 * connector exists; the returned function runs the query.
 */
export function prepareQuery(args: CliArgs): PreparedQuery {
  switch (args.query) {
    case 'getDepartment': {
      const query = {
        institutionIdentifier: optionalInstitution(args),
        departmentIdentifier: args.departmentIdentifier,
        departmentLevelIdentifier: args.departmentLevelIdentifier,
        startDate: args.startDate,
        endDate: args.endDate,
      };
      return connector => connector.getDepartment(query);
    }
    case 'getDepartmentParent': {
      if (args.departmentUuidIdentifier === undefined) {
        throw new CliUsageError('department-parent requires --department-uuid-identifier');
      }
      const query = {
        departmentUuidIdentifier: args.departmentUuidIdentifier,
        effectiveDate: args.effectiveDate,
      };
      return connector => connector.getDepartmentParent(query);
    }
    case 'getInstitution': {
      const query = {
        regionIdentifier: args.regionIdentifier,
        institutionIdentifier: optionalInstitution(args),
      };
      return connector => connector.getInstitution(query);
    }
    case 'getOrganization': {
      const query = {
        institutionIdentifier: optionalInstitution(args),
        startDate: args.startDate,
        endDate: args.endDate,
      };
      return connector => connector.getOrganization(query);
    }
    case 'getEmployment': {
      const query = { ...employmentScope(args), effectiveDate: args.effectiveDate };
      return connector => connector.getEmployment(query);
    }
    case 'getEmploymentChanged': {
      const query = { ...employmentScope(args), startDate: args.startDate, endDate: args.endDate };
      return connector => connector.getEmploymentChanged(query);
    }
    case 'getEmploymentChangedAtDate': {
      const query = {
        ...employmentScope(args),
        startDatetime: args.startDatetime,
        endDatetime: args.endDatetime,
      };
      return connector => connector.getEmploymentChangedAtDate(query);
    }
    case 'getPerson': {
      const query = { ...employmentScope(args), effectiveDate: args.effectiveDate };
      return connector => connector.getPerson(query);
    }
    case 'getPersonChangedAtDate': {
      const query = {
        ...employmentScope(args),
        startDatetime: args.startDatetime,
        endDatetime: args.endDatetime,
      };
      return connector => connector.getPersonChangedAtDate(query);
    }
    case 'getProfession': {
      const query = {
        institutionIdentifier: requireInstitution(args),
        jobPositionIdentifier: args.jobPositionIdentifier,
      };
      return connector => connector.getProfession(query);
    }
  }
}

/** Run the query named by `args` against `connector`. */
export async function runQuery(connector: QueryRunner, args: CliArgs): Promise<unknown> {
  return prepareQuery(args)(connector);
}
