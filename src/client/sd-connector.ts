// ============================================================================
// SDConnector: callback convention
// ============================================================================
// Friendly query methods over the bound SD operations. Every method builds
// its field map and hands it to the resilient invoker; results and final
// errors arrive through a Node-style callback.
//
// Usage:
//   SDConnector.create({ username, password }, {}, (err, sd) => {
//     if (err || !sd) throw err;
//     sd.getDepartment({ institutionIdentifier: 'AB' }, (err, departments) => { ... });
//   });
// ============================================================================

import { getConfig } from '../config.js';
import { ResilientInvoker } from '../invoker/index.js';
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
  type DepartmentParentQuery,
  type DepartmentQuery,
  type EmploymentChangedAtDateQuery,
  type EmploymentChangedQuery,
  type EmploymentQuery,
  type InstitutionQuery,
  type OrganizationQuery,
  type PersonChangedAtDateQuery,
  type PersonQuery,
  type ProfessionQuery,
} from '../params/builders.js';
import { systemClock, type Clock } from '../params/types.js';
import {
  createOperationRegistry,
  descriptorUrls,
  QUERY_OPERATIONS,
  type Callback,
} from '../registry/index.js';
import { SoapTransport } from './transports.js';
import type { Credentials, SDConnectorOptions } from './types.js';

export class SDConnector {
  readonly invoker: ResilientInvoker;
  private readonly clock: Clock;

  private constructor(invoker: ResilientInvoker, clock: Clock) {
    this.invoker = invoker;
    this.clock = clock;
  }

  /**
   * Open every service descriptor and bind its operation. `done` receives the
   * connector once all operations are bound, or the first construction error.
   */
  static create(credentials: Credentials, options: SDConnectorOptions, done: Callback<SDConnector>): void {
    const config = getConfig();
    const transport =
      options.transport ??
      new SoapTransport({
        credentials,
        timeoutMs: options.timeoutMs ?? config.timeoutMs,
        sessions: options.sessions,
        logger: options.logger,
      });
    const locators = descriptorUrls(options.wsdlPrefix ?? config.wsdlPrefix, options.descriptors);

    createOperationRegistry(transport, locators, (err, registry) => {
      if (err || !registry) {
        done(err ?? new Error('Operation registry was not created'));
        return;
      }

      const invoker = new ResilientInvoker(registry, {
        retry: options.retry,
        schedule: options.schedule,
        logger: options.logger,
      });
      done(null, new SDConnector(invoker, options.clock ?? systemClock));
    });
  }

  // Organization
  // -------------

  getDepartment(query: DepartmentQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getDepartment, buildDepartmentParams(query, this.clock), done);
  }

  getDepartmentParent(query: DepartmentParentQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getDepartmentParent, buildDepartmentParentParams(query, this.clock), done);
  }

  getInstitution(query: InstitutionQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getInstitution, buildInstitutionParams(query), done);
  }

  getOrganization(query: OrganizationQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getOrganization, buildOrganizationParams(query, this.clock), done);
  }

  // Person and employment
  // ----------------------

  getEmployment(query: EmploymentQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getEmployment, buildEmploymentParams(query, this.clock), done);
  }

  getEmploymentChanged(query: EmploymentChangedQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getEmploymentChanged, buildEmploymentChangedParams(query, this.clock), done);
  }

  getEmploymentChangedAtDate(query: EmploymentChangedAtDateQuery, done: Callback<unknown>): void {
    this.invoker.call(
      QUERY_OPERATIONS.getEmploymentChangedAtDate,
      buildEmploymentChangedAtDateParams(query, this.clock),
      done
    );
  }

  getPerson(query: PersonQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getPerson, buildPersonParams(query, this.clock), done);
  }

  getPersonChangedAtDate(query: PersonChangedAtDateQuery, done: Callback<unknown>): void {
    this.invoker.call(
      QUERY_OPERATIONS.getPersonChangedAtDate,
      buildPersonChangedAtDateParams(query, this.clock),
      done
    );
  }

  // Profession
  // -----------

  getProfession(query: ProfessionQuery, done: Callback<unknown>): void {
    this.invoker.call(QUERY_OPERATIONS.getProfession, buildProfessionParams(query), done);
  }
}
