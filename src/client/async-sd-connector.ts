// ============================================================================
// AsyncSDConnector: promise convention
// ============================================================================
// Same queries as SDConnector, but every method returns a promise and the
// connector holds a keep-alive session that must be released with close().
//
// Usage:
//   const sd = await AsyncSDConnector.create({ username, password });
//   try {
//     const person = await sd.getPerson({ institutionIdentifier: 'AB' });
//   } finally {
//     await sd.close();
//   }
// ============================================================================

import { getConfig, log } from '../config.js';
import { ConnectorClosedError } from '../errors.js';
import { AsyncResilientInvoker } from '../invoker/index.js';
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
import { systemClock, type Clock, type FieldMap } from '../params/types.js';
import {
  createAsyncOperationRegistry,
  descriptorUrls,
  QUERY_OPERATIONS,
  type AsyncOperation,
  type OperationRegistry,
  type QueryName,
} from '../registry/index.js';
import { AsyncSoapTransport, type AsyncClientTransport } from './transports.js';
import type { AsyncSDConnectorOptions, Credentials } from './types.js';

export class AsyncSDConnector {
  readonly invoker: AsyncResilientInvoker;
  private readonly transport: AsyncClientTransport;
  private readonly clock: Clock;
  private closed = false;

  private constructor(invoker: AsyncResilientInvoker, transport: AsyncClientTransport, clock: Clock) {
    this.invoker = invoker;
    this.transport = transport;
    this.clock = clock;
  }

  /**
   * Open every service descriptor and bind its operation. If binding fails
   * the session acquired for it is released before the error propagates.
   */
  static async create(credentials: Credentials, options: AsyncSDConnectorOptions = {}): Promise<AsyncSDConnector> {
    const config = getConfig();
    const transport =
      options.transport ??
      new AsyncSoapTransport({
        credentials,
        timeoutMs: options.timeoutMs ?? config.timeoutMs,
        sessions: options.sessions,
        logger: options.logger,
      });
    const locators = descriptorUrls(options.wsdlPrefix ?? config.wsdlPrefix, options.descriptors);

    let registry: OperationRegistry<AsyncOperation>;
    try {
      registry = await createAsyncOperationRegistry(transport, locators);
    } catch (err) {
      try {
        await transport.release();
      } catch (releaseErr) {
        log(`connector: release after failed construction also failed: ${releaseErr instanceof Error ? releaseErr.message : releaseErr}`);
      }
      throw err;
    }

    const invoker = new AsyncResilientInvoker(registry, {
      retry: options.retry,
      sleep: options.sleep,
      logger: options.logger,
    });
    return new AsyncSDConnector(invoker, transport, options.clock ?? systemClock);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Release the shared session. Errors from the release propagate. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.release();
  }

  /** Queries after close() reject without building params or calling out. */
  private async run(query: QueryName, build: () => FieldMap): Promise<unknown> {
    if (this.closed) throw new ConnectorClosedError(query);
    return this.invoker.call(QUERY_OPERATIONS[query], build());
  }

  // Organization
  // -------------

  async getDepartment(query: DepartmentQuery = {}): Promise<unknown> {
    return this.run('getDepartment', () => buildDepartmentParams(query, this.clock));
  }

  async getDepartmentParent(query: DepartmentParentQuery): Promise<unknown> {
    return this.run('getDepartmentParent', () => buildDepartmentParentParams(query, this.clock));
  }

  async getInstitution(query: InstitutionQuery = {}): Promise<unknown> {
    return this.run('getInstitution', () => buildInstitutionParams(query));
  }

  async getOrganization(query: OrganizationQuery = {}): Promise<unknown> {
    return this.run('getOrganization', () => buildOrganizationParams(query, this.clock));
  }

  // Person and employment
  // ----------------------

  async getEmployment(query: EmploymentQuery): Promise<unknown> {
    return this.run('getEmployment', () => buildEmploymentParams(query, this.clock));
  }

  async getEmploymentChanged(query: EmploymentChangedQuery): Promise<unknown> {
    return this.run('getEmploymentChanged', () => buildEmploymentChangedParams(query, this.clock));
  }

  async getEmploymentChangedAtDate(query: EmploymentChangedAtDateQuery): Promise<unknown> {
    return this.run('getEmploymentChangedAtDate', () => buildEmploymentChangedAtDateParams(query, this.clock));
  }

  async getPerson(query: PersonQuery): Promise<unknown> {
    return this.run('getPerson', () => buildPersonParams(query, this.clock));
  }

  async getPersonChangedAtDate(query: PersonChangedAtDateQuery): Promise<unknown> {
    return this.run('getPersonChangedAtDate', () => buildPersonChangedAtDateParams(query, this.clock));
  }

  // Profession
  // -----------

  async getProfession(query: ProfessionQuery): Promise<unknown> {
    return this.run('getProfession', () => buildProfessionParams(query));
  }
}

/**
 * Run `fn` with a connector that is closed afterwards, whether `fn` resolves
 * or throws.
 */
export async function withAsyncSDConnector<T>(
  credentials: Credentials,
  fn: (connector: AsyncSDConnector) => Promise<T>,
  options: AsyncSDConnectorOptions = {}
): Promise<T> {
  const connector = await AsyncSDConnector.create(credentials, options);
  try {
    return await fn(connector);
  } finally {
    await connector.close();
  }
}
