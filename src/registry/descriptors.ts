// ============================================================================
// Service Descriptors
// ============================================================================
// Every WSDL the client binds at startup, relative to the WSDL prefix.
// Superseded versions are bound alongside the current ones so that a renamed
// or withdrawn descriptor fails construction loudly, but only the dated
// versions in OPERATION_NAMES are reachable through the connectors.
// ============================================================================

export const SERVICE_DESCRIPTORS: readonly string[] = [
  'GetDepartment20080201WSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetDepartment20111201.wsdl',
  'xml/schema/sd.dk/xml.wsdl/20190701/GetDepartmentParent20190701.wsdl',
  'GetInstitution20080201WSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetInstitution20111201.wsdl',
  'GetOrganizationWSDL',
  'GetOrganization20080201WSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetOrganization20111201.wsdl',
  'GetEmployment20070401WSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetEmployment20111201.wsdl',
  'GetEmploymentChanged20070401WSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetEmploymentChanged20111201.wsdl',
  'GetEmploymentChangedAtDate20070401WSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetEmploymentChangedAtDate20111201.wsdl',
  'GetPersonWSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetPerson20111201.wsdl',
  'GetPersonChangedAtDateWSDL',
  'xml/schema/sd.dk/xml.wsdl/20111201/GetPersonChangedAtDate20111201.wsdl',
  'GetProfessionWSDL',
  'GetProfession20080201WSDL',
];

/** Canonical names of the operations the connectors dispatch to. */
export const OPERATION_NAMES = [
  'GetDepartment20111201',
  'GetDepartmentParent20190701',
  'GetInstitution20111201',
  'GetOrganization20111201',
  'GetEmployment20111201',
  'GetEmploymentChanged20111201',
  'GetEmploymentChangedAtDate20111201',
  'GetPerson20111201',
  'GetPersonChangedAtDate20111201',
  'GetProfession20080201',
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

/** Connector method → canonical operation it calls. */
export const QUERY_OPERATIONS = {
  getDepartment: 'GetDepartment20111201',
  getDepartmentParent: 'GetDepartmentParent20190701',
  getInstitution: 'GetInstitution20111201',
  getOrganization: 'GetOrganization20111201',
  getEmployment: 'GetEmployment20111201',
  getEmploymentChanged: 'GetEmploymentChanged20111201',
  getEmploymentChangedAtDate: 'GetEmploymentChangedAtDate20111201',
  getPerson: 'GetPerson20111201',
  getPersonChangedAtDate: 'GetPersonChangedAtDate20111201',
  getProfession: 'GetProfession20080201',
} as const satisfies Record<string, OperationName>;

export type QueryName = keyof typeof QUERY_OPERATIONS;

/** Advertised operation names carry this suffix; canonical names do not. */
export const OPERATION_SUFFIX = 'Operation';

export function descriptorUrls(prefix: string, descriptors: readonly string[] = SERVICE_DESCRIPTORS): string[] {
  const base = prefix.endsWith('/') ? prefix : `${prefix}/`;
  return descriptors.map(d => base + d);
}
