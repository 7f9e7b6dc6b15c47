// ============================================================================
// sd-connector/client: connectors and transports
// ============================================================================
//
// import { AsyncSDConnector } from 'sd-connector';
//
// const sd = await AsyncSDConnector.create({ username: 'user', password: 'secret' });
// const departments = await sd.getDepartment({ institutionIdentifier: 'AB' });
// await sd.close();
// ============================================================================

export { SDConnector } from './sd-connector.js';
export { AsyncSDConnector, withAsyncSDConnector } from './async-sd-connector.js';
export {
  SoapTransport,
  AsyncSoapTransport,
  listOperations,
  type ClientTransport,
  type AsyncClientTransport,
  type SoapTransportConfig,
} from './transports.js';
export {
  SessionCache,
  SoapSession,
  credentialKey,
  callbackSessions,
  asyncSessions,
  type SessionOptions,
} from './sessions.js';

export type {
  Credentials,
  ConnectorOptions,
  SDConnectorOptions,
  AsyncSDConnectorOptions,
} from './types.js';
