// ============================================================================
// Connector Types
// ============================================================================
// Options shared by SDConnector (callback convention) and AsyncSDConnector
// (promise convention).
// ============================================================================

import type { RetryPolicy, Schedule, Sleep } from '../invoker/retry.js';
import type { Clock } from '../params/types.js';
import type { SessionCache } from './sessions.js';
import type { AsyncClientTransport, ClientTransport } from './transports.js';

export type { Credentials } from './sessions.js';

export interface ConnectorOptions {
  /** Base URL the descriptor locators are relative to (default: SD_WSDL_PREFIX or the SD service) */
  wsdlPrefix?: string;
  /** Descriptor locators to bind (default: SERVICE_DESCRIPTORS) */
  descriptors?: readonly string[];
  /** Per-request timeout in ms (default: SD_TIMEOUT_MS or 60000) */
  timeoutMs?: number;
  /** Overrides for the retry policy (default: 7 attempts, 2s doubling) */
  retry?: Partial<RetryPolicy>;
  /** Source of "today" for defaulted dates */
  clock?: Clock;
  /** Session cache the default transport draws from */
  sessions?: SessionCache;
  /** Logger (defaults to no-op) */
  logger?: (msg: string) => void;
}

export interface SDConnectorOptions extends ConnectorOptions {
  /** Replaces the node-soap transport, e.g. with an in-process fake */
  transport?: ClientTransport;
  /** Timer used between retries */
  schedule?: Schedule;
}

export interface AsyncSDConnectorOptions extends ConnectorOptions {
  /** Replaces the node-soap transport, e.g. with an in-process fake */
  transport?: AsyncClientTransport;
  /** Delay used between retries */
  sleep?: Sleep;
}
