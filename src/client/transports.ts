// ============================================================================
// SOAP Transports
// ============================================================================
// node-soap glue for the two calling conventions. Each transport opens a WSDL
// with the credential pair's shared session and reports the operations it
// advertises:
//   - SoapTransport:      createClient + callback operation methods
//   - AsyncSoapTransport: createClientAsync + *Async operation methods
// ============================================================================

import { createClient, createClientAsync, type Client, type IOptions } from 'soap';
import { getConfig, log } from '../config.js';
import type { AsyncDescriptorOpener, DescriptorOpener } from '../registry/index.js';
import type {
  AsyncOperation,
  Callback,
  CallbackOperation,
  OpenedDescriptor,
} from '../registry/types.js';
import { asyncSessions, callbackSessions, type Credentials, type SessionCache, type SoapSession } from './sessions.js';

// ============================================================================
// Transport Interfaces
// ============================================================================

/** Callback-convention transport. Its session needs no explicit release. */
export type ClientTransport = DescriptorOpener;

/** Promise-convention transport. Must be released once no more calls will be made. */
export interface AsyncClientTransport extends AsyncDescriptorOpener {
  release(): Promise<void>;
}

export interface SoapTransportConfig {
  credentials: Credentials;
  /** Per-request timeout in ms (default: SD_TIMEOUT_MS or 60000) */
  timeoutMs?: number;
  /** Session cache to draw from (default: the convention's shared cache) */
  sessions?: SessionCache;
  logger?: (msg: string) => void;
}

// ============================================================================
// Descriptor inspection
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Operation names from a node-soap `describe()` tree
 * (service → port → operation). A WSDL that offers SOAP 1.1 and 1.2 ports
 * lists each operation once per port; names are deduplicated.
 */
export function listOperations(description: unknown): string[] {
  const names = new Set<string>();
  if (!isRecord(description)) return [];

  for (const service of Object.values(description)) {
    if (!isRecord(service)) continue;
    for (const port of Object.values(service)) {
      if (!isRecord(port)) continue;
      for (const operation of Object.keys(port)) {
        names.add(operation);
      }
    }
  }
  return [...names];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function clientOptions(session: SoapSession): IOptions {
  return { request: session.request };
}

// node-soap resolves async methods to [result, rawResponse, soapHeader, rawRequest]
function unwrapAsyncResponse(response: unknown): unknown {
  return Array.isArray(response) ? response[0] : response;
}

// ============================================================================
// Callback Transport
// ============================================================================

export class SoapTransport implements ClientTransport {
  private readonly session: SoapSession;
  private readonly logger?: (msg: string) => void;

  constructor(config: SoapTransportConfig) {
    const sessions = config.sessions ?? callbackSessions;
    this.session = sessions.acquire(config.credentials, config.timeoutMs ?? getConfig().timeoutMs);
    this.logger = config.logger;
  }

  open(locator: string, done: Callback<OpenedDescriptor<CallbackOperation>>): void {
    this.logger?.(`Opening ${locator}`);

    createClient(locator, clientOptions(this.session), (err, client) => {
      if (err || !client) {
        done(toError(err ?? `No client for ${locator}`));
        return;
      }

      const operations = new Map<string, CallbackOperation>();
      for (const name of listOperations(client.describe())) {
        const method: unknown = Reflect.get(client, name);
        if (typeof method !== 'function') continue;

        operations.set(name, (fields, callback) => {
          method.call(client, fields, (callErr: unknown, result: unknown) => {
            if (callErr) {
              callback(toError(callErr));
              return;
            }
            callback(null, result);
          });
        });
      }

      log(`transport: ${locator} advertises [${[...operations.keys()].join(', ')}]`);
      done(null, { locator, operations });
    });
  }
}

// ============================================================================
// Async Transport
// ============================================================================

export class AsyncSoapTransport implements AsyncClientTransport {
  private readonly credentials: Credentials;
  private readonly sessions: SessionCache;
  private readonly session: SoapSession;
  private readonly logger?: (msg: string) => void;
  private released = false;

  constructor(config: SoapTransportConfig) {
    this.credentials = config.credentials;
    this.sessions = config.sessions ?? asyncSessions;
    this.session = this.sessions.acquire(config.credentials, config.timeoutMs ?? getConfig().timeoutMs);
    this.logger = config.logger;
  }

  async open(locator: string): Promise<OpenedDescriptor<AsyncOperation>> {
    if (this.released) {
      throw new Error('Async SOAP transport already released');
    }
    this.logger?.(`Opening ${locator}`);

    const client: Client = await createClientAsync(locator, clientOptions(this.session));

    const operations = new Map<string, AsyncOperation>();
    for (const name of listOperations(client.describe())) {
      const method: unknown = Reflect.get(client, `${name}Async`);
      if (typeof method !== 'function') continue;

      operations.set(name, async fields => {
        const response: unknown = await method.call(client, fields);
        return unwrapAsyncResponse(response);
      });
    }

    log(`transport: ${locator} advertises [${[...operations.keys()].join(', ')}]`);
    return { locator, operations };
  }

  /** Drop this transport's hold on the shared session. Safe to call twice. */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.sessions.release(this.credentials);
    this.logger?.('Async SOAP transport released');
  }
}
