// ============================================================================
// HTTP Sessions
// ============================================================================
// One authenticated axios instance per credential pair, shared by every
// descriptor fetch and every call made with those credentials. Keep-alive
// sessions own socket pools and are reference counted: the last release
// destroys them.
// ============================================================================

import http from 'http';
import https from 'https';
import { createHash } from 'crypto';
import axios, { type AxiosInstance } from 'axios';
import { log } from '../config.js';
import { ReleaseError } from '../errors.js';

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Cache key for a credential pair. The password only enters as a digest so it
 * never sits in a map key or a log line.
 */
export function credentialKey(credentials: Credentials): string {
  const digest = createHash('sha256').update(credentials.password).digest('hex');
  return `${credentials.username}:${digest}`;
}

export interface SessionOptions {
  /** Applied to every request made through the session */
  timeoutMs: number;
  /** Hold sockets open between requests */
  keepAlive: boolean;
}

export class SoapSession {
  readonly request: AxiosInstance;
  readonly keepAlive: boolean;
  private readonly agents: http.Agent[];
  private destroyed = false;

  constructor(credentials: Credentials, options: SessionOptions) {
    this.keepAlive = options.keepAlive;
    const httpAgent = new http.Agent({ keepAlive: options.keepAlive });
    const httpsAgent = new https.Agent({ keepAlive: options.keepAlive });
    this.agents = [httpAgent, httpsAgent];

    this.request = axios.create({
      auth: { username: credentials.username, password: credentials.password },
      timeout: options.timeoutMs,
      httpAgent,
      httpsAgent,
    });
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const agent of this.agents) {
      agent.destroy();
    }
  }
}

interface CacheEntry {
  session: SoapSession;
  refs: number;
}

/**
 * Sessions keyed by credential identity.
 *
 * Creation is synchronous, so two constructions for the same new credential
 * pair cannot interleave on the event loop; the second one always finds the
 * first one's session.
 */
export class SessionCache {
  private readonly entries = new Map<string, CacheEntry>();
  readonly keepAlive: boolean;

  constructor(options: { keepAlive: boolean }) {
    this.keepAlive = options.keepAlive;
  }

  /**
   * Session for `credentials`, created on first use. The timeout of the first
   * acquirer is the one the session keeps.
   */
  acquire(credentials: Credentials, timeoutMs: number): SoapSession {
    const key = credentialKey(credentials);
    const entry = this.entries.get(key);
    if (entry) {
      entry.refs += 1;
      return entry.session;
    }

    const session = new SoapSession(credentials, { timeoutMs, keepAlive: this.keepAlive });
    this.entries.set(key, { session, refs: 1 });
    log(`sessions: created ${this.keepAlive ? 'keep-alive ' : ''}session for ${credentials.username}`);
    return session;
  }

  /**
   * Drop one reference. The session is destroyed with its last reference.
   * Releasing credentials that hold no session is a no-op.
   */
  release(credentials: Credentials): void {
    const key = credentialKey(credentials);
    const entry = this.entries.get(key);
    if (!entry) return;

    entry.refs -= 1;
    if (entry.refs > 0) return;

    this.entries.delete(key);
    try {
      entry.session.destroy();
    } catch (err) {
      throw new ReleaseError(`Failed to release session for ${credentials.username}`, err);
    }
    log(`sessions: released session for ${credentials.username}`);
  }

  has(credentials: Credentials): boolean {
    return this.entries.has(credentialKey(credentials));
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Callback-convention sessions: no keep-alive, never released. */
export const callbackSessions = new SessionCache({ keepAlive: false });

/** Promise-convention sessions: keep-alive, released on close. */
export const asyncSessions = new SessionCache({ keepAlive: true });
