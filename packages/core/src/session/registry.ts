/**
 * Session registry: the process-wide map from session id to one live
 * database connection, with a per-entry expiry.
 *
 * All map reads and writes are synchronous and never straddle an `await`,
 * so concurrent requests on the event loop cannot interleave inside an
 * update. Closing a connection is the only asynchronous step and always
 * happens after the entry has left the map.
 */

import type { DbConnection } from '../db/types.js';
import { createLogger, type Logger } from '../logger.js';

export interface Session {
  id: string;
  connection: DbConnection;
  createdAt: number;
  expiresAt: number;
}

export interface SessionRegistryOptions {
  logger?: Logger;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly pendingCloses = new Set<Promise<void>>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.logger = options.logger ?? createLogger('session-registry');
    this.now = options.now ?? Date.now;
  }

  /**
   * Insert or replace. Uniqueness is the caller's concern: check `get`
   * first and report a conflict there.
   */
  store(id: string, connection: DbConnection, ttlMs: number): void {
    const createdAt = this.now();
    const previous = this.sessions.get(id);
    this.sessions.set(id, { id, connection, createdAt, expiresAt: createdAt + ttlMs });
    if (previous && previous.connection !== connection) {
      this.track(this.closeQuietly(previous, 'replaced'));
    }
  }

  /** Live connection for `id`, evicting the entry if it has expired. */
  get(id: string): DbConnection | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.sessions.delete(id);
      this.track(this.closeQuietly(session, 'expired'));
      return undefined;
    }
    return session.connection;
  }

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  /** Close and delete. No-op when absent. */
  async remove(id: string): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) return;
    this.sessions.delete(id);
    await this.closeQuietly(session, 'removed');
  }

  /**
   * Evict every expired entry whose id `inUse` does not claim; claimed
   * entries wait for a later sweep. Returns the number evicted.
   */
  sweep(inUse: (id: string) => boolean = () => false): number {
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (!this.isExpired(session) || inUse(id)) continue;
      this.sessions.delete(id);
      this.track(this.closeQuietly(session, 'expired'));
      evicted++;
    }
    return evicted;
  }

  size(): number {
    return this.sessions.size;
  }

  ids(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Close everything, including closes still in flight from evictions. */
  async closeAll(): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.all([...sessions.map((s) => this.closeQuietly(s, 'shutdown')), ...this.pendingCloses]);
  }

  /** Resolves once every eviction-triggered close has settled. */
  async drain(): Promise<void> {
    await Promise.all(this.pendingCloses);
  }

  private isExpired(session: Session): boolean {
    return this.now() >= session.expiresAt;
  }

  private track(close: Promise<void>): void {
    this.pendingCloses.add(close);
    void close.finally(() => this.pendingCloses.delete(close));
  }

  private async closeQuietly(session: Session, reason: string): Promise<void> {
    try {
      await session.connection.close();
      this.logger.info({ sessionId: session.id, reason }, 'session connection closed');
    } catch (err: unknown) {
      this.logger.warn({ sessionId: session.id, reason, err }, 'failed to close session connection');
    }
  }
}
