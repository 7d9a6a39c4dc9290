/**
 * Session Manager
 *
 * Owns the Diffusion sessions of every MCP caller:
 * - connect / get / disconnect, keyed by caller session id
 * - periodic sweep evicting idle sessions and forgetting dead ones
 * - shutdown closing everything that is left
 *
 * Every table mutation runs without an `await` between reading and writing
 * the entry, so interleaved tool calls and the sweep never observe a half
 * applied change. Network waits (open, close) happen outside those sections.
 */

import { SessionManagerClosedError } from './errors.js';
import { createNullLogger, errorMessage, type StructuredLogger } from './logger.js';
import type {
  DiffusionSession,
  SessionErrorHandler,
  SessionFactory,
  SessionListener,
  SessionProperties,
} from './types.js';

export interface SessionManagerConfig {
  factory: SessionFactory;
  /** Idle time after which the sweep closes a session (default: 5 minutes) */
  idleTimeoutMs?: number;
  /** Sweep period (default: 30 seconds) */
  sweepIntervalMs?: number;
  logger?: StructuredLogger;
  now?: () => number;
}

export interface SweepResult {
  /** Callers whose session had already closed; removed without closing. */
  closed: string[];
  /** Callers whose session was idle too long; closed and removed. */
  idle: string[];
}

interface SessionEntry {
  session: DiffusionSession;
  lastActivity: number;
}

export const DEFAULT_IDLE_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

export class SessionManager {
  private readonly entries = new Map<string, SessionEntry>();
  private readonly factory: SessionFactory;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  readonly idleTimeoutMs: number;
  readonly sweepIntervalMs: number;
  private sweepHandle: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(config: SessionManagerConfig) {
    this.factory = config.factory;
    this.logger = config.logger ?? createNullLogger();
    this.now = config.now ?? (() => Date.now());
    this.idleTimeoutMs = config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.sweepIntervalMs = config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;

    this.sweepHandle = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('session_sweep_failed', { error: errorMessage(error) });
      });
    }, this.sweepIntervalMs);
    this.sweepHandle.unref();

    this.logger.info('session_monitor_started', {
      idleTimeoutMs: this.idleTimeoutMs,
      sweepIntervalMs: this.sweepIntervalMs,
    });
  }

  /**
   * Open a new Diffusion session for a caller, replacing any existing one.
   *
   * The new session is opened before the old one is touched, so a failed
   * reconnect leaves the caller's working session in place.
   */
  async connect(
    callerId: string,
    principal: string,
    password: string,
    url: string,
    sessionProperties: SessionProperties = {}
  ): Promise<DiffusionSession> {
    if (this.stopped) throw new SessionManagerClosedError();

    this.logger.info('session_connecting', { callerId, principal, url });

    const hasProperties = Object.keys(sessionProperties).length > 0;
    if (hasProperties) {
      this.logger.info('session_connect_properties', { callerId, properties: sessionProperties });
    }

    const session = await this.factory.open({
      principal,
      password,
      url,
      ...(hasProperties ? { properties: sessionProperties } : {}),
      listener: this.listenerFor(callerId),
      errorHandler: this.errorHandlerFor(callerId),
    });

    if (this.stopped) {
      // Shutdown began while the open was in flight.
      await this.closeQuietly(callerId, session);
      throw new SessionManagerClosedError();
    }

    const previous = this.entries.get(callerId);
    this.entries.set(callerId, { session, lastActivity: this.now() });

    this.logger.info('session_connected', { callerId, sessionId: session.sessionId });

    if (previous && previous.session !== session) {
      this.logger.info('session_replaced', {
        callerId,
        previousSessionId: previous.session.sessionId,
      });
      await this.closeQuietly(callerId, previous.session);
    }

    return session;
  }

  /**
   * Look up a caller's session and mark it active.
   *
   * Liveness is not checked here; the sweep reconciles dead sessions.
   */
  get(callerId: string): DiffusionSession | undefined {
    const entry = this.entries.get(callerId);
    if (!entry) return undefined;
    entry.lastActivity = this.now();
    return entry.session;
  }

  /**
   * Remove and close a caller's session.
   *
   * @returns the removed session, or undefined if the caller had none
   */
  async disconnect(callerId: string): Promise<DiffusionSession | undefined> {
    const entry = this.entries.get(callerId);
    if (!entry) return undefined;
    this.entries.delete(callerId);

    this.logger.info('session_disconnecting', { callerId, sessionId: entry.session.sessionId });
    await this.closeQuietly(callerId, entry.session);
    return entry.session;
  }

  async sweep(): Promise<SweepResult> {
    const now = this.now();
    const result: SweepResult = { closed: [], idle: [] };
    const toClose: Array<[string, DiffusionSession]> = [];

    for (const [callerId, entry] of this.entries) {
      let closed: boolean;
      try {
        closed = entry.session.getState() === 'closed';
      } catch (error) {
        this.logger.warn('session_state_query_failed', { callerId, error: errorMessage(error) });
        continue;
      }

      if (closed) {
        this.logger.info('session_closed_removed', { callerId });
        result.closed.push(callerId);
        continue;
      }

      const idleMs = now - entry.lastActivity;
      if (idleMs > this.idleTimeoutMs) {
        this.logger.info('session_idle_evicted', { callerId, idleMs });
        result.idle.push(callerId);
        toClose.push([callerId, entry.session]);
      }
    }

    for (const callerId of [...result.closed, ...result.idle]) {
      this.entries.delete(callerId);
    }

    await Promise.all(toClose.map(([callerId, session]) => this.closeQuietly(callerId, session)));
    return result;
  }

  /**
   * Stop the sweep and close every remaining session. Safe to call twice.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.sweepHandle) {
      clearInterval(this.sweepHandle);
      this.sweepHandle = null;
    }

    const remaining = Array.from(this.entries);
    this.entries.clear();
    this.logger.info('session_manager_shutdown', { sessionCount: remaining.length });

    await Promise.allSettled(remaining.map(([callerId, entry]) => this.closeQuietly(callerId, entry.session)));
  }

  get size(): number {
    return this.entries.size;
  }

  get isShutdown(): boolean {
    return this.stopped;
  }

  callerIds(): string[] {
    return Array.from(this.entries.keys());
  }

  private listenerFor(callerId: string): SessionListener {
    return {
      onStateChange: (session, oldState, newState) => {
        if (newState !== 'closed') {
          this.logger.info('session_state_changed', { callerId, sessionId: session.sessionId, oldState, newState });
          return;
        }
        // A replaced session may close late; only forget the caller's current one.
        const entry = this.entries.get(callerId);
        if (entry?.session === session) {
          this.entries.delete(callerId);
          this.logger.info('session_closed_by_server', { callerId, sessionId: session.sessionId, oldState });
        }
      },
    };
  }

  private errorHandlerFor(callerId: string): SessionErrorHandler {
    return {
      onError: (session, error) => {
        this.logger.warn('session_error', { callerId, sessionId: session.sessionId, error: errorMessage(error) });
      },
    };
  }

  private async closeQuietly(callerId: string, session: DiffusionSession): Promise<void> {
    try {
      await session.close();
      this.logger.debug('session_closed', { callerId, sessionId: session.sessionId });
    } catch (error) {
      this.logger.warn('session_close_failed', {
        callerId,
        sessionId: session.sessionId,
        error: errorMessage(error),
      });
    }
  }
}
