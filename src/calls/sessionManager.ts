import { log } from '../log';
import { setActiveCalls } from '../metrics';
import { CallSession, type CallSessionDeps } from './callSession';
import type { CallSid, MediaSocket } from './types';

export type SessionFactoryDeps = Omit<CallSessionDeps, 'callSid' | 'socket' | 'onClosed'>;

const DUPLICATE_CALL_CLOSE_CODE = 1008;

/** One CallSession per call sid for the lifetime of its media socket. */
export class SessionManager {
  private readonly sessions = new Map<CallSid, CallSession>();
  private readonly deps: SessionFactoryDeps;

  constructor(deps: SessionFactoryDeps) {
    this.deps = deps;
  }

  /**
   * Registers a session for a newly accepted socket. A second socket for a
   * call that is still live is closed with 1008 and null is returned.
   */
  public openSession(callSid: CallSid, socket: MediaSocket): CallSession | null {
    const existing = this.sessions.get(callSid);
    if (existing) {
      log.warn(
        { event: 'duplicate_call', call_sid: callSid, state: existing.getState() },
        'media socket rejected, call already active',
      );
      try {
        socket.close(DUPLICATE_CALL_CLOSE_CODE, 'duplicate_call');
      } catch (error) {
        log.warn({ event: 'media_socket_close_failed', call_sid: callSid, err: error }, 'media socket close failed');
      }
      return null;
    }

    const session = new CallSession({
      ...this.deps,
      callSid,
      socket,
      onClosed: (closed) => this.release(closed),
    });
    this.sessions.set(callSid, session);
    setActiveCalls(this.sessions.size);

    log.info(
      { event: 'call_session_created', call_sid: callSid, active_calls: this.sessions.size },
      'call session created',
    );
    return session;
  }

  public getSession(callSid: CallSid): CallSession | undefined {
    return this.sessions.get(callSid);
  }

  public getActiveSessionCount(): number {
    return this.sessions.size;
  }

  /** Runs the disconnect path for every live call and waits for finalization. */
  public async teardownAll(reason = 'server_shutdown'): Promise<void> {
    const sessions = [...this.sessions.values()];
    if (sessions.length === 0) return;

    log.info({ event: 'call_sessions_teardown_all', count: sessions.length, reason }, 'tearing down call sessions');
    const results = await Promise.allSettled(sessions.map((session) => session.shutdown(reason)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        log.error(
          { event: 'call_session_teardown_failed', call_sid: sessions[index]?.callSid, err: result.reason },
          'call session teardown failed',
        );
      }
    });
  }

  private release(session: CallSession): void {
    if (this.sessions.get(session.callSid) !== session) {
      return;
    }
    this.sessions.delete(session.callSid);
    setActiveCalls(this.sessions.size);
    log.info(
      { event: 'call_session_removed', call_sid: session.callSid, active_calls: this.sessions.size },
      'call session removed',
    );
  }
}
