import { log } from '../log';
import type { CallSid, TranscriptMessage, TranscriptRole } from '../calls/types';

export interface ConversationSession {
  readonly callSid: CallSid;
  readonly tenantId: string;
  readonly windowSize: number;
  readonly createdAt: Date;
  /** Full log since call start, oldest first. */
  readonly messages: readonly TranscriptMessage[];
}

interface SessionEntry {
  callSid: CallSid;
  tenantId: string;
  windowSize: number;
  createdAt: Date;
  messages: TranscriptMessage[];
}

/**
 * Per-call conversation history shared by every call in the process.
 *
 * Every operation is synchronous against a single Map, so each one is atomic
 * with respect to other calls on the event loop. Nothing here survives a
 * restart; completed calls are persisted by the call-persistence collaborator
 * before their entry is removed.
 */
export class ConversationSessionStore {
  private readonly sessions = new Map<CallSid, SessionEntry>();
  private readonly defaultWindowSize: number;

  constructor(options: { windowSize: number }) {
    this.defaultWindowSize = Math.max(1, Math.floor(options.windowSize));
  }

  public create(callSid: CallSid, tenantId: string, options: { windowSize?: number } = {}): ConversationSession {
    const existing = this.sessions.get(callSid);
    if (existing) {
      log.warn(
        { event: 'conversation_session_exists', call_sid: callSid, tenant_id: existing.tenantId },
        'conversation session exists',
      );
      return toView(existing);
    }

    const windowSize = Math.max(1, Math.floor(options.windowSize ?? this.defaultWindowSize));
    const entry: SessionEntry = { callSid, tenantId, windowSize, createdAt: new Date(), messages: [] };
    this.sessions.set(callSid, entry);
    return toView(entry);
  }

  public get(callSid: CallSid): ConversationSession | undefined {
    const entry = this.sessions.get(callSid);
    return entry ? toView(entry) : undefined;
  }

  public has(callSid: CallSid): boolean {
    return this.sessions.has(callSid);
  }

  public append(
    callSid: CallSid,
    role: TranscriptRole,
    text: string,
    timestamp: Date = new Date(),
  ): TranscriptMessage | null {
    const entry = this.sessions.get(callSid);
    if (!entry) {
      log.warn({ event: 'conversation_append_unknown_call', call_sid: callSid, role }, 'append to unknown call');
      return null;
    }

    const trimmed = text.trim();
    if (trimmed === '') {
      return null;
    }

    const message: TranscriptMessage = Object.freeze({ role, text: trimmed, timestamp: new Date(timestamp) });
    entry.messages.push(message);
    return message;
  }

  /** Most recent N messages, derived from the log on every read. */
  public window(callSid: CallSid): TranscriptMessage[] {
    const entry = this.sessions.get(callSid);
    if (!entry) return [];
    return entry.messages.slice(-entry.windowSize);
  }

  public transcript(callSid: CallSid): TranscriptMessage[] {
    const entry = this.sessions.get(callSid);
    return entry ? entry.messages.slice() : [];
  }

  public remove(callSid: CallSid): boolean {
    return this.sessions.delete(callSid);
  }

  public get size(): number {
    return this.sessions.size;
  }
}

function toView(entry: SessionEntry): ConversationSession {
  return {
    callSid: entry.callSid,
    tenantId: entry.tenantId,
    windowSize: entry.windowSize,
    createdAt: entry.createdAt,
    messages: entry.messages.slice(),
  };
}
