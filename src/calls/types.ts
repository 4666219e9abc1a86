export type CallSid = string;

export type CallSessionState = 'Idle' | 'Connected' | 'Streaming' | 'Draining' | 'Closed';

export type TranscriptRole = 'caller' | 'agent';

export interface TranscriptMessage {
  readonly role: TranscriptRole;
  readonly text: string;
  readonly timestamp: Date;
}

export type CallFinalStatus = 'completed' | 'disconnected' | 'failed';

export type FlushTrigger = 'threshold' | 'stop' | 'teardown';

export interface CallContext {
  callSid: CallSid;
  streamSid?: string;
  accountSid?: string;
  from?: string;
  to?: string;
  customParameters: Record<string, string>;
}

/** Minimal surface of a ws socket the state machine depends on. */
export interface MediaSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export const SOCKET_OPEN = 1;
