import { AudioBuffer, createAudioFrame } from '../audio/audioBuffer';
import { mulawDurationMs, TELEPHONY_SAMPLE_RATE_HZ } from '../audio/codec';
import type { ConversationSessionStore } from '../conversation/sessionStore';
import { env } from '../env';
import { ConnectionError } from '../errors';
import { log } from '../log';
import {
  incBufferFlush,
  incInboundAudioFrames,
  incInboundAudioFramesDropped,
  incProtocolEventIgnored,
  recordCallMetrics,
} from '../metrics';
import {
  buildMark,
  buildOutboundMedia,
  chunkTelephonyAudio,
  decodeMediaPayload,
  parseInboundMessage,
  readStartInfo,
  type InboundMessage,
  type MediaEvent,
  type StartEvent,
} from '../media/protocol';
import { logCallEvent } from '../observability/callLogs';
import type { CallPersistence } from '../persistence/callPersistence';
import type { PipelineResult } from '../pipeline/types';
import type { AgentConfig } from '../tenants/agentConfig';
import type { TenantResolver } from '../tenants/tenantResolver';
import {
  SOCKET_OPEN,
  type CallContext,
  type CallFinalStatus,
  type CallSessionState,
  type CallSid,
  type FlushTrigger,
  type MediaSocket,
} from './types';

/** The orchestrator surface a call needs; VoicePipeline satisfies it. */
export interface CallPipeline {
  prepareCall(
    callSid: CallSid,
    tenantId: string,
  ): Promise<{ agent: Pick<AgentConfig, 'greetingMessage' | 'historyWindow'> }>;
  process(audioPayload: Buffer, callSid: CallSid, tenantId: string): Promise<PipelineResult>;
  synthesizeUtterance(text: string, callSid: CallSid, tenantId: string): Promise<Buffer>;
  releaseCall(callSid: CallSid): void;
}

export interface CallSessionSettings {
  flushThresholdMs: number;
  frameDurationMs: number;
  frameDurationMode: 'fixed' | 'sample_accurate';
  outboundChunkBytes: number;
  stopFlushTimeoutMs: number;
  defaultGreeting: string;
}

export interface CallSessionDeps {
  callSid: CallSid;
  socket: MediaSocket;
  pipeline: CallPipeline;
  store: ConversationSessionStore;
  tenantResolver: TenantResolver;
  persistence: CallPersistence;
  settings?: Partial<CallSessionSettings>;
  now?: () => number;
  onClosed?: (session: CallSession) => void;
}

const TRANSITIONS: Record<CallSessionState, readonly CallSessionState[]> = {
  Idle: ['Connected', 'Streaming', 'Closed'],
  Connected: ['Streaming', 'Closed'],
  Streaming: ['Draining', 'Closed'],
  Draining: ['Closed'],
  Closed: [],
};

const POLICY_VIOLATION = 1008;
const NORMAL_CLOSURE = 1000;

function defaultSettings(): CallSessionSettings {
  return {
    flushThresholdMs: env.BUFFER_FLUSH_MS,
    frameDurationMs: env.FRAME_DURATION_MS,
    frameDurationMode: env.FRAME_DURATION_MODE,
    outboundChunkBytes: env.OUTBOUND_CHUNK_BYTES,
    stopFlushTimeoutMs: env.STOP_FLUSH_TIMEOUT_MS,
    defaultGreeting: env.DEFAULT_GREETING,
  };
}

/**
 * State machine for one media socket. Every inbound event runs on a serial
 * per-call queue, so at most one flush is in flight and media that arrives
 * during a flush waits instead of being dropped.
 */
export class CallSession {
  public readonly callSid: CallSid;

  private state: CallSessionState = 'Idle';
  private readonly socket: MediaSocket;
  private readonly pipeline: CallPipeline;
  private readonly store: ConversationSessionStore;
  private readonly tenantResolver: TenantResolver;
  private readonly persistence: CallPersistence;
  private readonly settings: CallSessionSettings;
  private readonly now: () => number;
  private readonly onClosed?: (session: CallSession) => void;
  private readonly buffer = new AudioBuffer();

  private tenantId?: string;
  private streamSid?: string;
  private context?: CallContext;
  private startedAt: number;
  private streaming = false;
  private stopReceived = false;
  private chain: Promise<void> = Promise.resolve();
  private pendingTasks = 0;
  private finalized?: Promise<void>;
  private closing?: Promise<void>;
  private flushes = 0;
  private outboundTurns = 0;
  private mismatchedFrames = 0;

  constructor(deps: CallSessionDeps) {
    this.callSid = deps.callSid;
    this.socket = deps.socket;
    this.pipeline = deps.pipeline;
    this.store = deps.store;
    this.tenantResolver = deps.tenantResolver;
    this.persistence = deps.persistence;
    this.settings = { ...defaultSettings(), ...(deps.settings ?? {}) };
    this.now = deps.now ?? Date.now;
    this.onClosed = deps.onClosed;
    this.startedAt = this.now();
  }

  public getState(): CallSessionState {
    return this.state;
  }

  public getTenantId(): string | undefined {
    return this.tenantId;
  }

  public get bufferedMs(): number {
    return this.buffer.bufferedMs;
  }

  public get flushCount(): number {
    return this.flushes;
  }

  /** Resolves once finalization has run, whichever path triggered it. */
  public whenFinalized(): Promise<void> {
    return this.closing ?? this.finalized ?? Promise.resolve();
  }

  /**
   * Parses one socket message and queues its handling. The returned promise
   * settles when the queued work is done and never rejects.
   */
  public handleMessage(raw: string): Promise<void> {
    const parsed = parseInboundMessage(raw);
    if (!parsed.ok) {
      incProtocolEventIgnored(parsed.reason);
      log.warn(
        {
          event: 'media_event_ignored',
          reason: parsed.reason,
          ws_event: parsed.event,
          detail: parsed.detail,
          ...this.logContext(),
        },
        'media event ignored',
      );
      return Promise.resolve();
    }
    const message = parsed.message;
    return this.enqueue(message.event, () => this.dispatch(message));
  }

  /** Transport went away without a stop event. */
  public handleSocketClosed(code?: number, reason?: string): Promise<void> {
    if (this.closing || this.finalized) {
      return this.whenFinalized();
    }

    const previous = this.state;
    this.state = 'Closed';
    log.warn(
      {
        event: 'call_socket_closed',
        previous_state: previous,
        code,
        reason,
        buffered_ms: this.buffer.bufferedMs,
        pending_tasks: this.pendingTasks,
        ...this.logContext(),
      },
      'media socket closed before stop',
    );
    this.closing = this.teardown();
    return this.closing;
  }

  public handleSocketError(error: Error): Promise<void> {
    const failure = new ConnectionError('media socket error', { call_sid: this.callSid, state: this.state }, { cause: error });
    log.error({ event: 'call_socket_error', err: failure, code: failure.code, ...this.logContext() }, 'media socket error');
    return this.handleSocketClosed(undefined, 'socket_error');
  }

  /** Process shutdown: close the socket and run the disconnect path. */
  public shutdown(reason = 'server_shutdown'): Promise<void> {
    this.closeSocket(1001, reason);
    return this.handleSocketClosed(1001, reason);
  }

  private async dispatch(message: InboundMessage): Promise<void> {
    switch (message.event) {
      case 'connected':
        this.transition('Connected', 'connected');
        return;
      case 'start':
        await this.onStart(message);
        return;
      case 'media':
        await this.onMedia(message);
        return;
      case 'stop':
        await this.onStop();
        return;
      case 'mark':
        logCallEvent('mark_received', { mark: message.mark?.name, ...this.logContext() });
        return;
    }
  }

  private async onStart(message: StartEvent): Promise<void> {
    if (this.state !== 'Idle' && this.state !== 'Connected') {
      this.logIgnoredTransition('start');
      return;
    }

    const info = readStartInfo(message);
    if (info.callSid && info.callSid !== this.callSid) {
      log.warn(
        { event: 'start_call_sid_mismatch', start_call_sid: info.callSid, ...this.logContext() },
        'start event call sid differs from socket path',
      );
    }
    this.streamSid = info.streamSid;
    this.context = {
      callSid: this.callSid,
      streamSid: info.streamSid,
      accountSid: info.accountSid,
      from: info.customParameters.from,
      to: info.customParameters.to,
      customParameters: info.customParameters,
    };

    if (info.encoding && info.encoding !== 'audio/x-mulaw') {
      log.warn(
        { event: 'media_format_unexpected', encoding: info.encoding, sample_rate_hz: info.sampleRateHz, ...this.logContext() },
        'unexpected media format',
      );
    }

    let tenantId: string | null;
    try {
      tenantId = await this.tenantResolver.resolveTenant(this.context);
    } catch (error) {
      log.error({ event: 'tenant_resolve_error', err: error, ...this.logContext() }, 'tenant resolve error');
      tenantId = null;
    }
    if (this.finalized) {
      return;
    }
    if (!tenantId) {
      log.warn({ event: 'tenant_not_found', ...this.logContext() }, 'tenant not found for call');
      await this.finalizeOnce('failed', POLICY_VIOLATION, 'tenant_not_found');
      return;
    }
    this.tenantId = tenantId;

    let agent: Pick<AgentConfig, 'greetingMessage' | 'historyWindow'>;
    try {
      const prepared = await this.pipeline.prepareCall(this.callSid, tenantId);
      agent = prepared.agent;
    } catch (error) {
      log.error({ event: 'call_configuration_failed', err: error, ...this.logContext() }, 'call configuration failed');
      await this.finalizeOnce('failed', POLICY_VIOLATION, 'configuration_error');
      return;
    }
    if (this.releaseIfFinalized()) {
      return;
    }

    this.store.create(this.callSid, tenantId, { windowSize: agent.historyWindow });
    this.startedAt = this.now();

    const greeting = agent.greetingMessage ?? this.settings.defaultGreeting;
    const greetingAudio = await this.pipeline.synthesizeUtterance(greeting, this.callSid, tenantId);
    if (this.releaseIfFinalized() || this.getState() === 'Closed') {
      return;
    }
    if (greetingAudio.length > 0) {
      this.sendAudio(greetingAudio);
    }
    this.store.append(this.callSid, 'agent', greeting);

    try {
      await this.persistence.recordCallStart({
        callSid: this.callSid,
        tenantId,
        streamSid: this.streamSid,
        from: this.context.from,
        to: this.context.to,
        startedAt: new Date(this.startedAt),
      });
    } catch (error) {
      log.warn({ event: 'call_start_persist_failed', err: error, ...this.logContext() }, 'call start not persisted');
    }

    if (this.getState() === 'Closed') {
      return;
    }
    this.streaming = true;
    this.transition('Streaming', 'start');
    logCallEvent('call_streaming', { greeting_bytes: greetingAudio.length, ...this.logContext() });
  }

  private async onMedia(message: MediaEvent): Promise<void> {
    if (this.finalized || !this.streaming || this.stopReceived) {
      const reason = this.finalized ? 'after_close' : this.streaming ? 'after_stop' : 'before_start';
      incInboundAudioFramesDropped(reason);
      log.debug({ event: 'media_dropped', reason, state: this.state, ...this.logContext() }, 'media dropped');
      return;
    }

    const payload = decodeMediaPayload(message.media.payload);
    if (payload.length === 0) {
      incInboundAudioFramesDropped('empty_payload');
      log.warn({ event: 'media_empty_payload', ...this.logContext() }, 'media payload empty');
      return;
    }

    incInboundAudioFrames();
    this.buffer.append(createAudioFrame(payload, this.frameDurationMs(payload.length)));

    if (this.buffer.isReady(this.settings.flushThresholdMs)) {
      await this.flush('threshold', true);
    }
  }

  private async onStop(): Promise<void> {
    if (this.state !== 'Streaming') {
      this.logIgnoredTransition('stop');
      return;
    }
    this.stopReceived = true;

    if (!this.buffer.isEmpty) {
      await this.flush('stop', true);
    }
    if (this.closing) {
      // the disconnect path finalizes once queued work is done
      return;
    }
    await this.finalizeOnce('completed', NORMAL_CLOSURE, 'stop');
  }

  private frameDurationMs(bytes: number): number {
    if (this.settings.frameDurationMode === 'sample_accurate') {
      return mulawDurationMs(bytes);
    }

    const expectedBytes = Math.round((this.settings.frameDurationMs * TELEPHONY_SAMPLE_RATE_HZ) / 1000);
    if (bytes !== expectedBytes) {
      this.mismatchedFrames += 1;
      if (this.mismatchedFrames === 1) {
        log.warn(
          {
            event: 'media_frame_duration_mismatch',
            bytes,
            expected_bytes: expectedBytes,
            assumed_ms: this.settings.frameDurationMs,
            ...this.logContext(),
          },
          'media frame length does not match fixed frame duration',
        );
      }
    }
    return this.settings.frameDurationMs;
  }

  private async flush(trigger: FlushTrigger, send: boolean): Promise<void> {
    if (this.finalized) {
      this.buffer.reset();
      return;
    }
    const drained = this.buffer.drain();
    const tenantId = this.tenantId;
    if (drained.frames === 0 || !tenantId) {
      return;
    }

    this.flushes += 1;
    incBufferFlush(trigger);
    log.info(
      {
        event: 'buffer_flush',
        trigger,
        duration_ms: drained.durationMs,
        bytes: drained.payload.length,
        frames: drained.frames,
        ...this.logContext(),
      },
      'buffer flush',
    );

    try {
      const result = await this.pipeline.process(drained.payload, this.callSid, tenantId);
      if (this.releaseIfFinalized()) {
        return;
      }
      if (send && result.responseAudio.length > 0) {
        this.sendAudio(result.responseAudio);
      }
    } catch (error) {
      log.error({ event: 'buffer_flush_failed', trigger, err: error, ...this.logContext() }, 'buffer flush failed');
    }
  }

  private sendAudio(audio: Buffer): void {
    const streamSid = this.streamSid;
    if (!streamSid || this.socket.readyState !== SOCKET_OPEN) {
      log.debug({ event: 'outbound_audio_skipped', bytes: audio.length, ...this.logContext() }, 'outbound audio skipped');
      return;
    }

    this.outboundTurns += 1;
    const chunks = chunkTelephonyAudio(audio, this.settings.outboundChunkBytes);
    for (const chunk of chunks) {
      this.send(buildOutboundMedia(streamSid, chunk));
    }
    this.send(buildMark(streamSid, `agent-${this.outboundTurns}`));
  }

  private send(data: string): void {
    try {
      this.socket.send(data, (error) => {
        if (error) {
          log.warn({ event: 'media_send_failed', err: error, ...this.logContext() }, 'media send failed');
        }
      });
    } catch (error) {
      log.warn({ event: 'media_send_failed', err: error, ...this.logContext() }, 'media send failed');
    }
  }

  private async teardown(): Promise<void> {
    const settled = await this.waitForQueue(this.settings.stopFlushTimeoutMs);
    if (!settled) {
      log.warn(
        { event: 'call_teardown_queue_timeout', timeout_ms: this.settings.stopFlushTimeoutMs, ...this.logContext() },
        'queued call work did not finish before teardown',
      );
      this.buffer.reset();
    } else if (!this.buffer.isEmpty) {
      await this.flush('teardown', false);
    }

    await this.finalizeOnce(this.stopReceived ? 'completed' : 'disconnected');
  }

  private async waitForQueue(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.chain.then(() => true), timeout]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  private finalizeOnce(status: CallFinalStatus, closeCode?: number, reason?: string): Promise<void> {
    if (!this.finalized) {
      this.finalized = this.finalize(status, closeCode, reason);
    }
    return this.finalized;
  }

  private async finalize(status: CallFinalStatus, closeCode?: number, reason?: string): Promise<void> {
    if (this.state === 'Streaming') {
      this.transition('Draining', 'finalize');
    }

    const durationSeconds = Math.max(0, Math.round((this.now() - this.startedAt) / 1000));
    const transcript = this.store.transcript(this.callSid);
    const tenantId = this.tenantId;

    if (tenantId) {
      try {
        await this.persistence.finalizeCall(this.callSid, tenantId, status, durationSeconds, transcript);
      } catch (error) {
        log.warn({ event: 'call_finalize_persist_failed', err: error, ...this.logContext() }, 'call not persisted');
      }
    }

    this.store.remove(this.callSid);
    this.pipeline.releaseCall(this.callSid);
    this.buffer.reset();

    recordCallMetrics({ tenantId, status, durationSeconds, turns: transcript.length });
    logCallEvent('call_finalized', {
      status,
      duration_seconds: durationSeconds,
      turns: transcript.length,
      flushes: this.flushes,
      mismatched_frames: this.mismatchedFrames || undefined,
      ...this.logContext(),
    });

    if (this.state !== 'Closed') {
      this.transition('Closed', 'finalize');
    }
    this.closeSocket(closeCode ?? NORMAL_CLOSURE, reason ?? status);
    this.onClosed?.(this);
  }

  /**
   * Work that outlived a timed-out teardown may have touched per-call state
   * after finalize released it; release it again and stop.
   */
  private releaseIfFinalized(): boolean {
    if (!this.finalized) return false;
    this.store.remove(this.callSid);
    this.pipeline.releaseCall(this.callSid);
    log.warn({ event: 'call_work_after_finalize', ...this.logContext() }, 'queued call work finished after finalize');
    return true;
  }

  private closeSocket(code: number, reason: string): void {
    if (this.socket.readyState !== SOCKET_OPEN) return;
    try {
      this.socket.close(code, reason);
    } catch (error) {
      log.warn({ event: 'media_socket_close_failed', err: error, ...this.logContext() }, 'media socket close failed');
    }
  }

  private enqueue(name: string, task: () => Promise<void>): Promise<void> {
    this.pendingTasks += 1;
    const run = this.chain.then(async () => {
      try {
        await task();
      } catch (error) {
        log.error({ event: 'call_session_task_failed', task: name, err: error, ...this.logContext() }, 'call session task failed');
      } finally {
        this.pendingTasks -= 1;
      }
    });
    this.chain = run;
    return run;
  }

  private transition(next: CallSessionState, trigger: string): boolean {
    if (!TRANSITIONS[this.state].includes(next)) {
      this.logIgnoredTransition(trigger, next);
      return false;
    }
    const previous = this.state;
    this.state = next;
    log.info(
      { event: 'call_state_transition', from_state: previous, to_state: next, trigger, ...this.logContext() },
      'call state transition',
    );
    return true;
  }

  private logIgnoredTransition(trigger: string, next?: CallSessionState): void {
    incProtocolEventIgnored('invalid_transition');
    log.warn(
      { event: 'call_transition_ignored', state: this.state, to_state: next, trigger, ...this.logContext() },
      'call transition ignored',
    );
  }

  private logContext(): Record<string, unknown> {
    return { call_sid: this.callSid, stream_sid: this.streamSid, tenant_id: this.tenantId };
  }
}
