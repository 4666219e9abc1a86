import { synthesisToTelephony, telephonyToTranscriptionWav } from '../audio/codec';
import type { CallSid } from '../calls/types';
import type { ConversationSessionStore } from '../conversation/sessionStore';
import { env } from '../env';
import { RetrievalError, StageError, type StageName } from '../errors';
import { formatKnowledgeContext, type KnowledgeRetriever } from '../knowledge/retriever';
import { log } from '../log';
import { incStageError, observeStageDuration } from '../metrics';
import { previewText } from '../observability/callLogs';
import { invokeWithFallback, withTimeout } from '../providers/invoke';
import { resolveProviderConfig } from '../providers/registry';
import type { ProviderConfig } from '../providers/types';
import type { AgentConfig, AgentConfigSource } from '../tenants/agentConfig';
import { buildPromptMessages } from './prompt';
import type { LatencyBreakdown, PipelineFlag, PipelineResult } from './types';

export const EMPTY_RESPONSE_APOLOGY = "I'm sorry, I didn't understand that. Could you please repeat?";

export interface PreparedCall {
  tenantId: string;
  agent: AgentConfig;
  providers: ProviderConfig;
}

export interface PipelineSettings {
  providerTimeoutMs: number;
  latencyBudgetMs: number;
  fillerText: string;
}

export interface VoicePipelineDeps {
  store: ConversationSessionStore;
  agentConfigs: AgentConfigSource;
  retriever?: KnowledgeRetriever;
  resolveProviders?: (agent: AgentConfig) => ProviderConfig;
  settings?: Partial<PipelineSettings>;
  now?: () => number;
}

interface TurnState {
  callSid: CallSid;
  tenantId: string;
  startedAt: number;
  latency: LatencyBreakdown;
  flags: Set<PipelineFlag>;
  stageErrors: StageName[];
}

/**
 * One instance per process, shared by every call. Per-call state is limited
 * to the prepared agent config and providers cached between prepareCall and
 * releaseCall; the conversation log lives in the injected store.
 */
export class VoicePipeline {
  private readonly store: ConversationSessionStore;
  private readonly agentConfigs: AgentConfigSource;
  private readonly retriever?: KnowledgeRetriever;
  private readonly resolveProviders: (agent: AgentConfig) => ProviderConfig;
  private readonly settings: PipelineSettings;
  private readonly now: () => number;
  private readonly prepared = new Map<CallSid, PreparedCall>();

  constructor(deps: VoicePipelineDeps) {
    this.store = deps.store;
    this.agentConfigs = deps.agentConfigs;
    this.retriever = deps.retriever;
    this.resolveProviders = deps.resolveProviders ?? ((agent) => resolveProviderConfig(agent));
    this.settings = {
      providerTimeoutMs: deps.settings?.providerTimeoutMs ?? env.PROVIDER_TIMEOUT_MS,
      latencyBudgetMs: deps.settings?.latencyBudgetMs ?? env.LATENCY_BUDGET_MS,
      fillerText: deps.settings?.fillerText ?? env.FILLER_TEXT,
    };
    this.now = deps.now ?? Date.now;
  }

  /** Loads the tenant's agent config and resolves its providers once for the call. */
  public async prepareCall(callSid: CallSid, tenantId: string): Promise<PreparedCall> {
    const agent = await this.agentConfigs.getAgentConfig(tenantId);
    const providers = this.resolveProviders(agent);
    const prepared: PreparedCall = { tenantId, agent, providers };
    this.prepared.set(callSid, prepared);

    log.info(
      {
        event: 'pipeline_call_prepared',
        call_sid: callSid,
        tenant_id: tenantId,
        stt: providers.stt.primary.providerId,
        llm: providers.llm.primary.providerId,
        tts: providers.tts.primary.providerId,
        embedding: providers.embedding?.primary.providerId,
        rag_enabled: agent.ragEnabled,
      },
      'pipeline call prepared',
    );
    return prepared;
  }

  public releaseCall(callSid: CallSid): void {
    this.prepared.delete(callSid);
  }

  public isPrepared(callSid: CallSid): boolean {
    return this.prepared.has(callSid);
  }

  public async process(audioPayload: Buffer, callSid: CallSid, tenantId: string): Promise<PipelineResult> {
    const turn: TurnState = {
      callSid,
      tenantId,
      startedAt: this.now(),
      latency: { stt: 0, rag: 0, llm: 0, tts: 0 },
      flags: new Set<PipelineFlag>(),
      stageErrors: [],
    };
    const logContext = { call_sid: callSid, tenant_id: tenantId };

    let prepared: PreparedCall;
    try {
      prepared = await this.ensurePrepared(callSid, tenantId);
    } catch (error) {
      log.error({ event: 'pipeline_config_unavailable', ...logContext, err: error }, 'pipeline config unavailable');
      turn.flags.add('silent-response');
      turn.flags.add('stage-error');
      return this.finish(turn, { transcript: '', responseText: '', responseAudio: Buffer.alloc(0) });
    }
    const { agent, providers } = prepared;
    const invokeOpts = { timeoutMs: this.settings.providerTimeoutMs, tenantId, logContext };

    // speech-to-text
    let transcript: string;
    const sttStart = this.now();
    try {
      const wav = telephonyToTranscriptionWav(audioPayload);
      const result = await invokeWithFallback(
        providers.stt,
        (provider, signal) => provider.transcribe(wav, { signal, language: agent.language, logContext }),
        invokeOpts,
      );
      transcript = result.value.text.trim();
    } catch (error) {
      turn.latency.stt = this.now() - sttStart;
      this.recordStageError(turn, 'stt', error);
      turn.flags.add('silent-response');
      return this.finish(turn, { transcript: '', responseText: '', responseAudio: Buffer.alloc(0) });
    }
    turn.latency.stt = this.now() - sttStart;

    if (transcript === '') {
      const fillerText = this.settings.fillerText;
      const ttsStart = this.now();
      const responseAudio = await this.synthesize(prepared, fillerText, logContext);
      turn.latency.tts = this.now() - ttsStart;
      turn.flags.add('filler-response');
      log.info({ event: 'pipeline_empty_transcript', ...logContext }, 'empty transcript, sending filler');
      return this.finish(turn, { transcript: '', responseText: fillerText, responseAudio });
    }

    // retrieval
    let context = '';
    if (agent.ragEnabled) {
      const ragStart = this.now();
      try {
        context = await this.retrieveContext(prepared, transcript, logContext);
      } catch (error) {
        log.warn({ event: 'pipeline_rag_failed', ...logContext, err: error }, 'retrieval failed, continuing without context');
      }
      turn.latency.rag = this.now() - ragStart;
      if (context === '') {
        turn.flags.add('no-context');
      }
    }

    const messages = buildPromptMessages(agent.systemPrompt, context, this.store.window(callSid), transcript);

    // generation
    let responseText: string;
    const llmStart = this.now();
    try {
      const result = await invokeWithFallback(
        providers.llm,
        (provider, signal) => provider.generate(messages, { signal, logContext }),
        invokeOpts,
      );
      responseText = result.value.text.trim();
    } catch (error) {
      turn.latency.llm = this.now() - llmStart;
      this.recordStageError(turn, 'llm', error);
      this.store.append(callSid, 'caller', transcript);
      return this.finish(turn, { transcript, responseText: '', responseAudio: Buffer.alloc(0) });
    }
    turn.latency.llm = this.now() - llmStart;

    if (responseText === '') {
      log.warn({ event: 'pipeline_empty_llm_response', ...logContext }, 'empty llm response');
      responseText = EMPTY_RESPONSE_APOLOGY;
    }

    // synthesis
    let responseAudio: Buffer;
    const ttsStart = this.now();
    try {
      const result = await invokeWithFallback(
        providers.tts,
        (provider, signal) => provider.synthesize(responseText, { signal, logContext }),
        invokeOpts,
      );
      responseAudio = synthesisToTelephony(result.value.audio, result.value.format, result.value.sampleRateHz);
    } catch (error) {
      turn.latency.tts = this.now() - ttsStart;
      this.recordStageError(turn, 'tts', error);
      this.store.append(callSid, 'caller', transcript);
      return this.finish(turn, { transcript, responseText, responseAudio: Buffer.alloc(0) });
    }
    turn.latency.tts = this.now() - ttsStart;

    this.store.append(callSid, 'caller', transcript);
    this.store.append(callSid, 'agent', responseText);

    log.info(
      {
        event: 'pipeline_turn',
        ...logContext,
        transcript: previewText(transcript),
        response: previewText(responseText),
      },
      'pipeline turn complete',
    );

    return this.finish(turn, { transcript, responseText, responseAudio });
  }

  /** Greeting and filler path. Returns empty audio on any failure. */
  public async synthesizeUtterance(text: string, callSid: CallSid, tenantId: string): Promise<Buffer> {
    const logContext = { call_sid: callSid, tenant_id: tenantId };
    let prepared: PreparedCall;
    try {
      prepared = await this.ensurePrepared(callSid, tenantId);
    } catch (error) {
      log.error({ event: 'utterance_config_unavailable', ...logContext, err: error }, 'utterance config unavailable');
      return Buffer.alloc(0);
    }

    const startedAt = this.now();
    const audio = await this.synthesize(prepared, text, logContext);
    observeStageDuration('tts', tenantId, this.now() - startedAt);
    return audio;
  }

  private async ensurePrepared(callSid: CallSid, tenantId: string): Promise<PreparedCall> {
    const cached = this.prepared.get(callSid);
    if (cached && cached.tenantId === tenantId) {
      return cached;
    }
    return this.prepareCall(callSid, tenantId);
  }

  private async synthesize(
    prepared: PreparedCall,
    text: string,
    logContext: Record<string, unknown>,
  ): Promise<Buffer> {
    try {
      const result = await invokeWithFallback(
        prepared.providers.tts,
        (provider, signal) => provider.synthesize(text, { signal, logContext }),
        { timeoutMs: this.settings.providerTimeoutMs, tenantId: prepared.tenantId, logContext },
      );
      return synthesisToTelephony(result.value.audio, result.value.format, result.value.sampleRateHz);
    } catch (error) {
      log.warn({ event: 'utterance_synthesis_failed', ...logContext, err: error }, 'utterance synthesis failed');
      return Buffer.alloc(0);
    }
  }

  private async retrieveContext(
    prepared: PreparedCall,
    query: string,
    logContext: Record<string, unknown>,
  ): Promise<string> {
    const retriever = this.retriever;
    if (!retriever) {
      throw new RetrievalError('no knowledge retriever configured', { tenant_id: prepared.tenantId });
    }

    let vector: number[] | undefined;
    if (prepared.providers.embedding) {
      const embedded = await invokeWithFallback(
        prepared.providers.embedding,
        (provider, signal) => provider.embed([query], { signal, logContext }),
        { timeoutMs: this.settings.providerTimeoutMs, tenantId: prepared.tenantId, logContext },
      );
      vector = embedded.value.vectors[0];
    }

    const passages = await withTimeout('knowledge', this.settings.providerTimeoutMs, (signal) =>
      retriever.search(query, prepared.tenantId, prepared.agent.topK, { vector, signal }),
    );
    return formatKnowledgeContext(passages);
  }

  private recordStageError(turn: TurnState, stage: StageName, error: unknown): void {
    turn.stageErrors.push(stage);
    turn.flags.add('stage-error');
    incStageError(stage, turn.tenantId);
    log.error(
      {
        event: 'pipeline_stage_error',
        stage,
        call_sid: turn.callSid,
        tenant_id: turn.tenantId,
        code: error instanceof StageError ? error.code : undefined,
        err: error,
      },
      'pipeline stage failed',
    );
  }

  private finish(
    turn: TurnState,
    outcome: { transcript: string; responseText: string; responseAudio: Buffer },
  ): PipelineResult {
    const latencyMs = this.now() - turn.startedAt;
    const latencyBreakdown: LatencyBreakdown = { ...turn.latency };

    observeStageDuration('stt', turn.tenantId, latencyBreakdown.stt);
    observeStageDuration('rag', turn.tenantId, latencyBreakdown.rag);
    observeStageDuration('llm', turn.tenantId, latencyBreakdown.llm);
    observeStageDuration('tts', turn.tenantId, latencyBreakdown.tts);
    observeStageDuration('total', turn.tenantId, latencyMs);

    const logFields = {
      call_sid: turn.callSid,
      tenant_id: turn.tenantId,
      latency_ms: latencyMs,
      stt_ms: latencyBreakdown.stt,
      rag_ms: latencyBreakdown.rag,
      llm_ms: latencyBreakdown.llm,
      tts_ms: latencyBreakdown.tts,
      flags: [...turn.flags],
    };
    if (latencyMs > this.settings.latencyBudgetMs) {
      log.warn(
        { event: 'pipeline_latency_budget_exceeded', budget_ms: this.settings.latencyBudgetMs, ...logFields },
        'pipeline latency budget exceeded',
      );
    } else {
      log.debug({ event: 'pipeline_latency', ...logFields }, 'pipeline latency');
    }

    return Object.freeze({
      responseAudio: outcome.responseAudio,
      transcript: outcome.transcript,
      responseText: outcome.responseText,
      latencyMs,
      latencyBreakdown: Object.freeze(latencyBreakdown),
      flags: Object.freeze([...turn.flags]),
      stageErrors: Object.freeze([...turn.stageErrors]),
    });
  }
}
