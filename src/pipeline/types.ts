import type { StageName } from '../errors';

export type PipelineFlag = 'no-context' | 'silent-response' | 'stage-error' | 'filler-response';

export interface LatencyBreakdown {
  stt: number;
  rag: number;
  llm: number;
  tts: number;
}

export interface PipelineResult {
  /** 8 kHz mu-law, empty when nothing should be played. */
  readonly responseAudio: Buffer;
  readonly transcript: string;
  readonly responseText: string;
  readonly latencyMs: number;
  readonly latencyBreakdown: Readonly<LatencyBreakdown>;
  readonly flags: readonly PipelineFlag[];
  readonly stageErrors: readonly StageName[];
}
