export type StageName = 'stt' | 'llm' | 'tts';

export class PipelineRuntimeError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(code: string, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Transport closed or protocol violated. Terminates only the affected call. */
export class ConnectionError extends PipelineRuntimeError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('connection_error', message, details, options);
  }
}

export class StageError extends PipelineRuntimeError {
  public readonly stage: StageName;

  constructor(stage: StageName, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(`${stage}_stage_error`, message, { stage, ...details }, options);
    this.stage = stage;
  }
}

/** Always degrades to "no context"; never surfaced as a failure. */
export class RetrievalError extends PipelineRuntimeError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('retrieval_error', message, details, options);
  }
}

export class ConfigurationError extends PipelineRuntimeError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('configuration_error', message, details, options);
  }
}

export class UnsupportedFormatError extends PipelineRuntimeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('unsupported_format', message, details);
  }
}

export class ProviderError extends PipelineRuntimeError {
  constructor(providerId: string, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('provider_error', `${providerId}: ${message}`, { provider_id: providerId, ...details }, options);
  }
}

export class ProviderTimeoutError extends PipelineRuntimeError {
  constructor(providerId: string, timeoutMs: number) {
    super('provider_timeout', `${providerId}: timed out after ${timeoutMs}ms`, {
      provider_id: providerId,
      timeout_ms: timeoutMs,
    });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
