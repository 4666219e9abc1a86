/**
 * Call records in the control plane: one record at stream start, then the
 * final status, duration and transcript at teardown. Failures are logged
 * and never propagate to the call.
 */

import { fetch } from 'undici';
import { env } from '../env';
import { log } from '../log';
import { previewBody, readResponseText, trimBaseUrl } from '../providers/http';
import type { CallFinalStatus, CallSid, TranscriptMessage } from '../calls/types';

export interface CallStartRecord {
  callSid: CallSid;
  tenantId: string;
  streamSid?: string;
  from?: string;
  to?: string;
  startedAt: Date;
}

export interface CallPersistence {
  recordCallStart(record: CallStartRecord): Promise<void>;
  finalizeCall(
    callSid: CallSid,
    tenantId: string | undefined,
    status: CallFinalStatus,
    durationSeconds: number,
    transcript: readonly TranscriptMessage[],
  ): Promise<void>;
}

export function formatTranscript(transcript: readonly TranscriptMessage[]): string {
  return transcript.map((message) => `${message.role === 'caller' ? 'Caller' : 'Agent'}: ${message.text}`).join('\n');
}

export class ControlPlaneCallPersistence implements CallPersistence {
  private readonly baseUrl?: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: { baseUrl?: string; apiKey?: string; timeoutMs?: number } = {}) {
    const baseUrl = options.baseUrl ?? env.CONTROL_PLANE_URL;
    this.baseUrl = baseUrl ? trimBaseUrl(baseUrl) : undefined;
    this.apiKey = options.apiKey ?? env.CONTROL_PLANE_API_KEY;
    this.timeoutMs = options.timeoutMs ?? env.CONTROL_PLANE_TIMEOUT_MS;
  }

  public get configured(): boolean {
    return Boolean(this.baseUrl && this.apiKey);
  }

  public async recordCallStart(record: CallStartRecord): Promise<void> {
    await this.post(record.callSid, 'start', {
      tenantId: record.tenantId,
      callId: record.callSid,
      action: 'start',
      callState: {
        streamSid: record.streamSid,
        callerId: record.from,
        dialed: record.to,
        stage: 'start',
        startedAt: record.startedAt.toISOString(),
      },
    });
  }

  public async finalizeCall(
    callSid: CallSid,
    tenantId: string | undefined,
    status: CallFinalStatus,
    durationSeconds: number,
    transcript: readonly TranscriptMessage[],
  ): Promise<void> {
    await this.post(callSid, 'end', {
      tenantId,
      callId: callSid,
      action: 'end',
      status,
      durationSeconds,
      transcript: formatTranscript(transcript),
      callState: {
        stage: 'end',
        history: transcript.map((message) => ({
          role: message.role,
          content: message.text,
          timestamp: message.timestamp.toISOString(),
        })),
      },
    });
  }

  private async post(callSid: CallSid, action: 'start' | 'end', body: Record<string, unknown>): Promise<void> {
    if (!this.baseUrl || !this.apiKey) return;

    try {
      const response = await fetch(`${this.baseUrl}/api/runtime/calls`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Admin-Key': this.apiKey },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const text = await readResponseText(response);
      if (!response.ok) {
        log.warn(
          {
            event: 'control_plane_report_failed',
            action,
            status: response.status,
            body: previewBody(text, 200),
            call_sid: callSid,
          },
          'control plane report failed',
        );
        return;
      }
      log.info({ event: 'control_plane_report_ok', action, call_sid: callSid }, 'call reported to control plane');
    } catch (error) {
      log.warn(
        { event: 'control_plane_report_error', action, timeout_ms: this.timeoutMs, err: error, call_sid: callSid },
        'control plane report error',
      );
    }
  }
}
