import { z } from 'zod';

/** One telephony media frame: 20 ms of 8 kHz mu-law. */
export const TELEPHONY_FRAME_BYTES = 160;

const ConnectedEventSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
  version: z.string().optional(),
});

const StartEventSchema = z.object({
  event: z.literal('start'),
  streamSid: z.string().min(1).optional(),
  callSid: z.string().min(1).optional(),
  start: z
    .object({
      streamSid: z.string().min(1).optional(),
      callSid: z.string().min(1).optional(),
      accountSid: z.string().min(1).optional(),
      customParameters: z.record(z.string()).optional(),
      mediaFormat: z
        .object({
          encoding: z.string().optional(),
          sampleRate: z.number().int().positive().optional(),
          channels: z.number().int().positive().optional(),
        })
        .optional(),
    })
    .optional(),
});

const MediaEventSchema = z.object({
  event: z.literal('media'),
  streamSid: z.string().optional(),
  media: z.object({
    payload: z.string(),
    track: z.string().optional(),
    chunk: z.union([z.string(), z.number()]).optional(),
    timestamp: z.union([z.string(), z.number()]).optional(),
  }),
});

const StopEventSchema = z.object({
  event: z.literal('stop'),
  streamSid: z.string().optional(),
  stop: z.object({ callSid: z.string().optional() }).optional(),
});

const MarkEventSchema = z.object({
  event: z.literal('mark'),
  streamSid: z.string().optional(),
  mark: z.object({ name: z.string().optional() }).optional(),
});

const InboundMessageSchema = z.discriminatedUnion('event', [
  ConnectedEventSchema,
  StartEventSchema,
  MediaEventSchema,
  StopEventSchema,
  MarkEventSchema,
]);

const KNOWN_EVENTS = new Set(['connected', 'start', 'media', 'stop', 'mark']);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;
export type StartEvent = z.infer<typeof StartEventSchema>;
export type MediaEvent = z.infer<typeof MediaEventSchema>;

export type IgnoredReason = 'invalid_json' | 'unknown_event' | 'invalid_shape';

export type ParsedInbound =
  | { ok: true; message: InboundMessage }
  | { ok: false; reason: IgnoredReason; event?: string; detail?: string };

export function parseInboundMessage(raw: string): ParsedInbound {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  const event =
    data && typeof data === 'object' && 'event' in data && typeof data.event === 'string' ? data.event : undefined;
  if (!event || !KNOWN_EVENTS.has(event)) {
    return { ok: false, reason: 'unknown_event', event };
  }

  const parsed = InboundMessageSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    return { ok: false, reason: 'invalid_shape', event, detail };
  }
  return { ok: true, message: parsed.data };
}

export interface StartInfo {
  streamSid?: string;
  callSid?: string;
  accountSid?: string;
  customParameters: Record<string, string>;
  encoding?: string;
  sampleRateHz?: number;
}

/** Accepts identifiers at the top level or nested under `start`; nested wins. */
export function readStartInfo(message: StartEvent): StartInfo {
  const nested = message.start;
  return {
    streamSid: nested?.streamSid ?? message.streamSid,
    callSid: nested?.callSid ?? message.callSid,
    accountSid: nested?.accountSid,
    customParameters: { ...(nested?.customParameters ?? {}) },
    encoding: nested?.mediaFormat?.encoding,
    sampleRateHz: nested?.mediaFormat?.sampleRate,
  };
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeMediaPayload(payload: string): Buffer {
  const trimmed = payload.trim();
  if (trimmed === '' || trimmed.length % 4 === 1 || !BASE64_RE.test(trimmed)) {
    return Buffer.alloc(0);
  }
  return Buffer.from(trimmed, 'base64');
}

export function buildOutboundMedia(streamSid: string, audio: Buffer): string {
  return JSON.stringify({ event: 'media', streamSid, media: { payload: audio.toString('base64') } });
}

export function buildMark(streamSid: string, name: string): string {
  return JSON.stringify({ event: 'mark', streamSid, mark: { name } });
}

/** Splits mu-law audio into chunks that end on 20 ms frame boundaries. */
export function chunkTelephonyAudio(audio: Buffer, chunkBytes: number): Buffer[] {
  const frames = Math.max(1, Math.floor(chunkBytes / TELEPHONY_FRAME_BYTES));
  const size = frames * TELEPHONY_FRAME_BYTES;
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < audio.length; offset += size) {
    chunks.push(audio.subarray(offset, Math.min(offset + size, audio.length)));
  }
  return chunks;
}
