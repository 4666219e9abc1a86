import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const optionalString = z.preprocess(emptyToUndefined, z.string().min(1).optional());

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  PUBLIC_BASE_URL: z.string().min(1),
  MEDIA_STREAM_TOKEN: z.string().min(1),
  REDIS_URL: z.string().min(1),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  TENANTMAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('tenantmap')),
  TENANTCFG_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('tenantcfg')),
  CALL_TENANT_TTL_SECONDS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(3600),
  ),

  BUFFER_FLUSH_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(2000)),
  FRAME_DURATION_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(20)),
  FRAME_DURATION_MODE: z.preprocess(
    emptyToUndefined,
    z.enum(['fixed', 'sample_accurate']).default('fixed'),
  ),
  OUTBOUND_CHUNK_BYTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(3200),
  ),
  HISTORY_WINDOW_SIZE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10)),
  LATENCY_BUDGET_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(2000)),
  PROVIDER_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(8000),
  ),
  STOP_FLUSH_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(15000),
  ),
  FILLER_TEXT: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default("Sorry, I didn't catch that. Could you say it again?"),
  ),
  DEFAULT_GREETING: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('Hello! Thanks for calling. How can I help you today?'),
  ),

  RAG_SCORE_THRESHOLD: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(1).default(0.5)),
  KNOWLEDGE_SEARCH_URL: optionalString,
  KNOWLEDGE_API_KEY: optionalString,

  CONTROL_PLANE_URL: optionalString,
  CONTROL_PLANE_API_KEY: optionalString,
  CONTROL_PLANE_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(5000),
  ),

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess(emptyToUndefined, z.string().min(1).default('https://api.openai.com/v1')),
  GROQ_API_KEY: optionalString,
  GROQ_BASE_URL: z.preprocess(emptyToUndefined, z.string().min(1).default('https://api.groq.com/openai/v1')),
  ELEVENLABS_API_KEY: optionalString,
  ELEVENLABS_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('https://api.elevenlabs.io/v1'),
  ),
  WHISPER_URL: optionalString,
  KOKORO_URL: optionalString,
  KOKORO_VOICE_ID: optionalString,

  HEALTH_DEEP_TENANT_ID: optionalString,
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = parsed.data;
