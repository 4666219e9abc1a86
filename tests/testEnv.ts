const defaults: Record<string, string> = {
  PORT: '3000',
  PUBLIC_BASE_URL: 'https://voice.example.test',
  MEDIA_STREAM_TOKEN: 'test-secret',
  REDIS_URL: 'redis://localhost:6379',
  LOG_LEVEL: 'silent',
  TENANTMAP_PREFIX: 'tenantmap',
  TENANTCFG_PREFIX: 'tenantcfg',
  BUFFER_FLUSH_MS: '2000',
  FRAME_DURATION_MS: '20',
  HISTORY_WINDOW_SIZE: '10',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
