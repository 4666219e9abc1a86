import pino from 'pino';
import { env } from './env';

export const log = pino({
  name: 'call-pipeline-runtime',
  level: env.LOG_LEVEL,
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});
