import { log } from '../log';

export function logCallEvent(event: string, payload: Record<string, unknown> = {}): void {
  log.info({ event, ...payload }, event.replace(/_/g, ' '));
}

export function previewText(text: string, maxChars = 160): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars - 3)}...`;
}
