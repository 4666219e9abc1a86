import type { Response } from 'undici';

const PREVIEW_CHARS = 500;

export async function readResponseText(response: Pick<Response, 'text'>): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

export function previewBody(body: string, maxChars = PREVIEW_CHARS): string {
  return body.length > maxChars ? `${body.slice(0, maxChars)}...` : body;
}

export function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

export function bearer(apiKey: string): Record<string, string> {
  return { Authorization: `Bearer ${apiKey}` };
}
