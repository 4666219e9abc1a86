import type { TranscriptMessage } from '../calls/types';
import type { ChatMessage } from '../providers/types';

export function buildSystemPrompt(systemPrompt: string, context: string): string {
  const trimmed = context.trim();
  return trimmed ? `${systemPrompt}\n\n${trimmed}` : systemPrompt;
}

/**
 * System prompt (with retrieved context appended), then the working window
 * oldest first, then the new caller transcript as the final user message.
 */
export function buildPromptMessages(
  systemPrompt: string,
  context: string,
  window: readonly TranscriptMessage[],
  transcript: string,
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: buildSystemPrompt(systemPrompt, context) }];
  for (const turn of window) {
    messages.push({ role: turn.role === 'caller' ? 'user' : 'assistant', content: turn.text });
  }
  messages.push({ role: 'user', content: transcript });
  return messages;
}
