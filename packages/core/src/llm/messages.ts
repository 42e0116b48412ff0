// Message construction and reply normalization for the Messages API
import type { ChatMessage, MergedLLMOptions } from '@pipeline-llm/shared';

/** One unit of a model reply; only `text` segments carry text */
export interface ContentSegment {
  type: string;
  text?: string;
}

export interface MessagesRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system?: string;
  messages: Array<{ role: 'user'; content: string }>;
}

/**
 * Build the ordered message sequence for one call: an optional system
 * entry followed by the transcript as the user turn
 */
export function buildMessages(
  transcript: string,
  systemPrompt?: string,
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push({ role: 'user', content: transcript });
  return messages;
}

/**
 * Shape a message sequence into a Messages API request.
 *
 * The API takes the system prompt as a top-level parameter, so system
 * entries are lifted out of `messages` (joined by blank lines if several).
 */
export function toMessagesRequest(
  messages: ChatMessage[],
  options: MergedLLMOptions,
): MessagesRequest {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content);
  const turns = messages
    .filter((m) => m.role === 'user')
    .map((m) => ({ role: 'user' as const, content: m.content }));

  const request: MessagesRequest = {
    model: options.model,
    max_tokens: options.max_tokens,
    temperature: options.temperature,
    messages: turns,
  };
  if (system.length > 0) {
    request.system = system.join('\n\n');
  }
  return request;
}

/**
 * Concatenate text segments in reply order and trim the result.
 * Non-text segments (tool use and the like) are skipped.
 */
export function extractText(
  segments: readonly ContentSegment[] | null | undefined,
): string {
  const parts: string[] = [];
  for (const segment of segments ?? []) {
    if (segment.type === 'text') {
      parts.push(segment.text ?? '');
    }
  }
  return parts.join('').trim();
}
