// Core type definitions for pipeline LLM components

/** A caller-supplied option mapping at any configuration layer */
export type OptionMap = Record<string, unknown>;

// Messages
export type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

// Responses
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponseMetadata {
  model: string;
  stopReason?: string | null;
  usage?: TokenUsage;
  [key: string]: unknown;
}

export interface LLMResponse {
  text: string;
  toolCalls: ToolCall[];
  metadata: LLMResponseMetadata;
}

/**
 * Contract every LLM component in a pipeline satisfies.
 *
 * The orchestrator calls `start` once before any generation and `stop` at
 * teardown. Each generation is bracketed by `openCall` and `closeCall`;
 * `closeCall` runs whether `generate` resolved or rejected.
 */
export interface LLMComponent {
  readonly componentKey: string;

  start(): Promise<void>;

  /** Must tolerate repeated calls and calls without a prior `start` */
  stop(): Promise<void>;

  openCall(callId: string, options: OptionMap): Promise<void>;

  closeCall(callId: string): Promise<void>;

  generate(
    callId: string,
    transcript: string,
    context: Record<string, unknown>,
    options: OptionMap,
  ): Promise<LLMResponse>;
}
