// Bracketed execution of a single LLM call
import type {
  LLMComponent,
  LLMResponse,
  OptionMap,
} from '@pipeline-llm/shared';

export interface LLMCallRequest {
  callId: string;
  transcript: string;
  context?: Record<string, unknown>;
  options?: OptionMap;
}

/**
 * Run one generation through a component's per-call hooks:
 * `openCall` → `generate` → `closeCall`. `closeCall` runs even when
 * `generate` rejects, and the rejection reaches the caller unchanged.
 */
export async function runLLMCall(
  component: LLMComponent,
  request: LLMCallRequest,
): Promise<LLMResponse> {
  const options = request.options ?? {};

  await component.openCall(request.callId, options);
  try {
    return await component.generate(
      request.callId,
      request.transcript,
      request.context ?? {},
      options,
    );
  } finally {
    await component.closeCall(request.callId);
  }
}
