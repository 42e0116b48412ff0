// Claude LLM component
import type Anthropic from '@anthropic-ai/sdk';
import type {
  AppConfig,
  LLMComponent,
  LLMResponse,
  OptionMap,
} from '@pipeline-llm/shared';
import { ConfigurationError, DependencyMissingError } from './errors.js';
import { buildMessages, extractText, toMessagesRequest } from './messages.js';
import {
  mergeOptions,
  resolveApiKey,
  resolveSystemPrompt,
  validateMergedOptions,
} from './options.js';
import {
  ANTHROPIC_SDK,
  type AnthropicConstructor,
  loadAnthropicSDK,
} from './sdk.js';

const PREVIEW_LENGTH = 80;

/**
 * Claude chat adapter for pipeline use.
 *
 * Options (provider defaults < pipeline defaults < per-call):
 *   - model: Claude model name (default: claude-3-5-sonnet-20240620)
 *   - temperature: number (default 0.6)
 *   - max_tokens: integer (default 256)
 *   - system: optional system prompt (falls back to appConfig.llm.prompt)
 *   - api_key: Anthropic API key (falls back to provider defaults)
 *
 * The client is built on the first `generate` with the key resolved for
 * that call and reused until `stop`, even if later calls resolve a
 * different key.
 */
export class ClaudeLLMAdapter implements LLMComponent {
  private readonly providerDefaults: OptionMap;
  private readonly pipelineDefaults: OptionMap;
  // undefined until resolved; null when the SDK is not installed
  private sdk: AnthropicConstructor | null | undefined;
  private client: Anthropic | undefined;

  constructor(
    readonly componentKey: string,
    private readonly appConfig: AppConfig,
    providerConfig?: OptionMap,
    options?: OptionMap,
  ) {
    this.providerDefaults = providerConfig ?? {};
    this.pipelineDefaults = options ?? {};
  }

  async start(): Promise<void> {
    const sdk = await this.resolveSDK();
    if (!sdk) {
      console.warn(
        `[${this.componentKey}] ${ANTHROPIC_SDK} not installed; Claude adapter will not run`,
      );
      return;
    }
    console.debug(`[${this.componentKey}] Claude LLM adapter initialized`);
  }

  async stop(): Promise<void> {
    this.client = undefined;
  }

  async openCall(_callId: string, _options: OptionMap): Promise<void> {
    // Client is created lazily on first generate; no per-call prep needed
  }

  async closeCall(_callId: string): Promise<void> {}

  /**
   * Generate a reply to the transcript
   * @throws {ConfigurationError} When no api_key resolves at any layer
   * @throws {LLMValidationError} When merged options are invalid
   * @throws {DependencyMissingError} When the SDK is not installed
   */
  async generate(
    callId: string,
    transcript: string,
    _context: Record<string, unknown>,
    options: OptionMap,
  ): Promise<LLMResponse> {
    const layered = mergeOptions(
      this.providerDefaults,
      this.pipelineDefaults,
      options,
    );

    const apiKey = resolveApiKey(layered, this.providerDefaults);
    if (!apiKey) {
      throw new ConfigurationError(
        'Claude LLM requires an api_key (set CLAUDE_API_KEY or pipeline options.api_key)',
      );
    }

    const merged = validateMergedOptions(layered);

    const client = await this.getClient(apiKey);

    const messages = buildMessages(
      transcript,
      resolveSystemPrompt(merged, this.appConfig),
    );

    // No abort signal: a dispatched request runs to completion
    const response = await client.messages.create(
      toMessagesRequest(messages, merged),
    );

    const text = extractText(response.content);
    console.debug(
      `[${this.componentKey}] Claude response call=${callId} model=${merged.model}: ${text.slice(0, PREVIEW_LENGTH)}`,
    );

    return {
      text,
      toolCalls: [],
      metadata: {
        model: merged.model,
        stopReason: response.stop_reason,
        usage: response.usage
          ? {
              inputTokens: response.usage.input_tokens,
              outputTokens: response.usage.output_tokens,
            }
          : undefined,
      },
    };
  }

  private async resolveSDK(): Promise<AnthropicConstructor | null> {
    if (this.sdk === undefined) {
      this.sdk = await loadAnthropicSDK();
    }
    return this.sdk;
  }

  private async getClient(apiKey: string): Promise<Anthropic> {
    const AnthropicSDK = await this.resolveSDK();
    if (!AnthropicSDK) {
      throw new DependencyMissingError(
        `${ANTHROPIC_SDK} is not installed. Run \`npm install ${ANTHROPIC_SDK}\`.`,
        ANTHROPIC_SDK,
      );
    }
    this.client ??= new AnthropicSDK({ apiKey });
    return this.client;
  }
}
