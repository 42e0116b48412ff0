// LLM component binding
import type { AppConfig, LLMComponent, OptionMap } from '@pipeline-llm/shared';
import { ClaudeLLMAdapter } from './claude.js';
import { ConfigurationError } from './errors.js';

export { ClaudeLLMAdapter } from './claude.js';
export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  mergeOptions,
  resolveApiKey,
  resolveSystemPrompt,
  validateMergedOptions,
} from './options.js';
export {
  buildMessages,
  type ContentSegment,
  extractText,
  type MessagesRequest,
  toMessagesRequest,
} from './messages.js';
export { loadAnthropicSDK, type AnthropicConstructor } from './sdk.js';

// Export error types
export {
  LLMError,
  ConfigurationError,
  DependencyMissingError,
  LLMValidationError,
  isLLMError,
} from './errors.js';

/**
 * Create an LLM component for a pipeline.
 * Provider defaults come from `appConfig.providers[provider]`.
 * @throws {ConfigurationError} When provider is unknown
 */
export function createLLMComponent(
  provider: string,
  componentKey: string,
  appConfig: AppConfig,
  options?: OptionMap,
): LLMComponent {
  switch (provider) {
    case 'claude':
      return new ClaudeLLMAdapter(
        componentKey,
        appConfig,
        appConfig.providers.claude,
        options,
      );

    default:
      throw new ConfigurationError(
        `Unknown LLM provider: ${provider}. Supported providers: claude`,
      );
  }
}
