// Option layering for LLM components
import {
  type AppConfig,
  type MergedLLMOptions,
  MergedLLMOptionsSchema,
  type OptionMap,
} from '@pipeline-llm/shared';
import { LLMValidationError } from './errors.js';

export const DEFAULT_MODEL = 'claude-3-5-sonnet-20240620';
export const DEFAULT_TEMPERATURE = 0.6;
export const DEFAULT_MAX_TOKENS = 256;

const FALLBACKS: Readonly<OptionMap> = {
  model: DEFAULT_MODEL,
  temperature: DEFAULT_TEMPERATURE,
  max_tokens: DEFAULT_MAX_TOKENS,
};

/**
 * Shallow three-layer merge: provider defaults, then pipeline defaults,
 * then runtime options, later layers winning. Fallbacks fill `model`,
 * `temperature` and `max_tokens` only where the merge left them unset.
 *
 * Always returns a fresh object; none of the inputs is modified.
 */
export function mergeOptions(
  providerDefaults: OptionMap,
  pipelineDefaults: OptionMap,
  runtime: OptionMap = {},
): OptionMap {
  const merged: OptionMap = {
    ...providerDefaults,
    ...pipelineDefaults,
    ...runtime,
  };
  for (const [key, value] of Object.entries(FALLBACKS)) {
    if (merged[key] === undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Validate merged options against the recognized keys
 * @throws {LLMValidationError} Naming the first offending field
 */
export function validateMergedOptions(merged: OptionMap): MergedLLMOptions {
  const result = MergedLLMOptionsSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : undefined;
    throw new LLMValidationError(
      `Invalid LLM options: ${result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
      field,
    );
  }
  return result.data;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * API key from the merged options, else from provider defaults.
 * Empty strings, null and non-string values count as missing.
 * Works on the raw merge so a missing key is reported ahead of
 * invalid sibling options.
 */
export function resolveApiKey(
  merged: OptionMap,
  providerDefaults: OptionMap,
): string | undefined {
  return (
    nonEmptyString(merged.api_key) ?? nonEmptyString(providerDefaults.api_key)
  );
}

/**
 * System prompt from the merged options, else the global `llm.prompt`
 */
export function resolveSystemPrompt(
  merged: MergedLLMOptions,
  appConfig: AppConfig,
): string | undefined {
  return merged.system || appConfig.llm.prompt || undefined;
}
