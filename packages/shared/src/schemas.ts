// Zod schemas for adapter options and application configuration
import { z } from 'zod';

/**
 * Option keys an LLM component recognizes. Unknown keys pass through
 * untouched so a pipeline can carry provider-specific extras.
 */
export const LLMOptionsSchema = z
  .object({
    model: z.string().min(1, 'model cannot be empty').optional(),
    temperature: z.number().min(0).max(1).optional(),
    max_tokens: z
      .number()
      .int('max_tokens must be a positive integer')
      .positive('max_tokens must be a positive integer')
      .optional(),
    // null reads as unset so the fallback applies
    system: z.string().nullish(),
    api_key: z.string().nullish(),
  })
  .passthrough();

/**
 * Options after the three-layer merge: the fallback keys are always set
 */
export const MergedLLMOptionsSchema = LLMOptionsSchema.extend({
  model: z.string().min(1, 'model cannot be empty'),
  temperature: z.number().min(0).max(1),
  max_tokens: z
    .number()
    .int('max_tokens must be a positive integer')
    .positive('max_tokens must be a positive integer'),
});

export const LLMSettingsSchema = z.object({
  prompt: z.string().optional(),
});

export const ProvidersConfigSchema = z.object({
  claude: LLMOptionsSchema.default({}),
});

export const AppConfigSchema = z.object({
  llm: LLMSettingsSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
});

export type LLMOptions = z.infer<typeof LLMOptionsSchema>;
export type MergedLLMOptions = z.infer<typeof MergedLLMOptionsSchema>;
export type LLMSettings = z.infer<typeof LLMSettingsSchema>;
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
