// Configuration types and validation for pipeline LLM components
import type { ZodError } from 'zod';
import {
  type AppConfig,
  AppConfigSchema,
  type LLMOptions,
  LLMOptionsSchema,
} from './schemas.js';

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ZodError['errors'],
  ) {
    super(message);
    this.name = 'ConfigValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return formatIssues(this.errors);
  }
}

function formatIssues(errors: ZodError['errors']): string {
  return errors
    .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
    .join('\n');
}

/**
 * Read an environment variable, treating the empty string as unset
 */
function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value ? value : undefined;
}

/**
 * Build raw configuration from environment variables
 * This creates an unvalidated config object
 */
function buildRawConfig(): Record<string, unknown> {
  const claude: Record<string, unknown> = {};
  const apiKey = readEnv('CLAUDE_API_KEY') ?? readEnv('ANTHROPIC_API_KEY');
  if (apiKey) claude.api_key = apiKey;
  const model = readEnv('CLAUDE_MODEL');
  if (model) claude.model = model;

  const llm: Record<string, unknown> = {};
  const prompt = readEnv('LLM_PROMPT');
  if (prompt) llm.prompt = prompt;

  return {
    llm,
    providers: { claude },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge configuration objects
 */
function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!overrides) return base;

  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const value = overrides[key];
    const current = base[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      result[key] = deepMerge(current, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export type AppConfigOverrides = {
  llm?: AppConfig['llm'];
  providers?: Partial<AppConfig['providers']>;
};

/**
 * Load and validate application configuration from the environment
 * @throws {ConfigValidationError} When configuration is invalid
 */
export function loadConfig(overrides?: AppConfigOverrides): AppConfig {
  const merged = deepMerge(buildRawConfig(), overrides);

  const result = AppConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration:\n${formatIssues(result.error.errors)}`,
      result.error.errors,
    );
  }

  return result.data;
}

/**
 * Validate an application config built elsewhere
 */
export function validateAppConfig(config: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid application configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate an LLM option map (any configuration layer)
 */
export function validateLLMOptions(options: unknown): LLMOptions {
  const result = LLMOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid LLM options: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}
