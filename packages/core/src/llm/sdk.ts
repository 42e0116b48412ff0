// Optional loading of the Anthropic SDK
import type Anthropic from '@anthropic-ai/sdk';

export const ANTHROPIC_SDK = '@anthropic-ai/sdk';

export type AnthropicConstructor = typeof Anthropic;

/**
 * True only when `specifier` itself cannot be resolved. A broken import
 * inside an installed package also raises ERR_MODULE_NOT_FOUND, but names
 * the inner dependency and must propagate.
 */
export function isMissingPackage(error: unknown, specifier: string): boolean {
  if (
    !(error instanceof Error) ||
    !('code' in error) ||
    (error.code !== 'ERR_MODULE_NOT_FOUND' && error.code !== 'MODULE_NOT_FOUND')
  ) {
    return false;
  }
  return (
    error.message.includes(`Cannot find package '${specifier}'`) ||
    error.message.includes(`Cannot find module '${specifier}'`)
  );
}

/**
 * Import the SDK on demand.
 * @returns The client constructor, or null when the package is not installed
 */
export async function loadAnthropicSDK(): Promise<AnthropicConstructor | null> {
  try {
    const sdk = await import('@anthropic-ai/sdk');
    return sdk.default;
  } catch (error) {
    if (isMissingPackage(error, ANTHROPIC_SDK)) {
      return null;
    }
    throw error;
  }
}
