/**
 * Models that get their system prompts trimmed. Colon and hyphen spellings
 * are separate entries: matching is exact and case-sensitive, so every
 * variant a client might send has to be listed.
 */
export const DEFAULT_FILTER_MODELS: readonly string[] = [
  'llama3.2:1b',
  'llama3.2-1b',
  'qwen2.5:1.5b',
  'qwen2.5-1.5b',
];

export function shouldFilter(modelId: string, allowList: Iterable<string>): boolean {
  for (const entry of allowList) {
    if (entry === modelId) {
      return true;
    }
  }
  return false;
}
