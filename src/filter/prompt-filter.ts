import { performance } from 'perf_hooks';
import { findSections, MINIMAL_ENV_STUB } from './section-extractor.js';
import { estimateTokens } from './token-estimator.js';
import type { FilterOutcome } from './types.js';

/**
 * Strip project trees, environment blocks and instruction-file blocks from a
 * system prompt and inject the minimal environment stub.
 *
 * The stub takes the place of the first removed environment block; when no
 * environment block was removed it is appended to the end. Every filtered
 * prompt gets the stub, even when nothing was removed.
 */
export function filterPrompt(text: string): FilterOutcome {
  const startedAt = performance.now();
  const originalChars = text.length;
  const originalTokens = estimateTokens(text);

  const removedSections = findSections(text);

  const parts: string[] = [];
  let cursor = 0;
  let keptChars = 0;
  let stubOffset: number | null = null;

  for (const section of removedSections) {
    const gap = text.slice(cursor, section.start);
    parts.push(gap);
    keptChars += gap.length;

    if (section.kind === 'environment-block' && stubOffset === null) {
      stubOffset = keptChars;
      parts.push(MINIMAL_ENV_STUB);
    }

    cursor = section.end;
  }

  const tail = text.slice(cursor);
  parts.push(tail);
  keptChars += tail.length;

  if (stubOffset === null) {
    stubOffset = keptChars;
    parts.push(MINIMAL_ENV_STUB);
  }

  const filteredText = parts.join('');
  const elapsedMs = performance.now() - startedAt;

  return {
    originalText: text,
    filteredText,
    removedSections,
    originalChars,
    filteredChars: filteredText.length,
    originalTokens,
    filteredTokens: estimateTokens(filteredText),
    elapsedMs,
    stubOffset,
  };
}
