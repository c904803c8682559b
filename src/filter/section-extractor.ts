import type { SectionKind, SectionMatch } from './types.js';

/**
 * Replacement environment block injected into every filtered system prompt.
 * The values are literal placeholders; nothing here resolves the real
 * working directory or date.
 */
export const MINIMAL_ENV_STUB = `<env>
  Working directory: (current directory)
  Platform: linux
  Today's date: (current date)
</env>`;

interface SectionPattern {
  kind: SectionKind;
  pattern: RegExp;
}

// Non-greedy: each match ends at the first closing marker (or blank line)
// after its opening marker.
const SECTION_PATTERNS: SectionPattern[] = [
  { kind: 'project-tree', pattern: /<project>[\s\S]*?<\/project>/g },
  { kind: 'environment-block', pattern: /<env>[\s\S]*?<\/env>/g },
  { kind: 'instructions-block', pattern: /Instructions from:[\s\S]*?(?=\n\n|$)/g },
];

function findKind(text: string, { kind, pattern }: SectionPattern): SectionMatch[] {
  const matches: SectionMatch[] = [];

  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    const matched = match[0];

    // Our own stub is never a removable section, including when an unclosed
    // <env> earlier in the text makes the match start before it
    if (kind === 'environment-block' && matched.endsWith(MINIMAL_ENV_STUB)) {
      continue;
    }

    matches.push({ kind, text: matched, start, end: start + matched.length });
  }

  return matches;
}

/**
 * Locate every removable section in a system prompt.
 *
 * Each kind is scanned over the whole text on its own. The combined list is
 * ordered by start offset; when two candidates overlap, the one that starts
 * first is kept and the other dropped.
 */
export function findSections(text: string): SectionMatch[] {
  if (!text) return [];

  const candidates = SECTION_PATTERNS
    .flatMap(pattern => findKind(text, pattern))
    .sort((a, b) => a.start - b.start);

  const sections: SectionMatch[] = [];
  let lastEnd = 0;

  for (const candidate of candidates) {
    if (candidate.start < lastEnd) {
      continue;
    }
    sections.push(candidate);
    lastEnd = candidate.end;
  }

  return sections;
}
