import { estimateTokens } from './token-estimator.js';
import type { FilterOutcome, RequestStats, SectionMatch } from './types.js';

export type FilterEventType =
  | 'filter_start'
  | 'original_prompt'
  | 'section_removed'
  | 'filtered_prompt'
  | 'filter_summary'
  | 'passthrough';

export interface FilterEvent {
  type: FilterEventType;
  data: Record<string, unknown>;
  /** Human-readable rendering of the record. */
  text: string;
}

export interface ReporterConfig {
  /** When off, only the start and summary records are produced. */
  detailedLogging: boolean;
  showFullFilteredContent: boolean;
  maxPreviewLength: number;
}

export const DEFAULT_REPORTER_CONFIG: ReporterConfig = {
  detailedLogging: true,
  showFullFilteredContent: false,
  maxPreviewLength: 500,
};

export function previewText(text: string, maxLength: number): string {
  const limit = Math.max(0, Math.floor(maxLength));
  if (text.length <= limit) {
    return text;
  }
  const omitted = text.length - limit;
  return `${text.slice(0, limit)}... (${omitted} more characters omitted)`;
}

/**
 * Turns request statistics into an ordered list of log records. Rendering
 * only: writing the records somewhere is the caller's job.
 */
export class EventReporter {
  private readonly config: Readonly<ReporterConfig>;

  constructor(config: Partial<ReporterConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_REPORTER_CONFIG, ...config });
  }

  getConfig(): Readonly<ReporterConfig> {
    return this.config;
  }

  render(stats: RequestStats): FilterEvent[] {
    if (!stats.filtered) {
      const reason = stats.reason ?? 'not in allow-list';
      return [{
        type: 'passthrough',
        data: { model: stats.model, reason },
        text: `[PASSTHROUGH] ${stats.model}: ${reason}`,
      }];
    }

    const events: FilterEvent[] = [this.startEvent(stats)];

    if (this.config.detailedLogging) {
      for (const message of stats.messages) {
        if (message.kind !== 'filtered') continue;
        events.push(this.originalPromptEvent(message.index, message.outcome));
        for (const section of message.outcome.removedSections) {
          events.push(this.sectionEvent(message.index, section));
        }
        events.push(this.filteredPromptEvent(message.index, message.outcome));
      }
    }

    events.push(this.summaryEvent(stats));
    return events;
  }

  private startEvent(stats: RequestStats): FilterEvent {
    const timestamp = stats.startedAt.toISOString();
    return {
      type: 'filter_start',
      data: { model: stats.model, timestamp },
      text: `[FILTER] Filtering request for ${stats.model} at ${timestamp}`,
    };
  }

  private originalPromptEvent(index: number, outcome: FilterOutcome): FilterEvent {
    const preview = previewText(outcome.originalText, this.config.maxPreviewLength);
    return {
      type: 'original_prompt',
      data: {
        messageIndex: index,
        chars: outcome.originalChars,
        tokens: outcome.originalTokens,
        preview,
      },
      text: `[FILTER] Original system prompt (message ${index}): ${outcome.originalChars} chars, ~${outcome.originalTokens} tokens\n${preview}`,
    };
  }

  private sectionEvent(index: number, section: SectionMatch): FilterEvent {
    const chars = section.end - section.start;
    const tokens = estimateTokens(section.text);
    const preview = previewText(section.text, this.config.maxPreviewLength);
    return {
      type: 'section_removed',
      data: {
        messageIndex: index,
        kind: section.kind,
        chars,
        tokens,
        start: section.start,
        end: section.end,
        preview,
      },
      text: `[FILTER] Removed ${section.kind}: ${chars} chars, ~${tokens} tokens\n${preview}`,
    };
  }

  private filteredPromptEvent(index: number, outcome: FilterOutcome): FilterEvent {
    const content = this.config.showFullFilteredContent
      ? outcome.filteredText
      : previewText(outcome.filteredText, this.config.maxPreviewLength);
    return {
      type: 'filtered_prompt',
      data: {
        messageIndex: index,
        chars: outcome.filteredChars,
        tokens: outcome.filteredTokens,
        content,
        truncated: content !== outcome.filteredText,
      },
      text: `[FILTER] Filtered system prompt (message ${index}): ${outcome.filteredChars} chars, ~${outcome.filteredTokens} tokens\n${content}`,
    };
  }

  private summaryEvent(stats: RequestStats): FilterEvent {
    const { totals } = stats;
    const removed = stats.messages.flatMap(message =>
      message.kind === 'filtered'
        ? message.outcome.removedSections.map(section => ({
            kind: section.kind,
            chars: section.end - section.start,
          }))
        : []
    );
    const messagesFiltered = stats.messages.filter(message => message.kind === 'filtered').length;

    const removedList = removed.length > 0
      ? removed.map(section => `${section.kind} (${section.chars} chars)`).join(', ')
      : 'nothing';

    return {
      type: 'filter_summary',
      data: {
        model: stats.model,
        messagesFiltered,
        originalChars: totals.originalChars,
        filteredChars: totals.filteredChars,
        originalTokens: totals.originalTokens,
        filteredTokens: totals.filteredTokens,
        reductionPercent: totals.reductionPercent,
        removedSections: removed,
        elapsedMs: totals.elapsedMs,
      },
      text: `[FILTER] Summary for ${stats.model}: ${totals.originalChars} -> ${totals.filteredChars} chars ` +
        `(~${totals.originalTokens} -> ~${totals.filteredTokens} tokens), ` +
        `${totals.reductionPercent.toFixed(1)}% reduction; removed: ${removedList}; ` +
        `filter time ${totals.elapsedMs.toFixed(2)}ms`,
    };
  }
}

export function renderEvents(stats: RequestStats, config: Partial<ReporterConfig> = {}): FilterEvent[] {
  return new EventReporter(config).render(stats);
}
