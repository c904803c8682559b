import { InvalidRequestError } from '../errors.js';
import { shouldFilter } from './filter-policy.js';
import { filterPrompt } from './prompt-filter.js';
import { estimateTokens } from './token-estimator.js';
import {
  ChatRequestSchema,
  type ChatMessage,
  type ChatRequest,
  type MessageOutcome,
  type ProcessedRequest,
  type RequestTotals,
} from './types.js';

export const PASSTHROUGH_REASON = 'not in allow-list';

/**
 * Percentage saved going from `originalSize` to `filteredSize`, clamped to
 * [0, 100]. A prompt that grew (stub appended, nothing removed) reports 0.
 */
export function reductionPercent(originalSize: number, filteredSize: number): number {
  if (originalSize <= 0) return 0;
  const percent = 100 * (1 - filteredSize / originalSize);
  return Math.min(100, Math.max(0, percent));
}

export function parseChatRequest(input: unknown): ChatRequest {
  const result = ChatRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidRequestError(`Invalid chat request: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function emptyTotals(): RequestTotals {
  return {
    originalChars: 0,
    filteredChars: 0,
    originalTokens: 0,
    filteredTokens: 0,
    reductionPercent: 0,
    elapsedMs: 0,
  };
}

/**
 * Rewrite the system messages of a chat-completion request for allow-listed
 * models. Other messages, and every message of other models, pass through
 * unchanged; message count, order and roles are always preserved.
 *
 * @throws InvalidRequestError when the body is not a well-formed chat request
 */
export function processRequest(input: unknown, allowList: Iterable<string>): ProcessedRequest {
  const startedAt = new Date();
  const request = parseChatRequest(input);

  if (!shouldFilter(request.model, allowList)) {
    return {
      request,
      stats: {
        model: request.model,
        filtered: false,
        reason: PASSTHROUGH_REASON,
        startedAt,
        messages: [],
        totals: emptyTotals(),
      },
    };
  }

  const outcomes: MessageOutcome[] = [];
  const totals = emptyTotals();

  const messages = request.messages.map((message, index): ChatMessage => {
    if (message.role !== 'system') {
      const text = typeof message.content === 'string' ? message.content : '';
      outcomes.push({
        kind: 'passthrough',
        index,
        role: message.role,
        chars: text.length,
        tokens: estimateTokens(text),
      });
      return message;
    }

    const outcome = filterPrompt(message.content);
    outcomes.push({ kind: 'filtered', index, role: message.role, outcome });

    totals.originalChars += outcome.originalChars;
    totals.filteredChars += outcome.filteredChars;
    totals.originalTokens += outcome.originalTokens;
    totals.filteredTokens += outcome.filteredTokens;
    totals.elapsedMs += outcome.elapsedMs;

    return { ...message, content: outcome.filteredText };
  });

  totals.reductionPercent = reductionPercent(totals.originalChars, totals.filteredChars);

  return {
    request: { ...request, messages },
    stats: {
      model: request.model,
      filtered: true,
      startedAt,
      messages: outcomes,
      totals,
    },
  };
}
