import { z } from 'zod';

export const MESSAGE_ROLES = ['system', 'user', 'assistant', 'tool'] as const;

export type MessageRole = typeof MESSAGE_ROLES[number];

// Unknown fields (name, tool_call_id, stream, tools, ...) are kept so the
// rewritten request can be forwarded in the same shape it arrived.
// Only system prompts are rewritten, so only they need string content.
// Other roles may carry null (assistant tool calls), content parts or nothing.
const SystemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
}).passthrough();

const ConversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'tool']),
  content: z.union([z.string(), z.array(z.unknown()), z.null()]).optional(),
}).passthrough();

export const ChatMessageSchema = z.discriminatedUnion('role', [
  SystemMessageSchema,
  ConversationMessageSchema,
]);

export const ChatRequestSchema = z.object({
  model: z.string().min(1, 'model id is required'),
  messages: z.array(ChatMessageSchema),
}).passthrough();

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export type SectionKind = 'project-tree' | 'environment-block' | 'instructions-block';

export interface SectionMatch {
  kind: SectionKind;
  text: string;
  /** Inclusive start offset in the source text. */
  start: number;
  /** Exclusive end offset in the source text. */
  end: number;
}

export interface FilterOutcome {
  originalText: string;
  filteredText: string;
  /** Removed sections in source order. */
  removedSections: SectionMatch[];
  originalChars: number;
  filteredChars: number;
  originalTokens: number;
  filteredTokens: number;
  elapsedMs: number;
  /** Where the environment stub sits inside filteredText. */
  stubOffset: number;
}

export type MessageOutcome =
  | {
      kind: 'filtered';
      index: number;
      role: MessageRole;
      outcome: FilterOutcome;
    }
  | {
      kind: 'passthrough';
      index: number;
      role: MessageRole;
      chars: number;
      tokens: number;
    };

export interface RequestTotals {
  originalChars: number;
  filteredChars: number;
  originalTokens: number;
  filteredTokens: number;
  reductionPercent: number;
  elapsedMs: number;
}

export interface RequestStats {
  model: string;
  filtered: boolean;
  reason?: string;
  startedAt: Date;
  messages: MessageOutcome[];
  totals: RequestTotals;
}

export interface ProcessedRequest {
  request: ChatRequest;
  stats: RequestStats;
}
