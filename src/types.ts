/**
 * Gateway Core Types
 *
 * Request/response schemas shared by the HTTP surface, the streaming relay
 * and the upstream transport.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// Tiers
// ============================================================================

/**
 * Access tiers a client key can resolve to.
 */
export const Tiers = ['customer', 'business'] as const;

export type Tier = (typeof Tiers)[number];

export const TierSchema = z.enum(Tiers);

/**
 * Rate budget attached to a tier.
 */
export interface RateBudget {
  /** Requests admitted per window. */
  requests: number;
  /** Window length in milliseconds. */
  windowMs: number;
}

/**
 * A caller whose key resolved to a tier.
 */
export interface ClientIdentity {
  key: string;
  tier: Tier;
  budget: RateBudget;
}

// ============================================================================
// Chat Request
// ============================================================================

/**
 * Models accepted when no allowlist is configured explicitly.
 */
export const DEFAULT_MODELS = [
  'openai/gpt-4o-mini',
  'google/gemini-2.0-flash-001',
  'deepseek/deepseek-v3-0324',
  'meta/llama-3-3-70b-instruct',
  'anthropic/claude-3-7-sonnet',
  'anthropic/claude-3-5-sonnet',
] as const;

export const TextPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ImagePartSchema = z.object({
  type: z.literal('image_url'),
  image_url: z.record(z.unknown()),
});

export const ContentPartSchema = z.discriminatedUnion('type', [TextPartSchema, ImagePartSchema]);

export const MessageRoles = ['user', 'system', 'assistant', 'tool'] as const;

export const MessageSchema = z.object({
  role: z.enum(MessageRoles),
  // null is allowed for assistant tool-call turns
  content: z.union([z.string(), z.array(ContentPartSchema)]).nullish(),
  name: z.string().optional(),
  tool_calls: z.array(z.record(z.unknown())).optional(),
  tool_call_id: z.string().optional(),
});

export const ToolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    description: z.string().optional(),
    parameters: z.record(z.unknown()),
  }),
});

const baseChatRequestShape = {
  model: z.string().min(1),
  messages: z.array(MessageSchema).min(1),

  max_tokens: z.number().int().gt(1).lte(4096).nullish(),
  temperature: z.number().min(0).max(2).nullish(),
  top_p: z.number().min(0).max(1).nullish(),
  stop: z.union([z.string(), z.array(z.string())]).nullish(),
  frequency_penalty: z.number().min(-2).max(2).nullish(),
  presence_penalty: z.number().min(-2).max(2).nullish(),
  seed: z.number().int().nullish(),

  web_search_options: z.record(z.unknown()).nullish(),
  logit_bias: z.record(z.unknown()).nullish(),
  logprobs: z.boolean().nullish(),
  top_logprobs: z.number().int().nullish(),
  response_format: z.record(z.unknown()).nullish(),
  structured_outputs: z.record(z.unknown()).nullish(),
  tools: z.array(ToolSchema).nullish(),
  tool_choice: z.union([z.string(), z.record(z.unknown())]).nullish(),

  stream: z.boolean().optional(),
};

/**
 * Chat request schema without a model allowlist.
 */
export const ChatRequestSchema = z.object(baseChatRequestShape);

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ChatMessage = z.infer<typeof MessageSchema>;

/**
 * Build a request schema that only accepts the given models.
 * An empty or missing list accepts any non-empty model id.
 */
export function buildChatRequestSchema(models?: readonly string[]): z.ZodType<ChatRequest, z.ZodTypeDef, unknown> {
  if (!models || models.length === 0) return ChatRequestSchema;
  const allowed = new Set(models);
  return ChatRequestSchema.superRefine((req, ctx) => {
    if (!allowed.has(req.model)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['model'],
        message: `Input should be one of: ${[...allowed].join(', ')}`,
      });
    }
  });
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Non-streaming completion returned to clients.
 */
export interface ChatCompletionResponse {
  id: string | null;
  object: string | null;
  created: number | null;
  model: string | null;
  choices: Array<{
    index: number | null;
    message: unknown;
    finish_reason: string | null;
  }>;
  usage: Record<string, unknown>;
}

/**
 * One event parsed out of an upstream event stream.
 */
export type StreamEvent =
  | { type: 'chunk'; data: string }
  | { type: 'done' }
  | { type: 'error'; data: string };

// ============================================================================
// Session
// ============================================================================

export const SessionStates = ['awaiting-auth', 'authenticated', 'serving', 'closed'] as const;

export type SessionState = (typeof SessionStates)[number];

/**
 * Auth control message, the first frame of every relay session.
 */
export const AuthMessageSchema = z.object({
  api_key: z.string().min(1),
});
