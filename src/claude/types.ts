import { z } from "zod";

// -------------------------------------------------------
// Raw NDJSON lines emitted by:
//   claude -p --output-format stream-json --verbose
// Only the fields the generator reads are modelled; the rest pass through.
// -------------------------------------------------------

const TextBlockSchema = z.object({ type: z.literal("text"), text: z.string() });
const OtherBlockSchema = z.object({ type: z.string() }).passthrough();

export const SystemInitSchema = z.object({
  type: z.literal("system"),
  subtype: z.string(),
  session_id: z.string().optional(),
  model: z.string().optional(),
});

export const ContentBlockDeltaSchema = z.object({
  type: z.literal("content_block_delta"),
  index: z.number(),
  delta: z.object({ type: z.string(), text: z.string().optional() }).passthrough(),
});

export const AssistantMessageSchema = z.object({
  type: z.literal("assistant"),
  message: z.object({
    content: z.array(z.union([TextBlockSchema, OtherBlockSchema])),
  }).passthrough(),
});

export const ResultEventSchema = z.object({
  type: z.literal("result"),
  subtype: z.string(),
  result: z.string().optional(),
  error: z.string().optional(),
  is_error: z.boolean().optional(),
  total_cost_usd: z.number().optional(),
  duration_ms: z.number().optional(),
});

export const StreamEventSchema = z.discriminatedUnion("type", [
  SystemInitSchema,
  ContentBlockDeltaSchema,
  AssistantMessageSchema,
  ResultEventSchema,
]);

export type StreamEvent = z.infer<typeof StreamEventSchema>;

// -------------------------------------------------------
// Parsed events -- the normalized layer the generator consumes
// -------------------------------------------------------

export interface ParsedInit {
  kind: "init";
  model?: string;
}

export interface ParsedDelta {
  kind: "delta";
  text: string;
}

export interface ParsedAssistantComplete {
  kind: "assistant_complete";
  text: string;
}

export interface ParsedResult {
  kind: "result";
  success: boolean;
  result?: string;
  error?: string;
  totalCostUsd?: number;
  durationMs?: number;
}

export type ParsedEvent =
  | ParsedInit
  | ParsedDelta
  | ParsedAssistantComplete
  | ParsedResult;
