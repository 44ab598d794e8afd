/**
 * MCP tool input/output types for pinecone-assistant-mcp
 */

import { z } from 'zod';

// ============================================================================
// Protocol shapes
// ============================================================================

export type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
};

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: {
    readonly type: 'object';
    readonly properties: Readonly<Record<string, JsonSchemaProperty>>;
    readonly required: readonly string[];
  };
}

export type TextContent = {
  type: 'text';
  text: string;
};

export type ContentItem = TextContent;

export interface ServerCapabilityFlags {
  tools: boolean;
  resources: boolean;
  prompts: boolean;
}

// Resource and prompt surfaces exist but are always empty
export type ResourceDescriptor = {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
};

export type PromptDescriptor = {
  name: string;
  description?: string;
};

// ============================================================================
// assistant_context tool
// ============================================================================

export const PARAM_ASSISTANT_NAME = 'assistant_name';
export const PARAM_QUERY = 'query';
export const PARAM_TOP_K = 'top_k';

// top_k travels as an unsigned 32-bit integer on the wire
export const MAX_TOP_K = 4_294_967_295;

export const TopKSchema = z.number().int().min(0).max(MAX_TOP_K);

export const AssistantContextInputSchema = z.object({
  [PARAM_ASSISTANT_NAME]: z.string({
    required_error: `${PARAM_ASSISTANT_NAME} must be a string`,
    invalid_type_error: `${PARAM_ASSISTANT_NAME} must be a string`,
  }),
  [PARAM_QUERY]: z.string({
    required_error: `${PARAM_QUERY} must be a string`,
    invalid_type_error: `${PARAM_QUERY} must be a string`,
  }),
  // Malformed values are dropped, not rejected
  [PARAM_TOP_K]: TopKSchema.optional().catch(undefined),
});

export interface ContextRequest {
  assistantName: string;
  query: string;
  topK?: number;
}

// ============================================================================
// Assistant data plane
// ============================================================================

export const ContextResponseSchema = z.object({
  snippets: z.array(z.unknown()),
  // Opaque, but must be present in the body
  usage: z.custom<unknown>((value) => value !== undefined, { message: 'missing field `usage`' }),
});

export type ContextResponse = z.infer<typeof ContextResponseSchema>;
