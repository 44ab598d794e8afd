/**
 * assistant_context tool
 *
 * Retrieves document snippets from a Pinecone Assistant knowledge base.
 * Arguments are decoded in one zod step; a malformed `top_k` is dropped
 * (and logged) rather than rejected, so the assistant's own default applies.
 */

import { AssistantError } from '../clients/errors.js';
import type { ContextClient } from '../clients/assistant-client.js';
import { ToolError } from '../errors.js';
import {
  AssistantContextInputSchema,
  PARAM_ASSISTANT_NAME,
  PARAM_QUERY,
  PARAM_TOP_K,
  TopKSchema,
  type ContentItem,
  type ContextRequest,
  type ToolDescriptor,
} from '../types/mcp.js';
import { logDebug, logInfo, logWarn } from '../utils/logger.js';
import type { ToolArguments, ToolHandler } from './types.js';

export const TOOL_ASSISTANT_CONTEXT = 'assistant_context';

const DESCRIPTION =
  'Retrieves relevant document snippets from your Pinecone Assistant knowledge base. ' +
  'Returns an array of text snippets from the most relevant documents. ' +
  "You can use the 'top_k' parameter to control result count (default: 15). " +
  'Recommended top_k: a few (5-8) for simple/narrow queries, 10-20 for complex/broad topics.';

export class AssistantContextTool implements ToolHandler {
  readonly definition: ToolDescriptor = {
    name: TOOL_ASSISTANT_CONTEXT,
    description: DESCRIPTION,
    inputSchema: {
      type: 'object',
      properties: {
        [PARAM_ASSISTANT_NAME]: {
          type: 'string',
          description: 'Name of an existing Pinecone assistant',
        },
        [PARAM_QUERY]: {
          type: 'string',
          description: 'The query to retrieve context for.',
        },
        [PARAM_TOP_K]: {
          type: 'integer',
          description: 'The number of context snippets to retrieve. Defaults to 15.',
        },
      },
      required: [PARAM_ASSISTANT_NAME, PARAM_QUERY],
    },
  };

  constructor(private readonly client: ContextClient) {}

  async execute(args: ToolArguments): Promise<ContentItem[]> {
    const request = decodeArguments(args);

    logInfo('Requesting context from Pinecone Assistant', {
      assistant: request.assistantName,
      top_k: request.topK,
    });

    let snippets: unknown[];
    try {
      ({ snippets } = await this.client.assistantContext(
        request.assistantName,
        request.query,
        request.topK
      ));
    } catch (error) {
      if (error instanceof AssistantError) {
        throw ToolError.execution(error.message, error);
      }
      throw error;
    }

    logDebug('Received context response', { snippets: snippets.length });

    // usage is intentionally not forwarded
    return snippets.map((snippet): ContentItem => ({ type: 'text', text: JSON.stringify(snippet) }));
  }
}

/**
 * Decode raw tool arguments into a context request.
 *
 * @throws ToolError (invalid_parameters) naming every missing or non-string field
 */
export function decodeArguments(args: ToolArguments): ContextRequest {
  const parsed = AssistantContextInputSchema.safeParse(args);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw ToolError.invalidParameters(message);
  }

  const raw = args[PARAM_TOP_K];
  if (raw !== undefined && !TopKSchema.safeParse(raw).success) {
    logWarn('Ignoring malformed top_k', { top_k: raw });
  }

  const request: ContextRequest = {
    assistantName: parsed.data[PARAM_ASSISTANT_NAME],
    query: parsed.data[PARAM_QUERY],
  };
  const topK = parsed.data[PARAM_TOP_K];
  if (topK !== undefined) request.topK = topK;
  return request;
}
