/**
 * Tool-dispatch router
 *
 * Protocol-facing facade: advertises tools, dispatches calls by name to
 * the registered ToolHandler, and reports the (empty) resource and prompt
 * surfaces. Holds no per-call state, so one instance serves concurrent calls.
 */

import type { ContextClient } from './clients/assistant-client.js';
import { PromptError, ResourceError, ToolError } from './errors.js';
import {
  AssistantContextTool,
  TOOL_ASSISTANT_CONTEXT,
  type ToolArguments,
  type ToolHandler,
} from './tools/index.js';
import type {
  ContentItem,
  PromptDescriptor,
  ResourceDescriptor,
  ServerCapabilityFlags,
  ToolDescriptor,
} from './types/mcp.js';
import { logDebug, logError, logInfo } from './utils/logger.js';

export const ROUTER_NAME = 'pinecone-assistant';

export class AssistantRouter {
  private readonly handlers: ReadonlyMap<string, ToolHandler>;
  private readonly tools: readonly ToolDescriptor[];

  constructor(handlers: readonly ToolHandler[]) {
    const byName = new Map<string, ToolHandler>();
    for (const handler of handlers) {
      if (byName.has(handler.definition.name)) {
        throw new Error(`Duplicate tool name: ${handler.definition.name}`);
      }
      byName.set(handler.definition.name, handler);
    }
    this.handlers = byName;
    this.tools = Object.freeze(handlers.map((handler) => handler.definition));
  }

  /**
   * Router with the standard tool set backed by `client`
   */
  static withClient(client: ContextClient): AssistantRouter {
    return new AssistantRouter([new AssistantContextTool(client)]);
  }

  name(): string {
    return ROUTER_NAME;
  }

  instructions(): string {
    return (
      'This server connects to an existing Pinecone Assistant, ' +
      'a RAG system for retrieving relevant document snippets. ' +
      `Use the ${TOOL_ASSISTANT_CONTEXT} tool to access contextual information from its knowledge base`
    );
  }

  capabilities(): ServerCapabilityFlags {
    return { tools: this.tools.length > 0, resources: false, prompts: false };
  }

  listTools(): readonly ToolDescriptor[] {
    logDebug('Listing available tools');
    return this.tools;
  }

  /**
   * Dispatch a tool call by name.
   *
   * @throws ToolError with kind `not_found` for an unknown tool, or whatever
   * kind the handler raises
   */
  async callTool(toolName: string, args: ToolArguments | undefined): Promise<ContentItem[]> {
    logInfo('Calling tool', { tool: toolName });

    const handler = this.handlers.get(toolName);
    if (!handler) {
      logError('Tool not found', undefined, { tool: toolName });
      throw ToolError.notFound(toolName);
    }

    return handler.execute(args ?? {});
  }

  listResources(): ResourceDescriptor[] {
    return [];
  }

  async readResource(uri: string): Promise<string> {
    throw ResourceError.notFound(uri);
  }

  listPrompts(): PromptDescriptor[] {
    return [];
  }

  async getPrompt(promptName: string): Promise<string> {
    throw PromptError.notFound(promptName);
  }
}
