/**
 * MCP server adapter
 *
 * Wires an AssistantRouter into @modelcontextprotocol/sdk: declares the
 * router's capabilities, registers request handlers for the declared
 * surfaces, and turns router errors into protocol responses. Tool failures
 * come back as `isError` results; resource and prompt failures as JSON-RPC
 * errors. Undeclared surfaces are answered by the SDK with "Method not found".
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
  type ServerCapabilities,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'node:crypto';

import { PromptError, ResourceError, ToolError, type ToolErrorKind } from './errors.js';
import type { AssistantRouter } from './router.js';
import type { ServerCapabilityFlags, ToolDescriptor } from './types/mcp.js';
import { logDebug, logError, logInfo, logToolCall, setSessionId } from './utils/logger.js';

export const SERVER_VERSION = '0.1.0';

const TOOL_ERROR_LABELS: Record<ToolErrorKind, string> = {
  invalid_parameters: 'Invalid parameters',
  execution: 'Execution failed',
  not_found: 'Not found',
};

export interface ServerOptions {
  router: AssistantRouter;
  version?: string;
}

export function toSdkCapabilities(flags: ServerCapabilityFlags): ServerCapabilities {
  const capabilities: ServerCapabilities = {};
  if (flags.tools) capabilities.tools = {};
  if (flags.resources) capabilities.resources = {};
  if (flags.prompts) capabilities.prompts = {};
  return capabilities;
}

function toSdkTool(descriptor: ToolDescriptor): Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: {
      type: 'object',
      properties: { ...descriptor.inputSchema.properties },
      required: [...descriptor.inputSchema.required],
    },
  };
}

/**
 * Render a ToolError as a tool result the client can show to the model
 */
export function toolErrorResult(error: ToolError): CallToolResult {
  return {
    content: [{ type: 'text', text: `${TOOL_ERROR_LABELS[error.kind]}: ${error.message}` }],
    isError: true,
  };
}

export class AssistantMcpServer {
  private readonly router: AssistantRouter;
  private readonly server: Server;
  private sessionId = '';
  private connected = false;

  constructor(options: ServerOptions) {
    this.router = options.router;
    const flags = this.router.capabilities();

    this.server = new Server(
      {
        name: this.router.name(),
        version: options.version ?? SERVER_VERSION,
      },
      {
        capabilities: toSdkCapabilities(flags),
        instructions: this.router.instructions(),
      }
    );

    this.setupHandlers(flags);
  }

  private setupHandlers(flags: ServerCapabilityFlags): void {
    if (flags.tools) {
      this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: this.router.listTools().map(toSdkTool),
      }));

      this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
        this.handleToolCall(request.params.name, request.params.arguments)
      );
    }

    if (flags.resources) {
      this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({
        resources: this.router.listResources(),
      }));

      this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        const { uri } = request.params;
        try {
          const text = await this.router.readResource(uri);
          return { contents: [{ uri, text }] };
        } catch (error) {
          throw toMcpError(error);
        }
      });
    }

    if (flags.prompts) {
      this.server.setRequestHandler(ListPromptsRequestSchema, async () => ({
        prompts: this.router.listPrompts(),
      }));

      this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        try {
          const text = await this.router.getPrompt(request.params.name);
          return {
            messages: [{ role: 'user' as const, content: { type: 'text' as const, text } }],
          };
        } catch (error) {
          throw toMcpError(error);
        }
      });
    }

    this.server.onerror = (error): void => {
      logError('MCP server error', error);
    };

    this.server.onclose = (): void => {
      this.connected = false;
      logInfo('MCP server closed');
    };
  }

  /**
   * Run one tool call through the router and shape the protocol result
   */
  async handleToolCall(
    toolName: string,
    args: Record<string, unknown> | undefined
  ): Promise<CallToolResult> {
    const startTime = Date.now();

    try {
      const content = await this.router.callTool(toolName, args);
      logToolCall(toolName, Date.now() - startTime, true, { items: content.length });
      return { content };
    } catch (error) {
      if (error instanceof ToolError) {
        logToolCall(toolName, Date.now() - startTime, false, {
          kind: error.kind,
          error: error.message,
        });
        return toolErrorResult(error);
      }
      logError('Unexpected tool failure', error, { tool: toolName });
      throw error;
    }
  }

  /**
   * Start serving on stdin/stdout
   */
  async start(): Promise<void> {
    await this.connect(new StdioServerTransport());
  }

  /**
   * Serve over any SDK transport
   */
  async connect(transport: Transport): Promise<void> {
    this.sessionId = randomUUID();
    setSessionId(this.sessionId);

    await this.server.connect(transport);
    this.connected = true;
    logInfo('MCP server started', { server: this.router.name() });
    logDebug('Declared capabilities', { ...this.router.capabilities() });
  }

  async stop(): Promise<void> {
    logInfo('Stopping MCP server');
    await this.server.close();
    this.connected = false;
    logInfo('MCP server stopped');
  }

  getSessionId(): string {
    return this.sessionId;
  }

  isConnected(): boolean {
    return this.connected;
  }

  getMcpServer(): Server {
    return this.server;
  }
}

function toMcpError(error: unknown): unknown {
  if (error instanceof ResourceError || error instanceof PromptError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }
  return error;
}

/**
 * Create the server and start it on stdio
 */
export async function createServer(router: AssistantRouter): Promise<AssistantMcpServer> {
  const server = new AssistantMcpServer({ router });
  await server.start();
  return server;
}
