import type { ContentItem, ToolDescriptor } from '../types/mcp.js';

export type ToolArguments = Record<string, unknown>;

/**
 * A named tool the router can dispatch to. Each handler owns its
 * descriptor and decodes its own arguments.
 */
export interface ToolHandler {
  readonly definition: ToolDescriptor;

  /**
   * @throws ToolError for invalid arguments or a failed backend call
   */
  execute(args: ToolArguments): Promise<ContentItem[]>;
}
