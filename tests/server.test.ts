/**
 * Tests for AssistantMcpServer result shaping
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ContextClient } from '../src/clients/assistant-client.js';
import { ApiError } from '../src/clients/errors.js';
import { ToolError } from '../src/errors.js';
import { AssistantRouter } from '../src/router.js';
import {
  AssistantMcpServer,
  SERVER_VERSION,
  toSdkCapabilities,
  toolErrorResult,
} from '../src/server.js';

describe('toSdkCapabilities', () => {
  it('should declare only the tools surface for the default router', () => {
    expect(toSdkCapabilities({ tools: true, resources: false, prompts: false })).toEqual({
      tools: {},
    });
  });

  it('should declare every enabled surface', () => {
    expect(toSdkCapabilities({ tools: true, resources: true, prompts: true })).toEqual({
      tools: {},
      resources: {},
      prompts: {},
    });
  });

  it('should declare nothing when every surface is disabled', () => {
    expect(toSdkCapabilities({ tools: false, resources: false, prompts: false })).toEqual({});
  });
});

describe('toolErrorResult', () => {
  it.each([
    [ToolError.invalidParameters('query must be a string'), 'Invalid parameters: query must be a string'],
    [ToolError.execution('API error: 500 - boom'), 'Execution failed: API error: 500 - boom'],
    [ToolError.notFound('search'), 'Not found: Tool search not found'],
  ])('should label %s', (error, text) => {
    expect(toolErrorResult(error)).toEqual({
      content: [{ type: 'text', text }],
      isError: true,
    });
  });
});

describe('AssistantMcpServer', () => {
  const assistantContext = vi.fn<ContextClient['assistantContext']>();
  let server: AssistantMcpServer;

  beforeEach(() => {
    assistantContext.mockReset();
    server = new AssistantMcpServer({ router: AssistantRouter.withClient({ assistantContext }) });
  });

  it('should start disconnected', () => {
    expect(server.isConnected()).toBe(false);
    expect(server.getSessionId()).toBe('');
    expect(server.getMcpServer()).toBeDefined();
    expect(SERVER_VERSION).toBe('0.1.0');
  });

  describe('handleToolCall', () => {
    it('should return snippet content on success', async () => {
      assistantContext.mockResolvedValueOnce({ snippets: [{ text: 'a' }], usage: { tokens: 1 } });

      const result = await server.handleToolCall('assistant_context', {
        assistant_name: 'docs',
        query: 'q',
      });

      expect(result).toEqual({ content: [{ type: 'text', text: '{"text":"a"}' }] });
    });

    it('should return invalid parameter failures as error results', async () => {
      const result = await server.handleToolCall('assistant_context', { query: 'q' });

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Invalid parameters: assistant_name must be a string' }],
        isError: true,
      });
      expect(assistantContext).not.toHaveBeenCalled();
    });

    it('should return backend failures as error results', async () => {
      assistantContext.mockRejectedValueOnce(new ApiError(401, '{"error": "Unauthorized"}'));

      const result = await server.handleToolCall('assistant_context', {
        assistant_name: 'docs',
        query: 'q',
      });

      expect(result).toEqual({
        content: [
          {
            type: 'text',
            text: 'Execution failed: API error: 401 - {"error": "Unauthorized"}',
          },
        ],
        isError: true,
      });
    });

    it('should return unknown tools as error results', async () => {
      const result = await server.handleToolCall('nope', {});

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Not found: Tool nope not found' }],
        isError: true,
      });
    });

    it('should rethrow failures that are not tool errors', async () => {
      const failure = new RangeError('unexpected');
      assistantContext.mockRejectedValueOnce(failure);

      await expect(
        server.handleToolCall('assistant_context', { assistant_name: 'docs', query: 'q' })
      ).rejects.toBe(failure);
    });
  });
});
