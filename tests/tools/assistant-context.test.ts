/**
 * Tests for the assistant_context tool
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ContextClient } from '../../src/clients/assistant-client.js';
import { ApiError, NotFoundError, TransportError } from '../../src/clients/errors.js';
import { ToolError } from '../../src/errors.js';
import {
  AssistantContextTool,
  TOOL_ASSISTANT_CONTEXT,
  decodeArguments,
} from '../../src/tools/assistant-context.js';

describe('decodeArguments', () => {
  it('should decode required fields', () => {
    expect(decodeArguments({ assistant_name: 'docs', query: 'refund policy' })).toEqual({
      assistantName: 'docs',
      query: 'refund policy',
    });
  });

  it('should forward a valid top_k unchanged', () => {
    expect(decodeArguments({ assistant_name: 'docs', query: 'q', top_k: 12 })).toEqual({
      assistantName: 'docs',
      query: 'q',
      topK: 12,
    });
  });

  it('should keep a top_k of zero', () => {
    expect(decodeArguments({ assistant_name: 'docs', query: 'q', top_k: 0 }).topK).toBe(0);
  });

  it('should accept the largest unsigned 32-bit top_k', () => {
    expect(decodeArguments({ assistant_name: 'docs', query: 'q', top_k: 4294967295 }).topK).toBe(
      4294967295
    );
  });

  it.each([
    ['a string', '5'],
    ['a negative number', -1],
    ['a fraction', 2.5],
    ['too large for 32 bits', 4294967296],
    ['null', null],
    ['an object', { value: 3 }],
  ])('should drop a top_k that is %s', (_label, topK) => {
    const request = decodeArguments({ assistant_name: 'docs', query: 'q', top_k: topK });

    expect(request).toEqual({ assistantName: 'docs', query: 'q' });
    expect('topK' in request).toBe(false);
  });

  it.each([
    ['missing', undefined],
    ['a number', 42],
    ['null', null],
    ['a boolean', true],
    ['an array', ['docs']],
  ])('should reject an assistant_name that is %s', (_label, assistantName) => {
    const args = assistantName === undefined ? { query: 'q' } : { assistant_name: assistantName, query: 'q' };

    expect(() => decodeArguments(args)).toThrow(ToolError);
    expect(() => decodeArguments(args)).toThrow(/^assistant_name must be a string$/);
  });

  it.each([
    ['missing', undefined],
    ['a number', 42],
    ['null', null],
    ['an object', { text: 'q' }],
  ])('should reject a query that is %s', (_label, query) => {
    const args = query === undefined ? { assistant_name: 'docs' } : { assistant_name: 'docs', query };

    expect(() => decodeArguments(args)).toThrow(ToolError);
    expect(() => decodeArguments(args)).toThrow(/^query must be a string$/);
  });

  it('should report every invalid field at once', () => {
    let caught: unknown;
    try {
      decodeArguments({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ToolError);
    expect(caught).toMatchObject({
      kind: 'invalid_parameters',
      message: 'assistant_name must be a string; query must be a string',
    });
  });
});

describe('AssistantContextTool', () => {
  const assistantContext = vi.fn<ContextClient['assistantContext']>();
  let tool: AssistantContextTool;

  beforeEach(() => {
    assistantContext.mockReset();
    assistantContext.mockResolvedValue({
      snippets: [{ text: 'a' }, { text: 'b' }],
      usage: { total_tokens: 42 },
    });
    tool = new AssistantContextTool({ assistantContext });
  });

  describe('definition', () => {
    it('should describe the assistant_context tool', () => {
      expect(tool.definition.name).toBe(TOOL_ASSISTANT_CONTEXT);
      expect(tool.definition.name).toBe('assistant_context');
      expect(tool.definition.description).toContain('default: 15');
    });

    it('should require assistant_name and query', () => {
      expect(tool.definition.inputSchema.type).toBe('object');
      expect(tool.definition.inputSchema.required).toEqual(['assistant_name', 'query']);
      expect(Object.keys(tool.definition.inputSchema.properties)).toEqual([
        'assistant_name',
        'query',
        'top_k',
      ]);
      expect(tool.definition.inputSchema.properties['top_k']?.type).toBe('integer');
    });
  });

  describe('execute', () => {
    it('should return one text item per snippet in order', async () => {
      const content = await tool.execute({ assistant_name: 'docs', query: 'refund policy' });

      expect(content).toEqual([
        { type: 'text', text: '{"text":"a"}' },
        { type: 'text', text: '{"text":"b"}' },
      ]);
      expect(assistantContext).toHaveBeenCalledWith('docs', 'refund policy', undefined);
    });

    it('should not expose usage', async () => {
      const content = await tool.execute({ assistant_name: 'docs', query: 'q' });

      expect(content.some((item) => item.text.includes('total_tokens'))).toBe(false);
    });

    it('should serialize non-object snippets as JSON', async () => {
      assistantContext.mockResolvedValueOnce({ snippets: ['plain', 7], usage: {} });

      const content = await tool.execute({ assistant_name: 'docs', query: 'q' });

      expect(content).toEqual([
        { type: 'text', text: '"plain"' },
        { type: 'text', text: '7' },
      ]);
    });

    it('should return no content for an empty snippet list', async () => {
      assistantContext.mockResolvedValueOnce({ snippets: [], usage: {} });

      await expect(tool.execute({ assistant_name: 'docs', query: 'q' })).resolves.toEqual([]);
    });

    it('should pass a valid top_k to the backend', async () => {
      await tool.execute({ assistant_name: 'docs', query: 'q', top_k: 8 });

      expect(assistantContext).toHaveBeenCalledWith('docs', 'q', 8);
    });

    it('should call the backend without top_k when it is malformed', async () => {
      await tool.execute({ assistant_name: 'docs', query: 'q', top_k: 'eight' });

      expect(assistantContext).toHaveBeenCalledWith('docs', 'q', undefined);
    });

    it('should not call the backend when arguments are invalid', async () => {
      await expect(tool.execute({ assistant_name: 'docs' })).rejects.toMatchObject({
        kind: 'invalid_parameters',
        message: 'query must be a string',
      });
      expect(assistantContext).not.toHaveBeenCalled();
    });

    it('should wrap a backend not-found as an execution error', async () => {
      assistantContext.mockRejectedValueOnce(new NotFoundError('assistant "docs"'));

      await expect(tool.execute({ assistant_name: 'docs', query: 'q' })).rejects.toMatchObject({
        kind: 'execution',
        message: 'API error: assistant "docs" not found',
      });
    });

    it('should carry status and body of an API error', async () => {
      assistantContext.mockRejectedValueOnce(new ApiError(500, 'boom'));

      await expect(tool.execute({ assistant_name: 'docs', query: 'q' })).rejects.toMatchObject({
        kind: 'execution',
        message: 'API error: 500 - boom',
      });
    });

    it('should wrap transport errors', async () => {
      const cause = new TransportError(new Error('socket hang up'));
      assistantContext.mockRejectedValueOnce(cause);

      const error = await tool.execute({ assistant_name: 'docs', query: 'q' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ToolError);
      expect(error).toMatchObject({
        kind: 'execution',
        message: 'HTTP request error: socket hang up',
        cause,
      });
    });

    it('should let unrelated failures through unchanged', async () => {
      const failure = new RangeError('unexpected');
      assistantContext.mockRejectedValueOnce(failure);

      await expect(tool.execute({ assistant_name: 'docs', query: 'q' })).rejects.toBe(failure);
    });
  });
});
