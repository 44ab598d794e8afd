/**
 * MCP tools exports
 *
 * - assistant_context: snippet retrieval from a Pinecone Assistant
 */

export * from './types.js';
export * from './assistant-context.js';
