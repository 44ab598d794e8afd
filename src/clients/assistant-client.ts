/**
 * HTTP client for the Pinecone Assistant data plane
 *
 * Knows exactly one endpoint: POST /assistant/chat/{assistant}/context.
 * One network call per invocation, no retries, no caching. Instances hold
 * only immutable settings and are shared by all concurrent tool calls.
 */

import { ContextResponseSchema, type ContextResponse } from '../types/mcp.js';
import { logDebug, logWarn } from '../utils/logger.js';
import { ApiError, DecodeError, NotFoundError, TransportError } from './errors.js';

// Pinned on purpose; moving to a newer data plane version is an explicit change
export const PINECONE_API_VERSION = '2025-04';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface AssistantClientConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
}

/**
 * The one backend operation the router depends on. Tests substitute fakes.
 */
export interface ContextClient {
  assistantContext(assistantName: string, query: string, topK?: number): Promise<ContextResponse>;
}

interface AssistantContextBody {
  query: string;
  top_k?: number;
}

export class AssistantClient implements ContextClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: AssistantClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get host(): string {
    return this.baseUrl;
  }

  /**
   * Retrieve context snippets for `query` from the named assistant.
   *
   * @throws NotFoundError on HTTP 404
   * @throws ApiError on any other non-2xx status
   * @throws DecodeError when a 2xx body is not a context response
   * @throws TransportError on network failure or when the deadline passes
   */
  async assistantContext(
    assistantName: string,
    query: string,
    topK?: number
  ): Promise<ContextResponse> {
    const url = `${this.baseUrl}/assistant/chat/${encodeURIComponent(assistantName)}/context`;

    // top_k is left out entirely when absent; the backend applies its own default
    const body: AssistantContextBody = { query };
    if (topK !== undefined) body.top_k = topK;

    logDebug('Requesting assistant context', {
      assistant: assistantName,
      top_k: topK,
    });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Api-Key': this.apiKey,
          accept: 'application/json',
          'Content-Type': 'application/json',
          'X-Pinecone-API-Version': PINECONE_API_VERSION,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(error);
    }

    if (!response.ok) {
      let errorText: string;
      try {
        errorText = await response.text();
      } catch (error) {
        throw new TransportError(error);
      }

      logWarn('Assistant API returned an error status', {
        assistant: assistantName,
        status: response.status,
      });

      if (response.status === 404) {
        throw new NotFoundError(`assistant "${assistantName}"`);
      }
      throw new ApiError(response.status, errorText);
    }

    return this.decode(response);
  }

  private async decode(response: Response): Promise<ContextResponse> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(error);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeError(reason, { cause: error });
    }

    const parsed = ContextResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new DecodeError(detail);
    }

    return parsed.data;
  }
}
