import { z } from 'zod';
import type { Embedder } from '../core/contracts/embedding';
import { ModelUnavailableError, SchemaMismatchError } from '../core/errors';

export interface HttpEmbedderOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  dimension: number;
  timeoutMs?: number;
}

const DIMENSION_PROBE_TEXT = 'dimension probe';

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number().finite()) })).min(1)
});

/**
 * Embedder backed by an OpenAI-compatible `/embeddings` endpoint.
 * Transport failures and timeouts surface as retryable ModelUnavailableError.
 */
export class HttpEmbedder implements Embedder {
  readonly dimension: number;
  readonly modelName: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: HttpEmbedderOptions) {
    if (!options.apiKey) {
      throw new Error('Embedding API key required');
    }
    if (!/^https?:\/\//i.test(options.baseUrl)) {
      throw new Error(`Invalid embedding API URL: ${options.baseUrl}`);
    }
    this.baseUrl = trimSlash(options.baseUrl);
    this.apiKey = options.apiKey;
    this.modelName = options.model;
    this.dimension = options.dimension;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /**
   * Builds the embedder and sends one probe request, so a wrong endpoint,
   * bad credentials or a dimension mismatch stop the process at startup.
   */
  static async create(options: HttpEmbedderOptions): Promise<HttpEmbedder> {
    const embedder = new HttpEmbedder(options);
    try {
      await embedder.embed(DIMENSION_PROBE_TEXT);
    } catch (error) {
      if (error instanceof ModelUnavailableError) {
        throw new ModelUnavailableError(`Embedding model ${options.model} unavailable at startup: ${error.message}`, {
          retryable: false,
          cause: error
        });
      }
      throw error;
    }
    return embedder;
  }

  async embed(text: string): Promise<number[]> {
    if (!text) {
      throw new Error('Embedding text required');
    }

    let response: Response;
    try {
      response = await fetchWithTimeout(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: buildHeaders(this.apiKey),
        body: JSON.stringify({ model: this.modelName, input: text })
      }, this.timeoutMs);
    } catch (error) {
      const reason = error instanceof Error && error.name === 'AbortError'
        ? `timed out after ${this.timeoutMs}ms`
        : 'request failed';
      throw new ModelUnavailableError(`Embedding request ${reason}`, { retryable: true, cause: error });
    }

    if (!response.ok) {
      throw new ModelUnavailableError(`Embedding API error: ${response.status}`, {
        retryable: response.status === 429 || response.status >= 500
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ModelUnavailableError('Embedding response is not valid JSON', { retryable: true, cause: error });
    }

    const parsed = embeddingResponseSchema.safeParse(body);
    const embedding = parsed.success ? parsed.data.data[0]?.embedding : undefined;
    if (!embedding) {
      throw new ModelUnavailableError('Embedding response missing vector', { retryable: true });
    }

    if (embedding.length !== this.dimension) {
      throw new SchemaMismatchError(
        `Embedding dimension mismatch: model ${this.modelName} returned ${embedding.length}, expected ${this.dimension}`,
        { expected: this.dimension, actual: embedding.length }
      );
    }

    return embedding;
  }
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

function buildHeaders(apiKey: string): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json'
  };
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
