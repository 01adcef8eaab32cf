import OpenAI, { APIConnectionError } from "openai";
import type { AppConfig } from "../config.js";
import { EmbeddingError } from "../errors.js";

/**
 * Turns text into fixed-width, L2-normalized vectors
 */
export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/** The part of the OpenAI client this module calls */
export interface EmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbedderOptions {
  model: string;
  dimensions: number;
  apiKey?: string;
  baseUrl?: string;
  client?: EmbeddingsClient;
  batchSize?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  wait?: (ms: number) => Promise<void>;
}

const DEFAULT_BATCH_SIZE = 64;
const MAX_RETRIES = 5;
const INITIAL_RETRY_DELAY_MS = 1000;
const MAX_RETRY_DELAY_MS = 60000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function normalizeVector(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) sumSquares += value * value;
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) return [...vector];
  return vector.map((value) => value / norm);
}

/**
 * Element-wise mean of equal-length vectors
 */
export function meanVector(vectors: readonly number[][]): number[] {
  if (vectors.length === 0) {
    throw new EmbeddingError("Cannot average an empty set of vectors");
  }
  const width = vectors[0].length;
  const sum = new Array<number>(width).fill(0);
  for (const vector of vectors) {
    if (vector.length !== width) {
      throw new EmbeddingError(`Vector length mismatch: ${vector.length} vs ${width}`);
    }
    for (let i = 0; i < width; i++) sum[i] += vector[i];
  }
  return sum.map((value) => value / vectors.length);
}

function isRateLimited(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  return (
    ("status" in error && error.status === 429) ||
    ("code" in error && error.code === "rate_limit_exceeded")
  );
}

export class OpenAIEmbedder implements Embedder {
  readonly dimensions: number;
  readonly model: string;
  private readonly client: EmbeddingsClient;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? INITIAL_RETRY_DELAY_MS;
    this.wait = options.wait ?? sleep;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
    } else {
      throw new EmbeddingError("OPENAI_API_KEY is not set", { unreachable: true });
    }
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      vectors.push(...(await this.requestBatch(batch)));
    }
    return vectors;
  }

  private async requestBatch(batch: string[]): Promise<number[][]> {
    const response = await this.withRetry(() =>
      this.client.embeddings.create({
        model: this.model,
        input: batch,
        dimensions: this.dimensions,
      })
    );

    if (response.data.length !== batch.length) {
      throw new EmbeddingError(
        `Expected ${batch.length} embeddings, got ${response.data.length}`
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(({ embedding }) => {
        if (embedding.length !== this.dimensions) {
          throw new EmbeddingError(
            `Embedding has ${embedding.length} dimensions, expected ${this.dimensions}`
          );
        }
        return normalizeVector(embedding);
      });
  }

  /**
   * Execute a call with exponential backoff on rate limit errors
   */
  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (error instanceof APIConnectionError) {
          throw new EmbeddingError(`Embedding service unreachable: ${error.message}`, {
            unreachable: true,
            cause: error,
          });
        }
        if (!isRateLimited(error) || attempt + 1 >= this.maxRetries) {
          const message = error instanceof Error ? error.message : String(error);
          throw new EmbeddingError(`Embedding request failed: ${message}`, { cause: error });
        }

        const delayMs = Math.min(this.retryBaseDelayMs * Math.pow(2, attempt), MAX_RETRY_DELAY_MS);
        console.log(
          `  ⏳ Rate limited on embeddings, retrying in ${(delayMs / 1000).toFixed(1)}s (attempt ${attempt + 1}/${this.maxRetries})`
        );
        await this.wait(delayMs);
      }
    }
  }
}

export function createEmbedder(config: AppConfig): OpenAIEmbedder {
  return new OpenAIEmbedder({
    apiKey: config.embedding.apiKey,
    baseUrl: config.embedding.baseUrl,
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
  });
}
