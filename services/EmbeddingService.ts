import { GoogleGenerativeAI } from '@google/generative-ai';
import { errorMessage } from '../utils/errors';
import { sleep as defaultSleep } from '../utils/concurrency';

/**
 * Anything that turns text into a fixed-dimension vector.
 */
export interface EmbeddingBackend {
  readonly name: string;
  embed(text: string): Promise<number[]>;
  getDimension(): number;
}

/**
 * The slice of the Gemini model this service calls. GenerativeModel satisfies it.
 */
export interface EmbedContentModel {
  embedContent(text: string): Promise<{ embedding: { values: number[] } }>;
}

export interface EmbeddingServiceOptions {
  apiKey?: string;
  model?: string;
  dimension?: number;
  maxRetries?: number;
  initialRetryDelayMs?: number;
  maxChunkChars?: number;
  sleep?: (ms: number) => Promise<void>;
}

const CACHE_LIMIT = 1000;

export class EmbeddingService implements EmbeddingBackend {
  readonly name = 'gemini';
  private readonly model: string;
  private readonly configuredDimension: number;
  private actualDimension: number | null = null;
  private dimensionWarned: boolean = false;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;
  private readonly maxChunkChars: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly embeddingCache: Map<string, number[]> = new Map();
  private readonly modelInstance: EmbedContentModel;

  constructor(options: EmbeddingServiceOptions, modelInstance?: EmbedContentModel) {
    this.model = options.model ?? 'text-embedding-004';
    this.configuredDimension = options.dimension ?? 768;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialRetryDelayMs = options.initialRetryDelayMs ?? 1000;
    this.maxChunkChars = options.maxChunkChars ?? 6000;
    this.sleep = options.sleep ?? defaultSleep;

    if (modelInstance) {
      this.modelInstance = modelInstance;
    } else {
      if (!options.apiKey) {
        throw new Error('GEMINI_API_KEY is required for embedding generation');
      }
      this.modelInstance = new GoogleGenerativeAI(options.apiKey).getGenerativeModel({ model: this.model });
    }
  }

  /**
   * Embeds a whole document. Text longer than one request allows is split on
   * paragraph boundaries and the chunk vectors are mean-pooled.
   */
  async embed(text: string): Promise<number[]> {
    const chunks = this.splitForRequests(text);
    if (chunks.length === 1) {
      return this.embedText(chunks[0]);
    }
    const vectors: number[][] = [];
    for (const chunk of chunks) {
      vectors.push(await this.embedText(chunk));
    }
    return this.meanPool(vectors);
  }

  async embedText(text: string, retryCount: number = 0): Promise<number[]> {
    const cached = this.embeddingCache.get(text);
    if (cached && retryCount === 0) {
      return [...cached];
    }

    try {
      if (retryCount > 0) {
        console.log(`[EmbeddingService] Retry ${retryCount}/${this.maxRetries}...`);
      }

      const result = await this.modelInstance.embedContent(text);
      const values = result.embedding?.values;
      if (!Array.isArray(values) || values.length === 0) {
        throw new Error('Unexpected embedding response format');
      }

      if (this.actualDimension === null) {
        this.actualDimension = values.length;
        if (this.actualDimension !== this.configuredDimension && !this.dimensionWarned) {
          console.warn(`[EmbeddingService] Dimension mismatch: ${this.configuredDimension} vs ${this.actualDimension}`);
          this.dimensionWarned = true;
        }
      }

      const embedding = this.adjustDimension(values);

      if (!this.embeddingCache.has(text)) {
        if (this.embeddingCache.size >= CACHE_LIMIT) {
          const firstKey = this.embeddingCache.keys().next().value;
          if (firstKey !== undefined) this.embeddingCache.delete(firstKey);
        }
        this.embeddingCache.set(text, embedding);
      }

      return [...embedding];
    } catch (error) {
      const message = errorMessage(error);
      if (isTransient(message) && retryCount < this.maxRetries) {
        const delay = this.initialRetryDelayMs * Math.pow(2, retryCount);
        console.warn(`[EmbeddingService] Transient error (attempt ${retryCount + 1}/${this.maxRetries + 1}), retrying in ${delay}ms:`, message);
        await this.sleep(delay);
        return this.embedText(text, retryCount + 1);
      }

      console.error(`[EmbeddingService] ERROR: Failed to generate embedding after ${retryCount} retries:`, message);
      throw new Error(`Failed to generate embedding: ${message}`);
    }
  }

  getDimension(): number {
    return this.configuredDimension;
  }

  meanPool(vectors: number[][]): number[] {
    if (vectors.length === 0) {
      throw new Error('Cannot compute mean of empty vector array');
    }

    const dimension = vectors[0].length;
    const mean = new Array<number>(dimension).fill(0);

    for (const vector of vectors) {
      if (vector.length !== dimension) {
        throw new Error('All vectors must have the same dimension');
      }
      for (let i = 0; i < dimension; i++) {
        mean[i] += vector[i];
      }
    }

    for (let i = 0; i < dimension; i++) {
      mean[i] /= vectors.length;
    }

    return mean;
  }

  private adjustDimension(values: number[]): number[] {
    if (values.length > this.configuredDimension) {
      return values.slice(0, this.configuredDimension);
    }
    if (values.length < this.configuredDimension) {
      return [...values, ...new Array<number>(this.configuredDimension - values.length).fill(0)];
    }
    return [...values];
  }

  private splitForRequests(text: string): string[] {
    if (text.length <= this.maxChunkChars) return [text];

    const chunks: string[] = [];
    let current = '';
    for (const paragraph of text.split(/\n{2,}/)) {
      const pieces = paragraph.length > this.maxChunkChars ? hardSplit(paragraph, this.maxChunkChars) : [paragraph];
      for (const piece of pieces) {
        if (current && current.length + piece.length + 2 > this.maxChunkChars) {
          chunks.push(current);
          current = '';
        }
        current = current ? `${current}\n\n${piece}` : piece;
      }
    }
    if (current) chunks.push(current);
    return chunks;
  }
}

function hardSplit(text: string, size: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    pieces.push(text.slice(i, i + size));
  }
  return pieces;
}

function isTransient(message: string): boolean {
  return (
    message.includes('fetch failed') ||
    message.includes('ECONNRESET') ||
    message.includes('ETIMEDOUT') ||
    message.includes('network') ||
    message.includes('429') ||
    message.includes('503')
  );
}
