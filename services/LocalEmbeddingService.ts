import { PorterStemmer } from 'natural';
import { EmbeddingBackend } from './EmbeddingService';
import { TextCleaningService } from './TextCleaningService';

/**
 * Deterministic offline embedding: stemmed terms hashed into a fixed number of
 * buckets, weighted 1 + ln(tf) and L2-normalized. Identical text always yields
 * the identical vector; an empty text yields the zero vector.
 */
export class LocalEmbeddingService implements EmbeddingBackend {
  readonly name = 'local';
  private readonly dimension: number;
  private readonly cleaner: TextCleaningService;

  constructor(dimension: number = 768, cleaner: TextCleaningService = new TextCleaningService()) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
    this.cleaner = cleaner;
  }

  async embed(text: string): Promise<number[]> {
    const counts = new Map<number, number>();
    for (const token of this.cleaner.tokenize(this.cleaner.normalizeText(text))) {
      const bucket = fnv1a(PorterStemmer.stem(token)) % this.dimension;
      counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
    }

    const vector = new Array<number>(this.dimension).fill(0);
    let norm = 0;
    for (const [bucket, tf] of counts) {
      const weight = 1 + Math.log(tf);
      vector[bucket] = weight;
      norm += weight * weight;
    }
    if (norm === 0) return vector;

    const length = Math.sqrt(norm);
    return vector.map(value => value / length);
  }

  getDimension(): number {
    return this.dimension;
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
