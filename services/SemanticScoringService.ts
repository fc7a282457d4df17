import { EmbeddingUnavailable, errorMessage } from '../utils/errors';
import { cosineSimilarity, normalizeScore } from '../utils/scoreNormalization';
import { EmbeddingBackend } from './EmbeddingService';

const JOB_VECTOR_CACHE_LIMIT = 32;

export class SemanticScoringService {
  private readonly backend: EmbeddingBackend;
  private readonly similarityFloor: number;
  // The same job text is embedded once per batch, not once per resume.
  private readonly jobVectors = new Map<string, Promise<number[]>>();

  constructor(backend: EmbeddingBackend, similarityFloor: number = 0) {
    this.backend = backend;
    this.similarityFloor = similarityFloor;
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Cosine similarity of the two texts' embeddings, rescaled to [0, 1].
   * Empty input scores 0 without calling the backend. A backend failure
   * throws EmbeddingUnavailable so the caller can omit the sub-score.
   */
  async score(resumeText: string, jobText: string): Promise<number> {
    if (!resumeText.trim() || !jobText.trim()) {
      return 0;
    }

    try {
      const [resumeVector, jobVector] = await Promise.all([
        this.backend.embed(resumeText),
        this.jobVector(jobText)
      ]);
      const raw = cosineSimilarity(resumeVector, jobVector);
      return normalizeScore(raw, 'cosine', this.similarityFloor);
    } catch (error) {
      console.warn(`[SemanticScoringService] ${this.backend.name} embedding failed:`, errorMessage(error));
      throw new EmbeddingUnavailable(`Embedding backend "${this.backend.name}" unavailable: ${errorMessage(error)}`);
    }
  }

  private jobVector(jobText: string): Promise<number[]> {
    const cached = this.jobVectors.get(jobText);
    if (cached) return cached;

    if (this.jobVectors.size >= JOB_VECTOR_CACHE_LIMIT) {
      const oldest = this.jobVectors.keys().next().value;
      if (oldest !== undefined) this.jobVectors.delete(oldest);
    }
    const pending = this.backend.embed(jobText);
    this.jobVectors.set(jobText, pending);
    // A failed embedding is not cached; the next resume retries it.
    pending.catch(() => this.jobVectors.delete(jobText));
    return pending;
  }
}
