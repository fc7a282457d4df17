import { JobDescriptionRecord, RequirementTerm, ResumeRecord, ScoreWeights } from '../types';
import { EmbeddingBackend } from '../services/EmbeddingService';
import { FingerprintService } from '../services/FingerprintService';
import { AIEvaluation, AIEvaluationRequest, AIProvider } from '../services/GeminiAIProvider';
import { TextCleaningService } from '../services/TextCleaningService';

const cleaner = new TextCleaningService();

export const DEFAULT_WEIGHTS: ScoreWeights = { lexical: 0.4, semantic: 0.3, ai: 0.3 };

export interface ResumeFixture {
  submissionId: string;
  text: string;
  name?: string;
  email?: string | null;
  phone?: string | null;
  skills?: string[];
  uploadedAt?: string;
}

export function makeResume(fixture: ResumeFixture): ResumeRecord {
  const normalizedText = cleaner.normalizeText(fixture.text);
  return {
    submissionId: fixture.submissionId,
    fingerprint: FingerprintService.fingerprint(normalizedText),
    rawText: fixture.text,
    normalizedText,
    contact: {
      name: fixture.name ?? '',
      email: fixture.email ?? null,
      phone: fixture.phone ?? null
    },
    skills: fixture.skills ?? [],
    file: {
      name: `${fixture.submissionId}.txt`,
      size: fixture.text.length,
      uploadedAt: fixture.uploadedAt ?? '2026-01-01T00:00:00.000Z'
    },
    warnings: []
  };
}

export function makeJob(
  text: string,
  requirements: RequirementTerm[],
  weights: ScoreWeights = DEFAULT_WEIGHTS
): JobDescriptionRecord {
  const normalizedText = cleaner.normalizeText(text);
  return {
    jobId: FingerprintService.fingerprint(normalizedText),
    title: 'Test role',
    rawText: text,
    normalizedText,
    requirements,
    weights
  };
}

/**
 * Returns preset vectors by exact text; unknown text throws.
 */
export class FixedEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'fixed';
  readonly calls: string[] = [];

  constructor(private readonly vectors: Record<string, number[]>, private readonly dimension: number = 2) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vector = this.vectors[text];
    if (!vector) {
      throw new Error(`no vector for "${text}"`);
    }
    return vector;
  }

  getDimension(): number {
    return this.dimension;
  }
}

export class FailingEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'failing';

  async embed(): Promise<number[]> {
    throw new Error('embedding service down');
  }

  getDimension(): number {
    return 2;
  }
}

type Step = (request: AIEvaluationRequest, signal: AbortSignal) => Promise<AIEvaluation>;

/**
 * Plays back one step per call; the last step repeats.
 */
export class ScriptedAIProvider implements AIProvider {
  readonly name = 'scripted';
  calls = 0;

  constructor(private readonly steps: Step[]) {}

  async evaluate(request: AIEvaluationRequest, signal: AbortSignal): Promise<AIEvaluation> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    return step(request, signal);
  }
}

export function evaluation(score: number, overrides: Partial<AIEvaluation> = {}): AIEvaluation {
  return {
    score,
    rationale: 'Relevant backend experience',
    strengths: [],
    concerns: [],
    model: 'test-model',
    ...overrides
  };
}

export const noSleep = async (): Promise<void> => undefined;
