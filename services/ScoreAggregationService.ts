import {
  EngineWarning,
  JobDescriptionRecord,
  LockPolicy,
  MatchResult,
  ResumeRecord,
  ScoreWeights,
  SubScoreName
} from '../types';
import { KeyedMutex } from '../utils/concurrency';
import {
  EmbeddingUnavailable,
  InconsistentScoreRequest,
  OperationCancelled,
  ResultNotFound
} from '../utils/errors';
import { toPercent } from '../utils/scoreNormalization';
import { AIEnhancementService, AIOutcome } from './AIEnhancementService';
import { FingerprintService } from './FingerprintService';
import { KeywordMatchingService, LexicalScore } from './KeywordMatchingService';
import { ResultStore } from './ResultStore';
import { SemanticScoringService } from './SemanticScoringService';

export const ALGORITHM_VERSION = 'lexical-semantic-ai/1';

export interface ScoreOptions {
  /** Ask for a fresh computation even when a prior result exists. */
  recompute?: boolean;
  /** Permit a fresh computation on top of a locked result. */
  override?: boolean;
  signal?: AbortSignal;
}

export interface ScoreOutcome {
  result: MatchResult;
  reused: boolean;
  warnings: EngineWarning[];
}

export type SubScores = Partial<Record<SubScoreName, number | null>>;

export interface CompositeScore {
  composite: number;
  weightsApplied: Partial<ScoreWeights>;
}

export interface ScoreAggregationDeps {
  store: ResultStore;
  keyword: KeywordMatchingService;
  semantic: SemanticScoringService;
  ai: AIEnhancementService;
  lockPolicy?: LockPolicy;
  now?: () => Date;
}

const SUB_SCORES: readonly SubScoreName[] = ['lexical', 'semantic', 'ai'];

/**
 * Combines the sub-scores into the composite and guards consistency: one
 * computation at a time per (jobId, fingerprint), locked results are returned
 * unchanged, and every computation is appended as a new version.
 */
export class ScoreAggregationService {
  private readonly store: ResultStore;
  private readonly keyword: KeywordMatchingService;
  private readonly semantic: SemanticScoringService;
  private readonly ai: AIEnhancementService;
  private readonly lockPolicy: LockPolicy;
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();

  constructor(deps: ScoreAggregationDeps) {
    this.store = deps.store;
    this.keyword = deps.keyword;
    this.semantic = deps.semantic;
    this.ai = deps.ai;
    this.lockPolicy = deps.lockPolicy ?? 'on_success';
    this.now = deps.now ?? (() => new Date());
  }

  async score(resume: ResumeRecord, job: JobDescriptionRecord, options: ScoreOptions = {}): Promise<ScoreOutcome> {
    const key = FingerprintService.resultKey(job.jobId, resume.fingerprint);

    return this.mutex.runExclusive(key, async () => {
      throwIfCancelled(options.signal);
      const prior = await this.store.getLatest(job.jobId, resume.fingerprint);

      if (prior?.locked && !options.override) {
        if (options.recompute) {
          throw new InconsistentScoreRequest(
            `Result for ${key} is locked (${prior.lockReason ?? 'locked'}, version ${prior.version}); recompute requires override`
          );
        }
        return { result: prior, reused: true, warnings: [] };
      }

      const outcome = await this.compute(resume, job, options.signal);
      throwIfCancelled(options.signal);

      const result = await this.store.append(outcome.result, { override: options.override });
      if (prior?.locked) {
        console.warn(`[ScoreAggregationService] Overrode locked result ${key} (version ${prior.version} -> ${result.version})`);
      }
      return { result, reused: false, warnings: outcome.warnings };
    });
  }

  /**
   * Locks the latest result for the pair. Already locked results come back as they are.
   */
  async finalize(jobId: string, fingerprint: string): Promise<MatchResult> {
    const key = FingerprintService.resultKey(jobId, fingerprint);
    return this.mutex.runExclusive(key, async () => {
      const latest = await this.store.getLatest(jobId, fingerprint);
      if (!latest) {
        throw new ResultNotFound(jobId, fingerprint);
      }
      if (latest.locked) {
        return latest;
      }
      const { version, ...rest } = latest;
      console.log(`[ScoreAggregationService] Finalized ${key} at version ${version + 1}`);
      return this.store.append({ ...rest, locked: true, lockReason: 'finalized' });
    });
  }

  /**
   * Weighted mean over the sub-scores that are present. Missing or zero-weight
   * sub-scores drop out and the remaining weights are renormalized.
   */
  computeComposite(subScores: SubScores, weights: ScoreWeights): CompositeScore {
    let weightSum = 0;
    let weighted = 0;
    const available: SubScoreName[] = [];

    for (const name of SUB_SCORES) {
      const value = subScores[name];
      const weight = weights[name];
      if (value === null || value === undefined || weight <= 0) continue;
      available.push(name);
      weightSum += weight;
      weighted += weight * value;
    }

    if (weightSum === 0) {
      return { composite: 0, weightsApplied: {} };
    }

    const weightsApplied: Partial<ScoreWeights> = {};
    for (const name of available) {
      weightsApplied[name] = weights[name] / weightSum;
    }
    return { composite: weighted / weightSum, weightsApplied };
  }

  private async compute(
    resume: ResumeRecord,
    job: JobDescriptionRecord,
    signal: AbortSignal | undefined
  ): Promise<{ result: Omit<MatchResult, 'version'>; warnings: EngineWarning[] }> {
    const warnings: EngineWarning[] = [];
    let degraded = false;

    const lexical = this.keyword.score(resume, job);

    let semanticScore: number | null = null;
    if (job.weights.semantic > 0) {
      try {
        semanticScore = await this.semantic.score(resume.normalizedText, job.normalizedText);
      } catch (error) {
        if (!(error instanceof EmbeddingUnavailable)) throw error;
        degraded = true;
        warnings.push({ code: 'EmbeddingUnavailable', message: error.message });
      }
    }
    throwIfCancelled(signal);

    let aiOutcome: AIOutcome = { status: 'disabled' };
    if (job.weights.ai > 0) {
      aiOutcome = await this.ai.evaluate(resume.rawText, job.rawText, signal);
      if (aiOutcome.status === 'failed') {
        degraded = true;
        warnings.push({ code: 'AIProviderError', message: `${aiOutcome.error.kind}: ${aiOutcome.error.message}` });
      }
    }

    const evaluation = aiOutcome.status === 'ok' ? aiOutcome.evaluation : null;
    const { composite, weightsApplied } = this.computeComposite(
      { lexical: lexical.score, semantic: semanticScore, ai: evaluation ? evaluation.score : null },
      job.weights
    );

    const locked = this.lockPolicy === 'on_success' && !degraded;
    if (degraded) {
      console.warn(
        `[ScoreAggregationService] Degraded result for ${resume.submissionId}: ${warnings.map(w => w.code).join(', ')}`
      );
    }

    return {
      warnings,
      result: {
        jobId: job.jobId,
        fingerprint: resume.fingerprint,
        lexicalScore: lexical.score,
        semanticScore,
        aiScore: evaluation ? evaluation.score : null,
        aiRationale: evaluation ? evaluation.rationale : null,
        aiModel: evaluation ? evaluation.model : null,
        composite,
        percent: toPercent(composite),
        weightsApplied,
        strengths: unique([...lexical.strengths, ...(evaluation?.strengths ?? [])]),
        concerns: unique([...lexical.concerns, ...(evaluation?.concerns ?? [])]),
        rationale: this.generateExplanation(lexical, semanticScore, aiOutcome),
        computedAt: this.now().toISOString(),
        locked,
        lockReason: locked ? 'pipeline_complete' : null,
        degraded,
        algorithmVersion: ALGORITHM_VERSION
      }
    };
  }

  private generateExplanation(lexical: LexicalScore, semanticScore: number | null, ai: AIOutcome): string {
    const parts: string[] = [];

    if (lexical.score >= 0.8) {
      parts.push('Excellent skill match');
    } else if (lexical.score >= 0.6) {
      parts.push('Good skill match');
    } else if (lexical.score >= 0.4) {
      parts.push('Partial skill match');
    } else {
      parts.push('Weak skill match');
    }

    const requiredTotal = lexical.terms.filter(t => t.required).length;
    if (requiredTotal > 0) {
      const requiredHit = requiredTotal - lexical.missingRequired.length;
      parts.push(`${requiredHit}/${requiredTotal} required skills present`);
    }

    if (semanticScore === null) {
      parts.push('semantic similarity unavailable');
    } else if (semanticScore >= 0.7) {
      parts.push('strong semantic match');
    } else if (semanticScore >= 0.5) {
      parts.push('moderate semantic match');
    } else {
      parts.push('weak semantic match');
    }

    if (ai.status === 'ok') {
      parts.push(`AI assessment ${Math.round(ai.evaluation.score * 100)}/100`);
    } else if (ai.status === 'failed') {
      parts.push('AI assessment unavailable');
    }

    return parts.join('; ') + '.';
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelled('Scoring cancelled');
  }
}

function unique(items: string[]): string[] {
  return [...new Set(items.map(item => item.trim()).filter(item => item.length > 0))];
}
