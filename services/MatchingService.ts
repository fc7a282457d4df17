import { v4 as uuidv4 } from 'uuid';
import {
  BatchResult,
  DuplicateCluster,
  ExportRow,
  JobDescriptionRecord,
  MatchResult,
  RankedCandidate,
  ResumeRecord
} from '../types';
import { EngineConfig } from '../utils/config';
import { mapWithConcurrency } from '../utils/concurrency';
import { compareCodeUnits } from '../utils/compare';
import { ConfigurationError, EngineError, OperationCancelled, errorMessage } from '../utils/errors';
import { AIEnhancementService } from './AIEnhancementService';
import { DatabaseService } from './DatabaseService';
import { DuplicateDetectionService } from './DuplicateDetectionService';
import { EmbeddingBackend, EmbeddingService } from './EmbeddingService';
import { FeatureExtractionService, ResumeInput } from './FeatureExtractionService';
import { AIProvider, GeminiAIProvider } from './GeminiAIProvider';
import { JobDescriptionInput, JobDescriptionService } from './JobDescriptionService';
import { KeywordMatchingService } from './KeywordMatchingService';
import { LocalEmbeddingService } from './LocalEmbeddingService';
import { InMemoryResultStore, ResultStore } from './ResultStore';
import { ScoreAggregationService } from './ScoreAggregationService';
import { SemanticScoringService } from './SemanticScoringService';
import { SkillVocabularyService } from './SkillVocabularyService';

export interface BatchOptions {
  recompute?: boolean;
  override?: boolean;
  signal?: AbortSignal;
  batchId?: string;
}

export interface StoredView {
  jobId: string;
  results: MatchResult[];
  clusters: DuplicateCluster[];
}

export interface MatchingServiceDeps {
  extractor: FeatureExtractionService;
  jobs: JobDescriptionService;
  aggregator: ScoreAggregationService;
  duplicates: DuplicateDetectionService;
  store: ResultStore;
  concurrency: number;
}

/**
 * Runs a batch end to end: score every resume on a bounded pool, wait for all
 * of them, then detect duplicates and rank the survivors.
 */
export class MatchingService {
  private readonly extractor: FeatureExtractionService;
  private readonly jobs: JobDescriptionService;
  private readonly aggregator: ScoreAggregationService;
  private readonly duplicates: DuplicateDetectionService;
  private readonly store: ResultStore;
  private readonly concurrency: number;

  constructor(deps: MatchingServiceDeps) {
    this.extractor = deps.extractor;
    this.jobs = deps.jobs;
    this.aggregator = deps.aggregator;
    this.duplicates = deps.duplicates;
    this.store = deps.store;
    this.concurrency = deps.concurrency;
  }

  buildJob(input: JobDescriptionInput): JobDescriptionRecord {
    return this.jobs.buildJobDescriptionRecord(input);
  }

  buildResume(input: ResumeInput): ResumeRecord {
    return this.extractor.buildResumeRecord(input);
  }

  async matchTexts(jobInput: JobDescriptionInput, resumes: ResumeInput[], options: BatchOptions = {}): Promise<BatchResult> {
    const job = this.buildJob(jobInput);
    return this.runBatch(job, resumes.map(input => this.buildResume(input)), options);
  }

  async runBatch(job: JobDescriptionRecord, resumes: ResumeRecord[], options: BatchOptions = {}): Promise<BatchResult> {
    const batchId = options.batchId ?? uuidv4();
    console.log(`[MatchingService] Batch ${batchId}: scoring ${resumes.length} resume(s) for job ${job.jobId.slice(0, 12)}`);

    const entries = await mapWithConcurrency(resumes, this.concurrency, resume => this.scoreOne(resume, job, options));

    const cancelled = options.signal?.aborted ?? false;
    let clusters: DuplicateCluster[] = [];

    if (cancelled) {
      console.warn(`[MatchingService] Batch ${batchId} cancelled; duplicate detection skipped`);
    } else {
      const detection = this.duplicates.detect(
        job.jobId,
        entries.map(entry => ({ resume: entry.resume, composite: entry.result ? entry.result.composite : null }))
      );
      clusters = detection.clusters;
      detection.assignments.forEach((assignment, index) => {
        entries[index].clusterId = assignment.clusterId;
        entries[index].suppressed = assignment.suppressed;
        entries[index].duplicateOf = assignment.duplicateOf;
      });

      try {
        await this.store.replaceClusters(job.jobId, clusters);
      } catch (error) {
        console.error(`[MatchingService] Failed to persist clusters for batch ${batchId}:`, errorMessage(error));
        throw error;
      }
    }

    const ranked = this.rank(entries);
    const summary = {
      total: ranked.length,
      scored: ranked.filter(e => e.status === 'scored').length,
      reused: ranked.filter(e => e.status === 'reused').length,
      failed: ranked.filter(e => e.status === 'failed').length,
      cancelled: ranked.filter(e => e.status === 'cancelled').length,
      suppressed: ranked.filter(e => e.suppressed).length
    };
    console.log(
      `[MatchingService] Batch ${batchId} done: ${summary.scored} scored, ${summary.reused} reused, ` +
        `${summary.failed} failed, ${summary.cancelled} cancelled, ${summary.suppressed} suppressed`
    );

    return { batchId, jobId: job.jobId, cancelled, entries: ranked, clusters, summary };
  }

  async finalize(jobId: string, fingerprint: string): Promise<MatchResult> {
    return this.aggregator.finalize(jobId, fingerprint);
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  async getStoredView(jobId: string): Promise<StoredView> {
    const [results, clusters] = await Promise.all([this.store.listLatest(jobId), this.store.listClusters(jobId)]);
    return { jobId, results, clusters };
  }

  /**
   * Flat, frozen rows for export. Rows keep the batch order: ranked entries
   * first, then suppressed, failed and cancelled ones.
   */
  toExportView(batch: BatchResult): ReadonlyArray<Readonly<ExportRow>> {
    return toExportView(batch);
  }

  private async scoreOne(resume: ResumeRecord, job: JobDescriptionRecord, options: BatchOptions): Promise<RankedCandidate> {
    const entry: RankedCandidate = {
      resume,
      result: null,
      status: 'cancelled',
      warnings: [...resume.warnings],
      rank: null,
      suppressed: false,
      duplicateOf: null,
      clusterId: null
    };
    if (options.signal?.aborted) {
      return entry;
    }

    try {
      const outcome = await this.aggregator.score(resume, job, options);
      entry.result = outcome.result;
      entry.status = outcome.reused ? 'reused' : 'scored';
      entry.warnings.push(...outcome.warnings);
    } catch (error) {
      if (error instanceof OperationCancelled) {
        entry.status = 'cancelled';
      } else {
        entry.status = 'failed';
        entry.error = error instanceof EngineError ? `${error.code}: ${error.message}` : errorMessage(error);
        console.error(`[MatchingService] Scoring failed for ${resume.submissionId}:`, entry.error);
      }
    }
    return entry;
  }

  private rank(entries: RankedCandidate[]): RankedCandidate[] {
    const rankable = entries
      .filter((entry): entry is RankedCandidate & { result: MatchResult } => entry.result !== null && !entry.suppressed)
      .sort((a, b) => {
        const diff = b.result.composite - a.result.composite;
        if (diff !== 0) return diff;
        return compareCodeUnits(a.resume.submissionId, b.resume.submissionId);
      });
    rankable.forEach((entry, index) => {
      entry.rank = index + 1;
    });
    const rest = entries.filter(entry => entry.rank === null);
    return [...rankable, ...rest];
  }
}

export function toExportView(batch: BatchResult): ReadonlyArray<Readonly<ExportRow>> {
  const rows = batch.entries.map(entry =>
    Object.freeze({
      rank: entry.rank,
      submissionId: entry.resume.submissionId,
      fingerprint: entry.resume.fingerprint,
      fileName: entry.resume.file.name,
      candidateName: entry.resume.contact.name,
      email: entry.resume.contact.email,
      phone: entry.resume.contact.phone,
      percent: entry.result ? entry.result.percent : null,
      lexicalScore: entry.result ? entry.result.lexicalScore : null,
      semanticScore: entry.result ? entry.result.semanticScore : null,
      aiScore: entry.result ? entry.result.aiScore : null,
      strengths: entry.result ? [...entry.result.strengths] : [],
      concerns: entry.result ? [...entry.result.concerns] : [],
      locked: entry.result ? entry.result.locked : false,
      status: entry.status,
      error: entry.error ?? null,
      suppressed: entry.suppressed,
      duplicateOf: entry.duplicateOf
    })
  );
  return Object.freeze(rows);
}

export interface EngineOverrides {
  store?: ResultStore;
  embeddingBackend?: EmbeddingBackend;
  aiProvider?: AIProvider | null;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires a MatchingService from configuration. Overrides replace the external
 * collaborators (store, embedding backend, AI provider).
 */
export function createMatchingService(config: EngineConfig, overrides: EngineOverrides = {}): MatchingService {
  const vocabulary = config.extraction.vocabularyPath
    ? SkillVocabularyService.fromFile(config.extraction.vocabularyPath)
    : new SkillVocabularyService();

  const store = overrides.store ?? (config.server.mongoUri ? new DatabaseService(config.server.mongoUri) : new InMemoryResultStore());

  const embeddingBackend = overrides.embeddingBackend ?? createEmbeddingBackend(config);

  let aiProvider: AIProvider | null = null;
  if (overrides.aiProvider !== undefined) {
    aiProvider = overrides.aiProvider;
  } else if (config.ai.enabled) {
    if (!config.ai.apiKey) {
      throw new ConfigurationError('AI_MATCHING_ENABLED is set but GEMINI_API_KEY is missing');
    }
    aiProvider = new GeminiAIProvider(config.ai.apiKey);
  }

  const ai = new AIEnhancementService(aiProvider, config.ai, overrides.sleep);
  const aggregator = new ScoreAggregationService({
    store,
    keyword: new KeywordMatchingService(vocabulary, config.lexical),
    semantic: new SemanticScoringService(embeddingBackend, config.embedding.similarityFloor),
    ai,
    lockPolicy: config.scoring.lockPolicy
  });

  console.log(
    `[MatchingService] Engine ready: embeddings=${embeddingBackend.name}, ai=${ai.enabled ? config.ai.model : 'disabled'}, ` +
      `store=${store instanceof DatabaseService ? 'mongodb' : 'memory'}, vocabulary=${vocabulary.size} terms`
  );

  return new MatchingService({
    extractor: new FeatureExtractionService(vocabulary, config.extraction.defaultCountryCode),
    jobs: new JobDescriptionService(vocabulary, config.weights),
    aggregator,
    duplicates: new DuplicateDetectionService(config.duplicates),
    store,
    concurrency: config.scoring.concurrency
  });
}

function createEmbeddingBackend(config: EngineConfig): EmbeddingBackend {
  if (config.embedding.backend === 'gemini') {
    if (!config.ai.apiKey) {
      throw new ConfigurationError('EMBEDDING_BACKEND=gemini requires GEMINI_API_KEY');
    }
    return new EmbeddingService({
      apiKey: config.ai.apiKey,
      model: config.embedding.model,
      dimension: config.embedding.dimension
    });
  }
  return new LocalEmbeddingService(config.embedding.dimension);
}
