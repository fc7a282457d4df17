import { z } from 'zod';
import { LockPolicy, ScoreWeights, SurvivorCriterion } from '../types';
import { ConfigurationError, DuplicateThresholdInvalid } from './errors';

export interface EngineConfig {
  ai: {
    enabled: boolean;
    model: string;
    apiKey?: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    maxConcurrent: number;
  };
  embedding: {
    backend: 'local' | 'gemini';
    model: string;
    dimension: number;
    similarityFloor: number;
  };
  weights: ScoreWeights;
  lexical: {
    partialCredit: number;
    requiredMissingPenalty: number;
  };
  duplicates: {
    threshold: number;
    strongSignal: number;
    textWeight: number;
    skillWeight: number;
    shingleSize: number;
    survivorOrder: SurvivorCriterion[];
  };
  scoring: {
    concurrency: number;
    lockPolicy: LockPolicy;
  };
  extraction: {
    defaultCountryCode: string;
    vocabularyPath?: string;
  };
  server: {
    port: number;
    mongoUri?: string;
  };
}

export const DEFAULT_DUPLICATE_THRESHOLD = 0.85;

const SURVIVOR_CRITERIA: readonly SurvivorCriterion[] = ['score', 'contact', 'upload'];

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const envSchema = z.object({
  AI_MATCHING_ENABLED: flag(false),
  AI_MODEL: z.string().default('gemini-2.5-flash'),
  GEMINI_API_KEY: z.string().optional(),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  AI_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  AI_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  AI_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),

  EMBEDDING_BACKEND: z.enum(['local', 'gemini']).default('local'),
  EMBEDDING_MODEL: z.string().default('text-embedding-004'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
  SEMANTIC_SIMILARITY_FLOOR: z.coerce.number().min(-1).lt(1).default(0),

  WEIGHT_LEXICAL: z.coerce.number().positive().default(0.4),
  WEIGHT_SEMANTIC: z.coerce.number().min(0).default(0.3),
  WEIGHT_AI: z.coerce.number().min(0).default(0.3),

  PARTIAL_MATCH_CREDIT: z.coerce.number().min(0).max(1).default(0.5),
  REQUIRED_MISSING_PENALTY: z.coerce.number().min(0).max(1).default(0.85),

  SURVIVOR_ORDER: z.string().default('score,contact,upload'),
  LOCK_POLICY: z.enum(['on_success', 'finalize_only']).default('on_success'),
  SCORING_CONCURRENCY: z.coerce.number().int().positive().default(8),

  DEFAULT_PHONE_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default('1'),
  SKILL_VOCABULARY_PATH: z.string().optional(),

  PORT: z.coerce.number().int().positive().default(5003),
  MONGODB_URI: z.string().optional()
});

function parseThreshold(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_DUPLICATE_THRESHOLD;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new DuplicateThresholdInvalid(raw);
  }
  return value;
}

export function parseSurvivorOrder(raw: string): SurvivorCriterion[] {
  const order: SurvivorCriterion[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    const criterion = SURVIVOR_CRITERIA.find(c => c === name);
    if (!criterion) {
      throw new ConfigurationError(`Unknown survivor criterion "${name}" (expected one of ${SURVIVOR_CRITERIA.join(', ')})`);
    }
    if (order.includes(criterion)) {
      throw new ConfigurationError(`Survivor criterion "${name}" listed twice`);
    }
    order.push(criterion);
  }
  return order;
}

/**
 * Build the engine configuration from environment-style variables.
 * Empty strings count as unset. Throws DuplicateThresholdInvalid or
 * ConfigurationError, both fatal for the run.
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const threshold = parseThreshold(cleaned.DUPLICATE_SIMILARITY_THRESHOLD);

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid engine configuration: ${issues}`);
  }
  const cfg = parsed.data;

  return {
    ai: {
      enabled: cfg.AI_MATCHING_ENABLED,
      model: cfg.AI_MODEL,
      apiKey: cfg.GEMINI_API_KEY,
      timeoutMs: cfg.AI_TIMEOUT_MS,
      maxRetries: cfg.AI_MAX_RETRIES,
      retryBaseDelayMs: cfg.AI_RETRY_BASE_DELAY_MS,
      maxConcurrent: cfg.AI_MAX_CONCURRENT
    },
    embedding: {
      backend: cfg.EMBEDDING_BACKEND,
      model: cfg.EMBEDDING_MODEL,
      dimension: cfg.EMBEDDING_DIMENSION,
      similarityFloor: cfg.SEMANTIC_SIMILARITY_FLOOR
    },
    weights: {
      lexical: cfg.WEIGHT_LEXICAL,
      semantic: cfg.WEIGHT_SEMANTIC,
      ai: cfg.WEIGHT_AI
    },
    lexical: {
      partialCredit: cfg.PARTIAL_MATCH_CREDIT,
      requiredMissingPenalty: cfg.REQUIRED_MISSING_PENALTY
    },
    duplicates: {
      threshold,
      strongSignal: 0.95,
      textWeight: 0.7,
      skillWeight: 0.3,
      shingleSize: 3,
      survivorOrder: parseSurvivorOrder(cfg.SURVIVOR_ORDER)
    },
    scoring: {
      concurrency: cfg.SCORING_CONCURRENCY,
      lockPolicy: cfg.LOCK_POLICY
    },
    extraction: {
      defaultCountryCode: cfg.DEFAULT_PHONE_COUNTRY_CODE,
      vocabularyPath: cfg.SKILL_VOCABULARY_PATH
    },
    server: {
      port: cfg.PORT,
      mongoUri: cfg.MONGODB_URI
    }
  };
}
