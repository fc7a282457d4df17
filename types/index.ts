export type SubScoreName = 'lexical' | 'semantic' | 'ai';

export type ScoreWeights = Record<SubScoreName, number>;

export type LockPolicy = 'on_success' | 'finalize_only';

export type SurvivorCriterion = 'score' | 'contact' | 'upload';

export type WarningCode =
  | 'ExtractionDegraded'
  | 'EmbeddingUnavailable'
  | 'AIProviderError';

export interface EngineWarning {
  code: WarningCode;
  message: string;
}

export interface FileMetadata {
  name: string;
  size: number;
  uploadedAt: string; // ISO timestamp
}

export interface ContactFields {
  name: string;
  email: string | null;
  phone: string | null; // canonical, e.g. "+919876543210"
}

export interface ResumeRecord {
  submissionId: string;
  fingerprint: string; // sha256 of normalized text
  rawText: string;
  normalizedText: string;
  contact: ContactFields;
  skills: string[];
  file: FileMetadata;
  warnings: EngineWarning[];
}

export interface RequirementTerm {
  term: string;
  required: boolean;
}

export interface JobDescriptionRecord {
  jobId: string; // sha256 of normalized text
  title: string;
  rawText: string;
  normalizedText: string;
  requirements: RequirementTerm[];
  weights: ScoreWeights;
}

export interface MatchResult {
  jobId: string;
  fingerprint: string;
  version: number;
  lexicalScore: number;
  semanticScore: number | null;
  aiScore: number | null;
  aiRationale: string | null;
  aiModel: string | null;
  composite: number; // [0,1]
  percent: number; // 0-100, one decimal
  weightsApplied: Partial<ScoreWeights>;
  strengths: string[];
  concerns: string[];
  rationale: string;
  computedAt: string;
  locked: boolean;
  lockReason: 'pipeline_complete' | 'finalized' | null;
  degraded: boolean;
  algorithmVersion: string;
}

export type CriterionName = 'text' | 'contact' | 'skills' | 'blend';

export interface PairSimilarity {
  a: string; // submission id
  b: string;
  text: number;
  contact: number;
  skills: number;
  scoreProximity: number;
  nameMatch: boolean;
  overall: number;
  trigger: CriterionName;
  duplicate: boolean;
}

export interface ClusterMember {
  submissionId: string;
  fingerprint: string;
}

export interface DuplicateCluster {
  clusterId: string;
  jobId: string;
  members: ClusterMember[];
  survivor: ClusterMember;
  pairs: PairSimilarity[];
  survivorRationale: string;
}

export type EntryStatus = 'scored' | 'reused' | 'failed' | 'cancelled';

export interface RankedCandidate {
  resume: ResumeRecord;
  result: MatchResult | null;
  status: EntryStatus;
  warnings: EngineWarning[];
  error?: string;
  rank: number | null;
  suppressed: boolean;
  duplicateOf: string | null; // survivor submission id
  clusterId: string | null;
}

export interface BatchResult {
  batchId: string;
  jobId: string;
  cancelled: boolean;
  entries: RankedCandidate[];
  clusters: DuplicateCluster[];
  summary: {
    total: number;
    scored: number;
    reused: number;
    failed: number;
    cancelled: number;
    suppressed: number;
  };
}

export interface ExportRow {
  rank: number | null;
  submissionId: string;
  fingerprint: string;
  fileName: string;
  candidateName: string;
  email: string | null;
  phone: string | null;
  percent: number | null;
  lexicalScore: number | null;
  semanticScore: number | null;
  aiScore: number | null;
  strengths: string[];
  concerns: string[];
  locked: boolean;
  status: EntryStatus;
  error: string | null;
  suppressed: boolean;
  duplicateOf: string | null;
}
