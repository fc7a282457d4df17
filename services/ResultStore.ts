import { DuplicateCluster, MatchResult } from '../types';
import { compareCodeUnits } from '../utils/compare';
import { InconsistentScoreRequest } from '../utils/errors';
import { FingerprintService } from './FingerprintService';

export interface AppendOptions {
  /** Allows a new version on top of a locked one. */
  override?: boolean;
}

/**
 * Append-only persistence for match results, keyed by (jobId, fingerprint).
 * Every append is a new version; the latest version is authoritative.
 */
export interface ResultStore {
  getLatest(jobId: string, fingerprint: string): Promise<MatchResult | null>;
  getHistory(jobId: string, fingerprint: string): Promise<MatchResult[]>;
  /** Assigns the next version number and returns the stored copy. */
  append(result: Omit<MatchResult, 'version'>, options?: AppendOptions): Promise<MatchResult>;
  listLatest(jobId: string): Promise<MatchResult[]>;
  replaceClusters(jobId: string, clusters: DuplicateCluster[]): Promise<void>;
  listClusters(jobId: string): Promise<DuplicateCluster[]>;
  close(): Promise<void>;
}

export function assertAppendAllowed(latest: MatchResult | null, options: AppendOptions | undefined): void {
  if (latest?.locked && !options?.override) {
    throw new InconsistentScoreRequest(
      `Result for fingerprint ${latest.fingerprint} under job ${latest.jobId} is locked at version ${latest.version}; pass override to recompute`
    );
  }
}

export class InMemoryResultStore implements ResultStore {
  private readonly history = new Map<string, MatchResult[]>();
  private readonly clusters = new Map<string, DuplicateCluster[]>();

  async getLatest(jobId: string, fingerprint: string): Promise<MatchResult | null> {
    const versions = this.history.get(FingerprintService.resultKey(jobId, fingerprint));
    if (!versions || versions.length === 0) return null;
    return structuredClone(versions[versions.length - 1]);
  }

  async getHistory(jobId: string, fingerprint: string): Promise<MatchResult[]> {
    const versions = this.history.get(FingerprintService.resultKey(jobId, fingerprint)) ?? [];
    return versions.map(result => structuredClone(result));
  }

  async append(result: Omit<MatchResult, 'version'>, options?: AppendOptions): Promise<MatchResult> {
    const key = FingerprintService.resultKey(result.jobId, result.fingerprint);
    const versions = this.history.get(key) ?? [];
    const latest = versions.length > 0 ? versions[versions.length - 1] : null;
    assertAppendAllowed(latest, options);

    const stored: MatchResult = { ...structuredClone(result), version: (latest?.version ?? 0) + 1 };
    versions.push(stored);
    this.history.set(key, versions);
    return structuredClone(stored);
  }

  async listLatest(jobId: string): Promise<MatchResult[]> {
    const results: MatchResult[] = [];
    for (const versions of this.history.values()) {
      const latest = versions[versions.length - 1];
      if (latest && latest.jobId === jobId) results.push(structuredClone(latest));
    }
    return results.sort((a, b) => compareCodeUnits(a.fingerprint, b.fingerprint));
  }

  async replaceClusters(jobId: string, clusters: DuplicateCluster[]): Promise<void> {
    this.clusters.set(jobId, structuredClone(clusters));
  }

  async listClusters(jobId: string): Promise<DuplicateCluster[]> {
    return structuredClone(this.clusters.get(jobId) ?? []);
  }

  async close(): Promise<void> {
    this.history.clear();
    this.clusters.clear();
  }
}
