import { InMemoryResultStore } from '../services/ResultStore';
import { DuplicateCluster, MatchResult } from '../types';
import { InconsistentScoreRequest } from '../utils/errors';

function draft(overrides: Partial<Omit<MatchResult, 'version'>> = {}): Omit<MatchResult, 'version'> {
  return {
    jobId: 'job-1',
    fingerprint: 'fp-1',
    lexicalScore: 0.5,
    semanticScore: 0.6,
    aiScore: null,
    aiRationale: null,
    aiModel: null,
    composite: 0.54,
    percent: 54,
    weightsApplied: { lexical: 0.5714, semantic: 0.4286 },
    strengths: [],
    concerns: [],
    rationale: 'Partial skill match.',
    computedAt: '2026-01-01T00:00:00.000Z',
    locked: false,
    lockReason: null,
    degraded: false,
    algorithmVersion: 'test',
    ...overrides
  };
}

describe('InMemoryResultStore', () => {
  let store: InMemoryResultStore;

  beforeEach(() => {
    store = new InMemoryResultStore();
  });

  it('should number versions per job and fingerprint', async () => {
    await store.append(draft());
    const second = await store.append(draft({ composite: 0.6 }));
    const other = await store.append(draft({ fingerprint: 'fp-2' }));

    expect(second.version).toBe(2);
    expect(other.version).toBe(1);
    await expect(store.getLatest('job-1', 'fp-1')).resolves.toMatchObject({ version: 2, composite: 0.6 });
    await expect(store.getHistory('job-1', 'fp-1')).resolves.toHaveLength(2);
    await expect(store.getLatest('job-2', 'fp-1')).resolves.toBeNull();
  });

  it('should refuse to append on top of a locked version without override', async () => {
    await store.append(draft({ locked: true, lockReason: 'pipeline_complete' }));

    await expect(store.append(draft())).rejects.toThrow(
      new InconsistentScoreRequest(
        'Result for fingerprint fp-1 under job job-1 is locked at version 1; pass override to recompute'
      )
    );
    await expect(store.append(draft(), { override: true })).resolves.toMatchObject({ version: 2, locked: false });
  });

  it('should hand out copies', async () => {
    const stored = await store.append(draft());
    stored.strengths.push('mutated');

    const latest = await store.getLatest('job-1', 'fp-1');
    expect(latest?.strengths).toEqual([]);
  });

  it('should list the latest version of each fingerprint for a job', async () => {
    await store.append(draft({ fingerprint: 'fp-b' }));
    await store.append(draft({ fingerprint: 'fp-a' }));
    await store.append(draft({ fingerprint: 'fp-b', composite: 0.9 }));
    await store.append(draft({ jobId: 'job-2', fingerprint: 'fp-c' }));

    const latest = await store.listLatest('job-1');

    expect(latest.map(r => [r.fingerprint, r.version])).toEqual([
      ['fp-a', 1],
      ['fp-b', 2]
    ]);
  });

  it('should replace the clusters of a job', async () => {
    const cluster: DuplicateCluster = {
      clusterId: 'job-1:a',
      jobId: 'job-1',
      members: [{ submissionId: 'a', fingerprint: 'fp-1' }],
      survivor: { submissionId: 'a', fingerprint: 'fp-1' },
      pairs: [],
      survivorRationale: 'Single submission'
    };

    await store.replaceClusters('job-1', [cluster, { ...cluster, clusterId: 'job-1:b' }]);
    await store.replaceClusters('job-1', [cluster]);

    await expect(store.listClusters('job-1')).resolves.toEqual([cluster]);
    await expect(store.listClusters('job-2')).resolves.toEqual([]);
  });
});
