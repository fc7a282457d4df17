import { LocalEmbeddingService } from '../services/LocalEmbeddingService';
import { MatchingService, createMatchingService } from '../services/MatchingService';
import { AppendOptions, InMemoryResultStore } from '../services/ResultStore';
import { MatchResult } from '../types';
import { loadEngineConfig } from '../utils/config';
import { ConfigurationError } from '../utils/errors';

const JOB = {
  text: 'Backend Engineer\nRequirements:\n- Python\n- Docker\n- Kubernetes\nNice to have:\n- Kafka'
};

const ALICE_TEXT = 'Alice Smith\nalice@example.com\nPython, Docker, Kubernetes and Kafka in production';

const RESUMES = [
  { submissionId: 'alice-1', text: ALICE_TEXT, fileName: 'alice.pdf', uploadedAt: '2026-01-01T00:00:00.000Z' },
  { submissionId: 'bob', text: 'Bob Jones\nbob@example.com\nPython scripting only', fileName: 'bob.docx' },
  { submissionId: 'alice-2', text: ALICE_TEXT, fileName: 'alice (1).pdf', uploadedAt: '2026-01-02T00:00:00.000Z' }
];

class FlakyStore extends InMemoryResultStore {
  constructor(private readonly failingFingerprint: string) {
    super();
  }

  async append(result: Omit<MatchResult, 'version'>, options?: AppendOptions): Promise<MatchResult> {
    if (result.fingerprint === this.failingFingerprint) {
      throw new Error('disk full');
    }
    return super.append(result, options);
  }
}

function buildService(store?: InMemoryResultStore): MatchingService {
  return createMatchingService(loadEngineConfig({}), {
    store,
    embeddingBackend: new LocalEmbeddingService(64),
    aiProvider: null
  });
}

describe('MatchingService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should rank survivors and suppress duplicates', async () => {
    const service = buildService();

    const batch = await service.matchTexts(JOB, RESUMES, { batchId: 'batch-1' });

    expect(batch.batchId).toBe('batch-1');
    expect(batch.cancelled).toBe(false);
    expect(batch.entries.map(e => [e.resume.submissionId, e.rank, e.status])).toEqual([
      ['alice-1', 1, 'scored'],
      ['bob', 2, 'scored'],
      ['alice-2', null, 'reused']
    ]);
    const duplicate = batch.entries[2];
    expect(duplicate.suppressed).toBe(true);
    expect(duplicate.duplicateOf).toBe('alice-1');
    expect(batch.summary).toEqual({ total: 3, scored: 2, reused: 1, failed: 0, cancelled: 0, suppressed: 1 });
    expect(batch.clusters.filter(c => c.members.length > 1)).toHaveLength(1);
    expect(batch.clusters[0].survivorRationale).toBe('Earliest upload (2026-01-01T00:00:00.000Z)');
  });

  it('should pick the same survivor whatever the input order', async () => {
    const text = 'Dana Reyes\ndana@example.com\nPython and Docker services';
    const early = { submissionId: 'early', text, fileName: 'dana.txt', uploadedAt: '2026-01-01T00:00:00.000Z' };
    const late = { submissionId: 'late', text, fileName: 'dana (1).txt', uploadedAt: '2026-01-02T00:00:00.000Z' };

    const survivors: Array<[string | undefined, string | undefined]> = [];
    for (const order of [
      [early, late],
      [late, early]
    ]) {
      const batch = await buildService().matchTexts(JOB, order);
      const cluster = batch.clusters.find(c => c.members.length > 1);
      survivors.push([cluster?.survivor.submissionId, cluster?.survivorRationale]);
    }

    expect(survivors).toEqual([
      ['early', 'Earliest upload (2026-01-01T00:00:00.000Z)'],
      ['early', 'Earliest upload (2026-01-01T00:00:00.000Z)']
    ]);
  });

  it('should reuse stored results when a batch is rerun with a new resume', async () => {
    const service = buildService();
    const first = await service.matchTexts(JOB, RESUMES.slice(0, 2));

    const carol = { submissionId: 'carol', text: 'Carol White\ncarol@example.com\nGraphic design', fileName: 'carol.txt' };
    const second = await service.matchTexts(JOB, [...RESUMES.slice(0, 2), carol]);

    expect(second.summary.reused).toBe(2);
    expect(second.summary.scored).toBe(1);
    const composites = (batch: typeof first) =>
      batch.entries.filter(e => e.resume.submissionId !== 'carol').map(e => [e.resume.submissionId, e.result?.composite]);
    expect(composites(second).sort()).toEqual(composites(first).sort());
  });

  it('should isolate a failure to its own entry', async () => {
    const probe = buildService();
    const bobFingerprint = probe.buildResume(RESUMES[1]).fingerprint;
    const service = buildService(new FlakyStore(bobFingerprint));
    const job = service.buildJob(JOB);

    const batch = await service.runBatch(job, RESUMES.map(input => service.buildResume(input)));

    expect(batch.entries.map(e => [e.resume.submissionId, e.rank, e.status])).toEqual([
      ['alice-1', 1, 'scored'],
      ['bob', null, 'failed'],
      ['alice-2', null, 'reused']
    ]);
    expect(batch.entries[1].error).toBe('disk full');
    expect(batch.entries[1].result).toBeNull();
    expect(batch.summary.failed).toBe(1);
  });

  it('should stop a cancelled batch without detecting duplicates', async () => {
    const service = buildService();
    const controller = new AbortController();
    controller.abort();

    const batch = await service.matchTexts(JOB, RESUMES, { signal: controller.signal });

    expect(batch.cancelled).toBe(true);
    expect(batch.clusters).toEqual([]);
    expect(batch.entries.every(e => e.status === 'cancelled' && e.rank === null)).toBe(true);
    expect(batch.summary.cancelled).toBe(3);
    const stored = await service.getStoredView(batch.jobId);
    expect(stored.results).toEqual([]);
  });

  it('should expose stored results and clusters by job', async () => {
    const service = buildService();
    const batch = await service.matchTexts(JOB, RESUMES);

    const view = await service.getStoredView(batch.jobId);

    expect(view.jobId).toBe(batch.jobId);
    expect(view.results).toHaveLength(2);
    expect(view.results.every(r => r.version === 1 && r.locked)).toBe(true);
    expect(view.clusters.map(c => c.members.length).sort()).toEqual([1, 2]);
  });

  it('should produce frozen export rows', async () => {
    const service = buildService();
    const batch = await service.matchTexts(JOB, RESUMES);

    const rows = service.toExportView(batch);

    expect(Object.isFrozen(rows)).toBe(true);
    expect(Object.isFrozen(rows[0])).toBe(true);
    expect(rows[0]).toMatchObject({
      rank: 1,
      submissionId: 'alice-1',
      fileName: 'alice.pdf',
      candidateName: 'Alice Smith',
      email: 'alice@example.com',
      phone: null,
      lexicalScore: 1,
      aiScore: null,
      locked: true,
      status: 'scored',
      suppressed: false,
      duplicateOf: null
    });
    expect(rows[2]).toMatchObject({ submissionId: 'alice-2', rank: null, suppressed: true, duplicateOf: 'alice-1' });
  });

  it('should finalize a stored result', async () => {
    const service = createMatchingService(loadEngineConfig({ LOCK_POLICY: 'finalize_only' }), {
      embeddingBackend: new LocalEmbeddingService(64),
      aiProvider: null
    });
    const batch = await service.matchTexts(JOB, RESUMES.slice(0, 1));
    const fingerprint = batch.entries[0].resume.fingerprint;
    expect(batch.entries[0].result?.locked).toBe(false);

    const finalized = await service.finalize(batch.jobId, fingerprint);

    expect(finalized.locked).toBe(true);
    expect(finalized.lockReason).toBe('finalized');
    expect(finalized.version).toBe(2);
  });

  describe('createMatchingService', () => {
    it('should require an API key when AI matching is enabled', () => {
      const config = loadEngineConfig({ AI_MATCHING_ENABLED: 'true' });

      expect(() => createMatchingService(config, { embeddingBackend: new LocalEmbeddingService(8) })).toThrow(
        new ConfigurationError('AI_MATCHING_ENABLED is set but GEMINI_API_KEY is missing')
      );
    });

    it('should require an API key for remote embeddings', () => {
      const config = loadEngineConfig({ EMBEDDING_BACKEND: 'gemini' });

      expect(() => createMatchingService(config)).toThrow('EMBEDDING_BACKEND=gemini requires GEMINI_API_KEY');
    });
  });
});
