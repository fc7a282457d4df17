import { EmbedContentModel, EmbeddingService } from '../services/EmbeddingService';

class FakeEmbedModel implements EmbedContentModel {
  readonly requests: string[] = [];
  private failures: Error[];

  constructor(private readonly values: (text: string) => number[], failures: Error[] = []) {
    this.failures = [...failures];
  }

  async embedContent(text: string): Promise<{ embedding: { values: number[] } }> {
    this.requests.push(text);
    const failure = this.failures.shift();
    if (failure) throw failure;
    return { embedding: { values: this.values(text) } };
  }
}

describe('EmbeddingService', () => {
  let delays: number[];
  const recordSleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };

  beforeEach(() => {
    delays = [];
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('embed', () => {
    it('should return vectors of the configured dimension and cache them', async () => {
      const model = new FakeEmbedModel(() => [0.1, 0.2, 0.3]);
      const service = new EmbeddingService({ dimension: 3, sleep: recordSleep }, model);

      const first = await service.embed('Python engineer');
      const second = await service.embed('Python engineer');

      expect(first).toEqual([0.1, 0.2, 0.3]);
      expect(second).toEqual(first);
      expect(model.requests).toEqual(['Python engineer']);
      expect(service.getDimension()).toBe(3);
    });

    it('should pad or truncate to the configured dimension', async () => {
      const short = new EmbeddingService({ dimension: 4 }, new FakeEmbedModel(() => [1, 2]));
      const long = new EmbeddingService({ dimension: 2 }, new FakeEmbedModel(() => [1, 2, 3]));

      await expect(short.embed('a')).resolves.toEqual([1, 2, 0, 0]);
      await expect(long.embed('a')).resolves.toEqual([1, 2]);
      expect(console.warn).toHaveBeenCalledWith('[EmbeddingService] Dimension mismatch: 4 vs 2');
    });

    it('should retry transient failures with backoff', async () => {
      const model = new FakeEmbedModel(() => [1, 0], [new Error('fetch failed'), new Error('503 Service Unavailable')]);
      const service = new EmbeddingService({ dimension: 2, initialRetryDelayMs: 10, sleep: recordSleep }, model);

      await expect(service.embed('text')).resolves.toEqual([1, 0]);
      expect(model.requests).toHaveLength(3);
      expect(delays).toEqual([10, 20]);
    });

    it('should not retry a permanent failure', async () => {
      const model = new FakeEmbedModel(() => [1, 0], [new Error('API key not valid')]);
      const service = new EmbeddingService({ dimension: 2, sleep: recordSleep }, model);

      await expect(service.embed('text')).rejects.toThrow('Failed to generate embedding: API key not valid');
      expect(delays).toEqual([]);
    });

    it('should mean-pool the chunks of a long document', async () => {
      const model = new FakeEmbedModel(text => (text.startsWith('aaaa') ? [1, 0] : [0, 1]));
      const service = new EmbeddingService({ dimension: 2, maxChunkChars: 10 }, model);

      const vector = await service.embed('aaaa\n\nbbbb\n\ncccc');

      expect(model.requests).toEqual(['aaaa\n\nbbbb', 'cccc']);
      expect(vector).toEqual([0.5, 0.5]);
    });

    it('should require an API key without a model instance', () => {
      expect(() => new EmbeddingService({})).toThrow('GEMINI_API_KEY is required for embedding generation');
    });
  });

  describe('meanPool', () => {
    const service = new EmbeddingService({ dimension: 3 }, new FakeEmbedModel(() => [0, 0, 0]));

    it('should compute mean of vectors correctly', () => {
      const mean = service.meanPool([
        [1, 2, 3],
        [4, 5, 6],
        [7, 8, 9]
      ]);

      expect(mean).toEqual([4, 5, 6]);
    });

    it('should throw error for empty array', () => {
      expect(() => service.meanPool([])).toThrow('Cannot compute mean of empty vector array');
    });

    it('should throw error for vectors of different dimensions', () => {
      expect(() => service.meanPool([[1, 2, 3], [4, 5]])).toThrow('All vectors must have the same dimension');
    });
  });
});
