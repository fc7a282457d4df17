import { DatabaseService } from '../services/DatabaseService';

const mockMongo = { clientsCreated: 0, clientsClosed: 0, failNextConnect: false };

jest.mock('mongodb', () => {
  class FakeCollection {
    async createIndex(): Promise<string> {
      return 'index';
    }

    async findOne(): Promise<null> {
      return null;
    }
  }

  class MongoClient {
    constructor() {
      mockMongo.clientsCreated++;
    }

    async connect(): Promise<void> {
      await new Promise(resolve => setTimeout(resolve, 5));
      if (mockMongo.failNextConnect) {
        mockMongo.failNextConnect = false;
        throw new Error('connection refused');
      }
    }

    db() {
      return { collection: () => new FakeCollection() };
    }

    async close(): Promise<void> {
      mockMongo.clientsClosed++;
    }
  }

  class MongoServerError extends Error {
    code?: number;
  }

  return { MongoClient, MongoServerError };
});

describe('DatabaseService', () => {
  beforeEach(() => {
    mockMongo.clientsCreated = 0;
    mockMongo.clientsClosed = 0;
    mockMongo.failNextConnect = false;
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should open a single client for concurrent first calls', async () => {
    const store = new DatabaseService('mongodb://localhost:27017', 'test');

    const results = await Promise.all(Array.from({ length: 8 }, () => store.getLatest('job-1', 'fp-1')));

    expect(results).toEqual(Array(8).fill(null));
    expect(mockMongo.clientsCreated).toBe(1);

    await store.disconnect();
    expect(mockMongo.clientsClosed).toBe(1);
  });

  it('should retry the connection after a failed attempt', async () => {
    const store = new DatabaseService('mongodb://localhost:27017', 'test');
    mockMongo.failNextConnect = true;

    await expect(store.getLatest('job-1', 'fp-1')).rejects.toThrow('connection refused');
    await expect(store.getLatest('job-1', 'fp-1')).resolves.toBeNull();

    expect(mockMongo.clientsCreated).toBe(2);
    expect(mockMongo.clientsClosed).toBe(1);
    await store.disconnect();
  });
});
