import { MongoClient, Db, Collection, MongoServerError } from 'mongodb';
import { DuplicateCluster, MatchResult } from '../types';
import { InconsistentScoreRequest, errorMessage } from '../utils/errors';
import { AppendOptions, ResultStore, assertAppendAllowed } from './ResultStore';

export interface MatchResultDocument extends MatchResult {
  recordedAt: Date;
}

export interface ClusterDocument extends DuplicateCluster {
  updatedAt: Date;
}

const DUPLICATE_KEY = 11000;

/**
 * MongoDB-backed result store. Connects lazily on first use; results are
 * inserted, never updated, with a unique index on (jobId, fingerprint, version).
 */
export class DatabaseService implements ResultStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private resultsCollection: Collection<MatchResultDocument> | null = null;
  private clustersCollection: Collection<ClusterDocument> | null = null;
  private isConnected = false;
  private connecting: Promise<void> | null = null;

  constructor(private readonly uri: string, private readonly dbName: string = 'resume_ranking') {}

  async connect(): Promise<void> {
    if (this.isConnected && this.db) {
      return;
    }
    // Concurrent first calls share one client; a failed attempt is cleared so the next call retries.
    if (!this.connecting) {
      this.connecting = this.openConnection().catch(error => {
        this.connecting = null;
        throw error;
      });
    }
    await this.connecting;
  }

  private async openConnection(): Promise<void> {
    const client = new MongoClient(this.uri);
    try {
      await client.connect();
      const db = client.db(this.dbName);
      const resultsCollection = db.collection<MatchResultDocument>('match_results');
      const clustersCollection = db.collection<ClusterDocument>('duplicate_clusters');
      await resultsCollection.createIndex({ jobId: 1, fingerprint: 1, version: -1 }, { unique: true });
      await clustersCollection.createIndex({ jobId: 1 });

      this.client = client;
      this.db = db;
      this.resultsCollection = resultsCollection;
      this.clustersCollection = clustersCollection;
      this.isConnected = true;
      console.log(`[DatabaseService] Connected to ${this.dbName}`);
    } catch (error) {
      console.error('[DatabaseService] Connection failed:', errorMessage(error));
      await client.close();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    const pending = this.connecting;
    this.connecting = null;
    if (pending) {
      try {
        await pending;
      } catch (error) {
        console.warn('[DatabaseService] Nothing to disconnect, connection had failed:', errorMessage(error));
      }
    }
    if (this.client) {
      await this.client.close();
      this.isConnected = false;
      this.client = null;
      this.db = null;
      this.resultsCollection = null;
      this.clustersCollection = null;
    }
  }

  async close(): Promise<void> {
    await this.disconnect();
  }

  private async results(): Promise<Collection<MatchResultDocument>> {
    if (!this.isConnected) {
      await this.connect();
    }
    if (!this.resultsCollection) throw new Error('Database not initialized');
    return this.resultsCollection;
  }

  private async clusters(): Promise<Collection<ClusterDocument>> {
    if (!this.isConnected) {
      await this.connect();
    }
    if (!this.clustersCollection) throw new Error('Database not initialized');
    return this.clustersCollection;
  }

  async getLatest(jobId: string, fingerprint: string): Promise<MatchResult | null> {
    const collection = await this.results();
    const doc = await collection.findOne({ jobId, fingerprint }, { sort: { version: -1 } });
    return doc ? toMatchResult(doc) : null;
  }

  async getHistory(jobId: string, fingerprint: string): Promise<MatchResult[]> {
    const collection = await this.results();
    const docs = await collection.find({ jobId, fingerprint }).sort({ version: 1 }).toArray();
    return docs.map(toMatchResult);
  }

  async append(result: Omit<MatchResult, 'version'>, options?: AppendOptions): Promise<MatchResult> {
    const collection = await this.results();
    const latest = await this.getLatest(result.jobId, result.fingerprint);
    assertAppendAllowed(latest, options);

    const stored: MatchResult = { ...result, version: (latest?.version ?? 0) + 1 };
    try {
      await collection.insertOne({ ...stored, recordedAt: new Date() });
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        throw new InconsistentScoreRequest(
          `Concurrent write for fingerprint ${result.fingerprint} under job ${result.jobId} at version ${stored.version}`
        );
      }
      throw error;
    }
    return stored;
  }

  async listLatest(jobId: string): Promise<MatchResult[]> {
    const collection = await this.results();
    const docs = await collection
      .aggregate<MatchResultDocument>([
        { $match: { jobId } },
        { $sort: { fingerprint: 1, version: -1 } },
        { $group: { _id: '$fingerprint', latest: { $first: '$$ROOT' } } },
        { $replaceRoot: { newRoot: '$latest' } },
        { $sort: { fingerprint: 1 } }
      ])
      .toArray();
    return docs.map(toMatchResult);
  }

  async replaceClusters(jobId: string, clusters: DuplicateCluster[]): Promise<void> {
    const collection = await this.clusters();
    await collection.deleteMany({ jobId });
    if (clusters.length > 0) {
      const updatedAt = new Date();
      await collection.insertMany(clusters.map(cluster => ({ ...cluster, updatedAt })));
    }
  }

  async listClusters(jobId: string): Promise<DuplicateCluster[]> {
    const collection = await this.clusters();
    const docs = await collection.find({ jobId }).sort({ clusterId: 1 }).toArray();
    return docs.map(({ _id, updatedAt, ...cluster }) => cluster);
  }
}

function toMatchResult(doc: MatchResultDocument & { _id?: unknown }): MatchResult {
  const { _id, recordedAt, ...result } = doc;
  return result;
}
