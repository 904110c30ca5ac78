import { appendFile, readFile } from "node:fs/promises";
import { MongoClient, type Collection, type Db } from "mongodb";

import { logger } from "../core/logger";
import type { AuditEntry, JobSummary } from "../types/models";

const log = logger.child("audit");

export const JOB_COLLECTION = "pipeline_jobs";
export const EXTRACTION_LOG_COLLECTION = "extraction_logs";

/** A finished job as archived in the document tier. */
export interface JobDocument extends JobSummary {
  symbols: string[];
  failedSymbols: string[];
  skippedSymbols: string[];
}

export interface AuditQuery {
  symbol?: string;
  jobId?: string;
  limit?: number;
}

export interface DocumentStats {
  kind: "mongodb" | "jsonl";
  connected: boolean;
  collections: Record<string, number>;
}

/** Append-only archive of extraction audit entries and finished jobs. */
export interface AuditStore {
  readonly kind: "mongodb" | "jsonl";
  appendAuditEntry(entry: AuditEntry): Promise<void>;
  insertJob(job: JobDocument): Promise<void>;
  listJobs(limit?: number): Promise<JobDocument[]>;
  listAuditEntries(query?: AuditQuery): Promise<AuditEntry[]>;
  ping(): Promise<boolean>;
  stats(): Promise<DocumentStats>;
  close(): Promise<void>;
}

const clampLimit = (limit: number | undefined, fallback: number): number =>
  Math.max(1, Math.min(limit ?? fallback, 1_000));

export class MongoAuditStore implements AuditStore {
  readonly kind = "mongodb" as const;
  private readonly jobs: Collection<JobDocument>;
  private readonly extractionLogs: Collection<AuditEntry>;
  private indexesReady: Promise<void> | null = null;

  constructor(
    private readonly client: MongoClient,
    db: Db
  ) {
    this.jobs = db.collection<JobDocument>(JOB_COLLECTION);
    this.extractionLogs = db.collection<AuditEntry>(EXTRACTION_LOG_COLLECTION);
  }

  static connect(url: string, dbName: string): MongoAuditStore {
    const client = new MongoClient(url, { serverSelectionTimeoutMS: 2_000 });
    return new MongoAuditStore(client, client.db(dbName));
  }

  async appendAuditEntry(entry: AuditEntry): Promise<void> {
    await this.ensureIndexes();
    await this.extractionLogs.insertOne({ ...entry });
  }

  async insertJob(job: JobDocument): Promise<void> {
    await this.ensureIndexes();
    await this.jobs.insertOne({ ...job });
  }

  async listJobs(limit?: number): Promise<JobDocument[]> {
    const rows = await this.jobs
      .find({}, { projection: { _id: 0 } })
      .sort({ createdAt: -1 })
      .limit(clampLimit(limit, 100))
      .toArray();
    return rows.map(({ _id, ...job }) => job);
  }

  async listAuditEntries(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const filter: { symbol?: string; jobId?: string } = {};
    if (query.symbol) filter.symbol = query.symbol.toUpperCase();
    if (query.jobId) filter.jobId = query.jobId;

    const rows = await this.extractionLogs
      .find(filter, { projection: { _id: 0 } })
      .sort({ timestamp: -1 })
      .limit(clampLimit(query.limit, 200))
      .toArray();
    return rows.map(({ _id, ...entry }) => entry);
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.db("admin").command({ ping: 1 });
      return true;
    } catch (error) {
      log.debug("MongoDB ping failed", error instanceof Error ? error.message : error);
      return false;
    }
  }

  async stats(): Promise<DocumentStats> {
    const connected = await this.ping();
    if (!connected) return { kind: this.kind, connected, collections: {} };
    return {
      kind: this.kind,
      connected,
      collections: {
        [JOB_COLLECTION]: await this.jobs.estimatedDocumentCount(),
        [EXTRACTION_LOG_COLLECTION]: await this.extractionLogs.estimatedDocumentCount()
      }
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private ensureIndexes(): Promise<void> {
    if (!this.indexesReady) {
      this.indexesReady = Promise.all([
        this.jobs.createIndex({ jobId: 1 }, { unique: true }),
        this.jobs.createIndex({ createdAt: -1 }),
        this.extractionLogs.createIndex({ symbol: 1, timestamp: -1 }),
        this.extractionLogs.createIndex({ jobId: 1 })
      ]).then(
        () => undefined,
        (error: unknown) => {
          this.indexesReady = null;
          throw error;
        }
      );
    }
    return this.indexesReady;
  }
}

type JsonlRecord =
  | { collection: typeof JOB_COLLECTION; document: JobDocument }
  | { collection: typeof EXTRACTION_LOG_COLLECTION; document: AuditEntry };

const isJsonlRecord = (value: unknown): value is JsonlRecord =>
  typeof value === "object" &&
  value !== null &&
  "collection" in value &&
  "document" in value &&
  (value.collection === JOB_COLLECTION || value.collection === EXTRACTION_LOG_COLLECTION) &&
  typeof value.document === "object" &&
  value.document !== null;

/** Document tier backed by one append-only JSON Lines file. */
export class JsonlAuditStore implements AuditStore {
  readonly kind = "jsonl" as const;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async appendAuditEntry(entry: AuditEntry): Promise<void> {
    await this.append({ collection: EXTRACTION_LOG_COLLECTION, document: entry });
  }

  async insertJob(job: JobDocument): Promise<void> {
    await this.append({ collection: JOB_COLLECTION, document: job });
  }

  async listJobs(limit?: number): Promise<JobDocument[]> {
    const jobs: JobDocument[] = [];
    for (const record of await this.readAll()) {
      if (record.collection === JOB_COLLECTION) jobs.push(record.document);
    }
    jobs.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return jobs.slice(0, clampLimit(limit, 100));
  }

  async listAuditEntries(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const symbol = query.symbol?.toUpperCase();
    const entries: AuditEntry[] = [];
    for (const record of await this.readAll()) {
      if (record.collection !== EXTRACTION_LOG_COLLECTION) continue;
      if (symbol && record.document.symbol !== symbol) continue;
      if (query.jobId && record.document.jobId !== query.jobId) continue;
      entries.push(record.document);
    }
    entries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    return entries.slice(0, clampLimit(query.limit, 200));
  }

  async ping(): Promise<boolean> {
    try {
      await this.writeChain;
      return true;
    } catch (error) {
      log.debug("JSONL audit store write chain failed", error instanceof Error ? error.message : error);
      return false;
    }
  }

  async stats(): Promise<DocumentStats> {
    const collections: Record<string, number> = { [JOB_COLLECTION]: 0, [EXTRACTION_LOG_COLLECTION]: 0 };
    for (const record of await this.readAll()) collections[record.collection] += 1;
    return { kind: this.kind, connected: true, collections };
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private append(record: JsonlRecord): Promise<void> {
    const next = this.writeChain
      .catch(() => undefined)
      .then(() => appendFile(this.filePath, `${JSON.stringify(record)}\n`, { encoding: "utf8" }));
    this.writeChain = next;
    return next;
  }

  private async readAll(): Promise<JsonlRecord[]> {
    let content: string;
    try {
      await this.writeChain.catch(() => undefined);
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }

    const records: JsonlRecord[] = [];
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isJsonlRecord(parsed)) records.push(parsed);
      } catch {
        log.warn(`Skipping unreadable line in ${this.filePath}`);
      }
    }
    return records;
  }
}
