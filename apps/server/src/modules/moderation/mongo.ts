import { MongoClient, type Collection, type Db } from 'mongodb';
import type {
  BanRecord,
  ModerationStore,
  NewReportLogEntry,
  ReportRecord,
} from './store';

type ReportLogDocument = NewReportLogEntry & { reportId: number };

type CounterDocument = {
  _id: string;
  seq: number;
};

const REPORT_LOG_COUNTER = 'report_log';

const toBanRecord = (doc: BanRecord): BanRecord => ({
  address: doc.address,
  banEnd: doc.banEnd,
  reason: doc.reason,
  banCount: doc.banCount,
});

const toReportRecord = (doc: ReportRecord): ReportRecord => ({
  address: doc.address,
  reportCount: doc.reportCount,
  lastReported: doc.lastReported,
  banCount: doc.banCount ?? 0,
});

export class MongoModerationStore implements ModerationStore {
  private readonly client: MongoClient;
  readonly bans: Collection<BanRecord>;
  readonly reports: Collection<ReportRecord>;
  readonly reportLog: Collection<ReportLogDocument>;
  readonly counters: Collection<CounterDocument>;

  private constructor(client: MongoClient, db: Db) {
    this.client = client;
    this.bans = db.collection<BanRecord>('user_bans');
    this.reports = db.collection<ReportRecord>('user_reports');
    this.reportLog = db.collection<ReportLogDocument>('report_log');
    this.counters = db.collection<CounterDocument>('counters');
  }

  static async connect(uri: string): Promise<MongoModerationStore | null> {
    if (!uri) return null;
    const client = new MongoClient(uri);
    await client.connect();
    const store = new MongoModerationStore(client, client.db());
    await store.ensureIndexes();
    return store;
  }

  async ensureIndexes() {
    await this.bans.createIndex({ address: 1 }, { unique: true });
    await this.bans.createIndex({ banEnd: 1 });
    await this.reports.createIndex({ address: 1 }, { unique: true });
    await this.reportLog.createIndex({ reportId: 1 }, { unique: true });
    await this.reportLog.createIndex({ reportedAddress: 1, timestamp: -1 });
  }

  async lookupBan(address: string): Promise<BanRecord | null> {
    const doc = await this.bans.findOne({ address });
    return doc ? toBanRecord(doc) : null;
  }

  async upsertBan(record: BanRecord) {
    await this.bans.updateOne(
      { address: record.address },
      { $set: { banEnd: record.banEnd, reason: record.reason, banCount: record.banCount } },
      { upsert: true }
    );
    await this.reports.updateOne(
      { address: record.address },
      {
        $set: { banCount: record.banCount },
        $setOnInsert: { reportCount: 0, lastReported: new Date(0) },
      },
      { upsert: true }
    );
  }

  async deleteBan(address: string) {
    await this.bans.deleteOne({ address });
  }

  async deleteExpiredBans(now: Date): Promise<number> {
    const result = await this.bans.deleteMany({ banEnd: { $lt: now } });
    return result.deletedCount;
  }

  async incrementReport(address: string, at: Date): Promise<ReportRecord> {
    const doc = await this.reports.findOneAndUpdate(
      { address },
      {
        $inc: { reportCount: 1 },
        $set: { lastReported: at },
        $setOnInsert: { banCount: 0 },
      },
      { upsert: true, returnDocument: 'after' }
    );
    if (!doc) {
      throw new Error('REPORT_UPSERT_FAILED');
    }
    return toReportRecord(doc);
  }

  async readReport(address: string): Promise<ReportRecord | null> {
    const doc = await this.reports.findOne({ address });
    return doc ? toReportRecord(doc) : null;
  }

  async appendReportLog(entry: NewReportLogEntry): Promise<number> {
    const counter = await this.counters.findOneAndUpdate(
      { _id: REPORT_LOG_COUNTER },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after' }
    );
    if (!counter) {
      throw new Error('REPORT_COUNTER_FAILED');
    }
    await this.reportLog.insertOne({ ...entry, reportId: counter.seq });
    return counter.seq;
  }

  async close() {
    await this.client.close();
  }
}
