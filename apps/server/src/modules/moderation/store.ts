export type BanRecord = {
  address: string;
  banEnd: Date;
  reason: string;
  banCount: number;
};

export type ReportRecord = {
  address: string;
  reportCount: number;
  lastReported: Date;
  // Bans issued so far; outlives the ban records themselves.
  banCount: number;
};

export type ReportLogEntry = {
  id: number;
  reporterAddress: string;
  reportedAddress: string;
  reason: string;
  comment: string;
  timestamp: Date;
};

export type NewReportLogEntry = Omit<ReportLogEntry, 'id'>;

/**
 * Durable ban and report bookkeeping. `lookupBan` returns the raw record,
 * expired or not; expiry semantics live in the ban service.
 * `upsertBan` also stamps `banCount` on the address's report record.
 */
export type ModerationStore = {
  lookupBan: (address: string) => Promise<BanRecord | null>;
  upsertBan: (record: BanRecord) => Promise<void>;
  deleteBan: (address: string) => Promise<void>;
  deleteExpiredBans: (now: Date) => Promise<number>;
  incrementReport: (address: string, at: Date) => Promise<ReportRecord>;
  readReport: (address: string) => Promise<ReportRecord | null>;
  appendReportLog: (entry: NewReportLogEntry) => Promise<number>;
  close: () => Promise<void>;
};

export type MemoryModerationStore = ModerationStore & {
  bans: Map<string, BanRecord>;
  reports: Map<string, ReportRecord>;
  reportLog: ReportLogEntry[];
};

export const createMemoryModerationStore = (): MemoryModerationStore => {
  const bans = new Map<string, BanRecord>();
  const reports = new Map<string, ReportRecord>();
  const reportLog: ReportLogEntry[] = [];
  let nextReportId = 1;

  return {
    bans,
    reports,
    reportLog,
    lookupBan: async (address) => {
      const record = bans.get(address);
      return record ? { ...record } : null;
    },
    upsertBan: async (record) => {
      bans.set(record.address, { ...record });
      const report = reports.get(record.address);
      if (report) {
        report.banCount = record.banCount;
      } else {
        reports.set(record.address, {
          address: record.address,
          reportCount: 0,
          lastReported: new Date(0),
          banCount: record.banCount,
        });
      }
    },
    deleteBan: async (address) => {
      bans.delete(address);
    },
    deleteExpiredBans: async (now) => {
      let deleted = 0;
      for (const [address, record] of bans) {
        if (record.banEnd.getTime() < now.getTime()) {
          bans.delete(address);
          deleted += 1;
        }
      }
      return deleted;
    },
    incrementReport: async (address, at) => {
      const existing = reports.get(address);
      const record: ReportRecord = existing ?? {
        address,
        reportCount: 0,
        lastReported: at,
        banCount: 0,
      };
      record.reportCount += 1;
      record.lastReported = at;
      reports.set(address, record);
      return { ...record };
    },
    readReport: async (address) => {
      const record = reports.get(address);
      return record ? { ...record } : null;
    },
    appendReportLog: async (entry) => {
      const id = nextReportId;
      nextReportId += 1;
      reportLog.push({ id, ...entry });
      return id;
    },
    close: async () => undefined,
  };
};
