export type UsageKind = 'play' | 'download';

export interface QuotaRecord {
  accountId: string;
  totalPlays: number;
  totalDownloads: number;
  dailyPlays: number;
  dailyDownloads: number;
  lastResetAt: string; // ISO Date
  isBanned: boolean;
}

/**
 * Fields a store write may carry (partial merge)
 */
export type QuotaFields = Partial<Omit<QuotaRecord, 'accountId'>>;

export interface QuotaSnapshot {
  businessDay: string;
  dailyCountAtSessionStart: number;
  downloadsThisSession: number;
  lastKnownBanned: boolean;
  limit: number;
}
