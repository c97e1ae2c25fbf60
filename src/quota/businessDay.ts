import { QuotaRecord, UsageKind } from '../types';

// Daily counters roll over at midnight in UTC+7
export const BUSINESS_DAY_OFFSET_HOURS = 7;

const OFFSET_MS = BUSINESS_DAY_OFFSET_HOURS * 60 * 60 * 1000;

/**
 * Calendar date (YYYY-MM-DD) of `date` in the business-day time zone
 */
export function businessDayKey(date: Date): string {
  return new Date(date.getTime() + OFFSET_MS).toISOString().slice(0, 10);
}

export function emptyRecord(accountId: string, now: Date): QuotaRecord {
  return {
    accountId,
    totalPlays: 0,
    totalDownloads: 0,
    dailyPlays: 0,
    dailyDownloads: 0,
    lastResetAt: now.toISOString(),
    isBanned: false,
  };
}

/**
 * True when the record's daily counters belong to an earlier business day.
 * An unparseable reset date counts as stale.
 */
export function isStale(record: QuotaRecord, now: Date): boolean {
  const lastReset = new Date(record.lastResetAt);
  if (Number.isNaN(lastReset.getTime())) return true;
  return businessDayKey(lastReset) < businessDayKey(now);
}

/**
 * Today's counter for `kind`, reading zero when the record is stale
 */
export function dailyCount(record: QuotaRecord, kind: UsageKind, now: Date): number {
  if (isStale(record, now)) return 0;
  return kind === 'download' ? record.dailyDownloads : record.dailyPlays;
}
