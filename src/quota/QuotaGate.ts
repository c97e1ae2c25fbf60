import { QuotaFields, QuotaSnapshot, UsageKind } from '../types';
import { QuotaStore } from '../database/QuotaStore';
import { logger, errorMessage } from '../utils/logger';
import { businessDayKey, dailyCount, emptyRecord, isStale } from './businessDay';

export const DEFAULT_DAILY_LIMIT = 50;

export interface QuotaGateOptions {
  dailyLimit?: number;
  clock?: () => Date;
}

/**
 * QuotaGate - Ban check and daily download quota for one account.
 *
 * The remote counter is read once per business day; downloads made by this
 * process are tracked locally on top of it so that concurrent writers cannot
 * make the remaining quota jump backwards mid-session.
 */
export class QuotaGate {
  private readonly store: QuotaStore;
  private readonly accountId: string;
  private readonly limit: number;
  private readonly clock: () => Date;

  private businessDay: string | null = null;
  private dailyCountAtSessionStart = 0;
  private downloadsThisSession = 0;
  private lastKnownBanned = false;

  constructor(store: QuotaStore, accountId: string, options: QuotaGateOptions = {}) {
    this.store = store;
    this.accountId = accountId;
    this.limit = options.dailyLimit ?? DEFAULT_DAILY_LIMIT;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Store errors read as "not banned"
   */
  async isBanned(): Promise<boolean> {
    try {
      const record = await this.store.read(this.accountId);
      this.lastKnownBanned = record?.isBanned ?? false;
    } catch (error) {
      logger.warn('Quota: ban check failed, allowing', {
        accountId: this.accountId,
        error: errorMessage(error),
      });
      this.lastKnownBanned = false;
    }
    return this.lastKnownBanned;
  }

  async remainingQuota(): Promise<number> {
    const today = businessDayKey(this.clock());
    if (this.businessDay !== today) {
      await this.seed(today);
    }

    if (this.lastKnownBanned) return 0;

    const used = this.dailyCountAtSessionStart + this.downloadsThisSession;
    return Math.min(this.limit, Math.max(0, this.limit - used));
  }

  /**
   * Count one usage. The local download counter moves before any I/O;
   * store failures are logged and swallowed.
   */
  async recordUsage(kind: UsageKind): Promise<void> {
    if (kind === 'download') {
      this.downloadsThisSession++;
    }

    try {
      const now = this.clock();
      const existing = await this.store.read(this.accountId);
      const record = existing ?? emptyRecord(this.accountId, now);
      const fields: QuotaFields = {};

      let { dailyPlays, dailyDownloads } = record;
      if (!existing || isStale(record, now)) {
        dailyPlays = 0;
        dailyDownloads = 0;
        fields.lastResetAt = now.toISOString();
        fields.dailyPlays = 0;
        fields.dailyDownloads = 0;
      }

      if (kind === 'download') {
        fields.totalDownloads = record.totalDownloads + 1;
        fields.dailyDownloads = dailyDownloads + 1;
      } else {
        fields.totalPlays = record.totalPlays + 1;
        fields.dailyPlays = dailyPlays + 1;
      }

      await this.store.write(this.accountId, fields);
    } catch (error) {
      logger.error('Quota: failed to record usage', {
        accountId: this.accountId,
        kind,
        error: errorMessage(error),
      });
    }
  }

  async canProceed(): Promise<boolean> {
    if (await this.isBanned()) return false;
    return (await this.remainingQuota()) > 0;
  }

  getSnapshot(): QuotaSnapshot {
    return {
      businessDay: this.businessDay ?? businessDayKey(this.clock()),
      dailyCountAtSessionStart: this.dailyCountAtSessionStart,
      downloadsThisSession: this.downloadsThisSession,
      lastKnownBanned: this.lastKnownBanned,
      limit: this.limit,
    };
  }

  /**
   * Start a new business day from the store's counter; a failed read seeds zero
   */
  private async seed(today: string): Promise<void> {
    let count = 0;
    try {
      const record = await this.store.read(this.accountId);
      count = record ? dailyCount(record, 'download', this.clock()) : 0;
    } catch (error) {
      logger.warn('Quota: could not read daily usage, assuming none', {
        accountId: this.accountId,
        error: errorMessage(error),
      });
    }

    this.businessDay = today;
    this.dailyCountAtSessionStart = count;
    this.downloadsThisSession = 0;
    logger.debug('Quota: new business day', { accountId: this.accountId, today, count });
  }
}
