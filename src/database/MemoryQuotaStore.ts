import { QuotaFields, QuotaRecord } from '../types';
import { QuotaStore } from './QuotaStore';

/**
 * In-process store for offline runs and tests
 */
export class MemoryQuotaStore implements QuotaStore {
  readonly name = 'memory';
  private records = new Map<string, QuotaRecord>();

  constructor(seed: QuotaRecord[] = []) {
    for (const record of seed) {
      this.records.set(record.accountId, { ...record });
    }
  }

  async read(accountId: string): Promise<QuotaRecord | null> {
    const record = this.records.get(accountId);
    return record ? { ...record } : null;
  }

  async write(accountId: string, fields: QuotaFields): Promise<void> {
    const existing = this.records.get(accountId) ?? {
      accountId,
      totalPlays: 0,
      totalDownloads: 0,
      dailyPlays: 0,
      dailyDownloads: 0,
      lastResetAt: new Date(0).toISOString(),
      isBanned: false,
    };
    this.records.set(accountId, { ...existing, ...fields, accountId });
  }
}
