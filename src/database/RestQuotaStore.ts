import { z } from 'zod';
import { QuotaFields, QuotaRecord } from '../types';
import { withTimeout } from '../utils/asyncHelpers';
import { QuotaStore } from './QuotaStore';
import { mapFieldsToRow, mapRowToRecord, QuotaRowSchema } from './quotaRow';

const COLLECTION = 'quota_records';
const REQUEST_TIMEOUT_MS = 10000;

const ListResponseSchema = z.object({
  items: z.array(QuotaRowSchema.extend({ id: z.string() })),
});

/**
 * Quota store backed by a PocketBase-style REST collection
 */
export class RestQuotaStore implements QuotaStore {
  readonly name = 'rest';
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async read(accountId: string): Promise<QuotaRecord | null> {
    const row = await this.findRow(accountId);
    return row ? mapRowToRecord(row) : null;
  }

  async write(accountId: string, fields: QuotaFields): Promise<void> {
    const existing = await this.findRow(accountId);
    const body = JSON.stringify({ account_id: accountId, ...mapFieldsToRow(fields) });

    if (existing) {
      await this.request(`${this.recordsUrl()}/${encodeURIComponent(existing.id)}`, {
        method: 'PATCH',
        body,
      });
    } else {
      await this.request(this.recordsUrl(), { method: 'POST', body });
    }
  }

  private recordsUrl(): string {
    return `${this.baseUrl}/api/collections/${COLLECTION}/records`;
  }

  private async findRow(accountId: string): Promise<z.infer<typeof ListResponseSchema>['items'][number] | null> {
    const filter = `account_id="${accountId.replace(/"/g, '\\"')}"`;
    const url = `${this.recordsUrl()}?perPage=1&filter=${encodeURIComponent(filter)}`;

    const parsed = ListResponseSchema.safeParse(await this.request(url, { method: 'GET' }));
    if (!parsed.success) {
      throw new Error(`Quota service returned an unexpected payload for ${accountId}`);
    }
    return parsed.data.items[0] ?? null;
  }

  private async request(url: string, init: { method: string; body?: string }): Promise<unknown> {
    const response = await withTimeout(
      (signal) => fetch(url, {
        ...init,
        headers: { 'Content-Type': 'application/json' },
        signal,
      }),
      REQUEST_TIMEOUT_MS,
      'quota request',
    );

    if (!response.ok) {
      throw new Error(`Quota service HTTP ${response.status}: ${response.statusText}`);
    }
    return response.json();
  }
}
