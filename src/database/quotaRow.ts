import { z } from 'zod';
import { QuotaFields, QuotaRecord } from '../types';

/**
 * Column layout shared by the Supabase table and the REST collection
 */
export const QuotaRowSchema = z.object({
  account_id: z.string(),
  total_plays: z.number().nullish(),
  total_downloads: z.number().nullish(),
  daily_plays: z.number().nullish(),
  daily_downloads: z.number().nullish(),
  last_reset_at: z.string().nullish(),
  is_banned: z.boolean().nullish(),
});

export type QuotaRow = z.infer<typeof QuotaRowSchema>;

const COLUMNS = [
  ['totalPlays', 'total_plays'],
  ['totalDownloads', 'total_downloads'],
  ['dailyPlays', 'daily_plays'],
  ['dailyDownloads', 'daily_downloads'],
  ['lastResetAt', 'last_reset_at'],
  ['isBanned', 'is_banned'],
] as const;

export function mapRowToRecord(row: QuotaRow): QuotaRecord {
  return {
    accountId: row.account_id,
    totalPlays: row.total_plays ?? 0,
    totalDownloads: row.total_downloads ?? 0,
    dailyPlays: row.daily_plays ?? 0,
    dailyDownloads: row.daily_downloads ?? 0,
    lastResetAt: row.last_reset_at ?? new Date(0).toISOString(),
    isBanned: row.is_banned ?? false,
  };
}

/**
 * Only the fields present in `fields` become columns
 */
export function mapFieldsToRow(fields: QuotaFields): Record<string, string | number | boolean> {
  const row: Record<string, string | number | boolean> = {};
  for (const [field, column] of COLUMNS) {
    const value = fields[field];
    if (value !== undefined) {
      row[column] = value;
    }
  }
  return row;
}
