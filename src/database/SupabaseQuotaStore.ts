import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { QuotaFields, QuotaRecord } from '../types';
import { logger } from '../utils/logger';
import { QuotaStore } from './QuotaStore';
import { mapFieldsToRow, mapRowToRecord, QuotaRowSchema } from './quotaRow';

const TABLE = 'quota_records';

export class SupabaseQuotaStore implements QuotaStore {
  readonly name = 'supabase';
  private supabase: SupabaseClient;

  constructor(supabaseUrl: string, supabaseKey: string) {
    this.supabase = createClient(supabaseUrl, supabaseKey, {
      auth: { persistSession: false },
    });
    logger.info('🔌 Connected to Supabase');
  }

  async read(accountId: string): Promise<QuotaRecord | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .eq('account_id', accountId)
      .maybeSingle();

    if (error) {
      throw new Error(`Supabase: Failed to read quota record: ${error.message}`);
    }
    if (!data) return null;

    const parsed = QuotaRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Supabase: Malformed quota record for ${accountId}`);
    }
    return mapRowToRecord(parsed.data);
  }

  async write(accountId: string, fields: QuotaFields): Promise<void> {
    const { error } = await this.supabase
      .from(TABLE)
      .upsert({ account_id: accountId, ...mapFieldsToRow(fields) }, { onConflict: 'account_id' });

    if (error) {
      throw new Error(`Supabase: Failed to write quota record: ${error.message}`);
    }
  }
}
