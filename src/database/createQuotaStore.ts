import { QuotaConfig } from '../types';
import { logger } from '../utils/logger';
import { QuotaStore } from './QuotaStore';
import { MemoryQuotaStore } from './MemoryQuotaStore';
import { RestQuotaStore } from './RestQuotaStore';
import { SupabaseQuotaStore } from './SupabaseQuotaStore';

/**
 * The one place that knows which backend is configured
 */
export function createQuotaStore(config: QuotaConfig): QuotaStore {
  switch (config.backend) {
    case 'supabase':
      if (!config.supabaseUrl || !config.supabaseKey) {
        throw new Error('❌ Missing Supabase credentials in .env');
      }
      return new SupabaseQuotaStore(config.supabaseUrl, config.supabaseKey);
    case 'rest':
      if (!config.restUrl) {
        throw new Error('❌ Missing QUOTA_REST_URL in .env');
      }
      return new RestQuotaStore(config.restUrl);
    case 'memory':
      logger.warn('Using in-memory quota store; counters reset when the process exits');
      return new MemoryQuotaStore();
  }
}
