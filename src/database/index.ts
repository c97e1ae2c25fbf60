export type { QuotaStore } from './QuotaStore';
export { MemoryQuotaStore } from './MemoryQuotaStore';
export { RestQuotaStore } from './RestQuotaStore';
export { SupabaseQuotaStore } from './SupabaseQuotaStore';
export { createQuotaStore } from './createQuotaStore';
