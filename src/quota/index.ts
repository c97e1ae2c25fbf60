export { QuotaGate, DEFAULT_DAILY_LIMIT } from './QuotaGate';
export type { QuotaGateOptions } from './QuotaGate';
export { businessDayKey, BUSINESS_DAY_OFFSET_HOURS } from './businessDay';
