import { QuotaFields, QuotaRecord } from '../types';

/**
 * Persistence for per-account usage counters and the ban flag.
 * Implementations throw on transport errors; QuotaGate decides how to degrade.
 */
export interface QuotaStore {
  readonly name: string;

  /**
   * The account's record, or null when none exists yet
   */
  read(accountId: string): Promise<QuotaRecord | null>;

  /**
   * Merge `fields` into the account's record, creating it if needed
   */
  write(accountId: string, fields: QuotaFields): Promise<void>;
}
