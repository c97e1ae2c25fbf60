export type QuotaBackend = 'supabase' | 'rest' | 'memory';

export interface QuotaConfig {
  backend: QuotaBackend;
  accountId: string;
  dailyLimit: number;
  supabaseUrl?: string;
  supabaseKey?: string;
  restUrl?: string;
}

export interface AppConfig {
  downloadRoot: string;
  binDirectory: string;
  bundledBinariesDir: string;
  audioFormat: 'mp3' | 'm4a' | 'opus';
  filenamePattern: string;
  downloadTimeout: number;
  searchTimeout: number;
  metadataTimeout: number;
  quota: QuotaConfig;
  sentryDsn?: string;
}
