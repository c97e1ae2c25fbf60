import type { AppConfig } from './config';
import type { FileManager } from '../utils/FileManager';
import type { QuotaStore } from '../database/QuotaStore';
import type { QuotaGate } from '../quota/QuotaGate';
import type { MediaFetchEngine } from '../download/core/MediaFetchEngine';
import type { DownloadOrchestrator } from '../download/core/DownloadOrchestrator';
import type { MetadataProvider } from '../metadata/MetadataProvider';
import type { TaggingSink } from '../tagging/TaggingSink';

export interface AppContext {
  config: AppConfig;
  fileManager: FileManager;
  quotaStore: QuotaStore;
  quotaGate: QuotaGate;
  engine: MediaFetchEngine;
  metadata: MetadataProvider;
  tagger: TaggingSink;
  orchestrator: DownloadOrchestrator;
}
