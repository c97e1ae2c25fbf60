#!/usr/bin/env node
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { logger, logError } from './utils/logger';
import { FileManager } from './utils/FileManager';
import { loadJobFile } from './utils/jobFile';
import { createQuotaStore } from './database';
import { QuotaGate } from './quota';
import {
  BinaryManager,
  DownloadOrchestrator,
  FileSanitizer,
  InnertubeProvider,
  JobStatus,
  MediaFetchEngine,
  YtDlpProvider,
} from './download';
import { MusicBrainzProvider } from './metadata';
import { Id3TaggingSink } from './tagging';
import { formatDuration } from './utils/logicHelpers';
import { AppConfig, AppContext } from './types';

function initializeSentry(dsn?: string): void {
  if (!dsn) return;
  Sentry.init({
    dsn,
    tracesSampleRate: 1.0,
  });
}

function initializeComponents(config: AppConfig): AppContext {
  const fileManager = new FileManager(config.downloadRoot);
  const sanitizer = new FileSanitizer();

  const quotaStore = createQuotaStore(config.quota);
  const quotaGate = new QuotaGate(quotaStore, config.quota.accountId, {
    dailyLimit: config.quota.dailyLimit,
  });

  // Order matters - the helper process is preferred when its binary is installed
  const binaries = new BinaryManager(config.binDirectory, config.bundledBinariesDir);
  const engine = new MediaFetchEngine(
    [
      new YtDlpProvider(binaries, { timeout: config.downloadTimeout }),
      new InnertubeProvider({ timeout: config.downloadTimeout }),
    ],
    fileManager,
    {
      searchTimeoutMs: config.searchTimeout,
      defaultAudioFormat: config.audioFormat,
      sanitizer,
    },
  );

  const metadata = new MusicBrainzProvider({ timeoutMs: config.metadataTimeout });
  const tagger = new Id3TaggingSink(sanitizer);

  const orchestrator = new DownloadOrchestrator({
    quotaGate,
    engine,
    metadata,
    tagger,
    fileManager,
    filenamePattern: config.filenamePattern,
    audioFormat: config.audioFormat,
  });

  return { config, fileManager, quotaStore, quotaGate, engine, metadata, tagger, orchestrator };
}

async function main(): Promise<void> {
  const jobPath = process.argv[2];
  if (!jobPath) {
    logger.error('Usage: trackfetch <job.json>');
    process.exitCode = 2;
    return;
  }

  try {
    const config = loadConfig();
    initializeSentry(config.sentryDsn);
    logger.info('✅ Configuration loaded', {
      downloadRoot: config.downloadRoot,
      audioFormat: config.audioFormat,
      quotaBackend: config.quota.backend,
      dailyLimit: config.quota.dailyLimit,
    });

    const app = initializeComponents(config);
    const job = await loadJobFile(jobPath);
    const totalSeconds = job.tracks.reduce((sum, track) => sum + track.durationSeconds, 0);
    logger.info('📋 Job loaded', {
      folderName: job.folderName,
      tracks: job.tracks.length,
      duration: formatDuration(totalSeconds),
    });

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('🛑 Interrupted, stopping after the current step');
      controller.abort();
    });

    const summary = await app.orchestrator.run(job, {
      signal: controller.signal,
      onEvent: (event) => {
        if (event.type === 'progress') {
          logger.info(`[${event.status}] ${event.detail}`, {
            completed: event.completed,
            total: event.total,
            percent: Math.round(event.fraction * 100),
            remainingQuota: event.remainingQuota,
          });
        }
      },
    });

    if (!summary || summary.status !== JobStatus.COMPLETED) {
      process.exitCode = 1;
    }
  } catch (error: unknown) {
    logError(error, { jobPath });
    process.exitCode = 1;
  } finally {
    await Sentry.flush(2000);
  }
}

main().catch((error: unknown) => {
  logError(error);
  process.exitCode = 1;
});
