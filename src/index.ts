#!/usr/bin/env node
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig, loadSettings } from './utils/config';
import { logger, logOperation } from './utils/logger';
import { FileManager } from './utils/FileManager';
import { CliOptions, parseCliArgs, USAGE } from './cli/args';
import {
  BatchEvents,
  BatchOrchestrator,
  BatchSummary,
  DownloadExecutor,
  DownloadLedger,
  FfmpegRunner,
  PostProcessor,
  UrlResolver,
  YtDlpEngine,
  describeFailure,
} from './download';

function initializeSentry(): void {
  if (!process.env.SENTRY_DSN) {
    return;
  }
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: 1.0,
  });
}

function registerEventLogging(orchestrator: BatchOrchestrator): void {
  let lastLoggedPercent = -1;

  orchestrator.on(BatchEvents.STATUS, (text: string) => logger.info(text));
  orchestrator.on(BatchEvents.CURRENT_ITEM, (title: string) => {
    lastLoggedPercent = -1;
    logger.info(`🎬 ${title}`);
  });
  orchestrator.on(BatchEvents.ITEM_PROGRESS, (percent: number) => {
    // Only every 10%, the hook fires for every chunk
    if (percent % 10 === 0 && percent !== lastLoggedPercent) {
      lastLoggedPercent = percent;
      logger.debug('Item progress', { percent });
    }
  });
  orchestrator.on(BatchEvents.OVERALL_PROGRESS, (percent: number) =>
    logger.info('📊 Overall progress', { percent }),
  );
  orchestrator.on(BatchEvents.FAILURES, (failures: BatchSummary['failures']) => {
    for (const failure of failures) {
      logger.warn('❌ Failed', { url: failure.url, reason: describeFailure(failure) });
    }
  });
}

async function main(): Promise<number> {
  initializeSentry();

  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    logger.error((error as Error).message);
    logger.info(USAGE);
    return 2;
  }

  const config = loadConfig();
  const settings = loadSettings(options.settingsFile ?? config.settingsFile);
  logOperation('✅ Configuration loaded', {
    ytDlp: config.engine.ytDlpPath,
    ffmpeg: config.ffmpegPath,
    ledger: config.ledgerFile,
    outputFormat: settings.outputFormat,
  });

  const fileManager = new FileManager();
  const engine = new YtDlpEngine(config.engine);
  const mux = new FfmpegRunner(config.ffmpegPath);
  const ledger = new DownloadLedger(config.ledgerFile);

  const orchestrator = new BatchOrchestrator({
    resolver: new UrlResolver(engine, {
      cookiesFile: config.cookiesFile,
      retries: config.resolveRetries,
      watchUrlTemplate: config.watchUrlTemplate,
    }),
    executor: new DownloadExecutor({
      engine,
      postProcessor: new PostProcessor(mux, fileManager),
      ledger,
      fileManager,
      thumbnailTimeout: config.thumbnailTimeout,
      cookiesFile: config.cookiesFile,
    }),
    mux,
    fileManager,
    coolOffEvery: config.coolOffEvery,
    coolOffMaxMs: config.coolOffMaxMs,
  });
  registerEventLogging(orchestrator);

  let interrupts = 0;
  process.on('SIGINT', () => {
    interrupts++;
    if (interrupts === 1) {
      logger.info('Received SIGINT, stopping batch...');
      orchestrator.stop();
      return;
    }
    logger.warn('Second SIGINT, killing downloads');
    engine.killAll();
    process.exit(130);
  });

  const summary = await orchestrator.start(options.urls, options.outputDir, settings);

  logOperation('🏁 Done', {
    downloaded: summary.downloaded,
    skipped: summary.skipped,
    failed: summary.failures.length,
  });
  return summary.fatalError || summary.failures.length > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error', {
      error: (error as Error).message,
      stack: (error as Error).stack,
    });
    Sentry.captureException(error);
    process.exitCode = 1;
  });
