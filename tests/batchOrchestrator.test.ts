import * as fc from 'fast-check';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  BatchOrchestrator,
  STATUS_CANCELLED,
  STATUS_COMPLETE,
} from '../src/download/core/BatchOrchestrator';
import { UrlResolver } from '../src/download/core/UrlResolver';
import { BatchPreconditionError, createFailure } from '../src/download/core/failures';
import { DEFAULT_SETTINGS } from '../src/utils/config';
import {
  BatchEvents,
  BatchPhase,
  BatchSummary,
  ExecutionOutcome,
  FailureReason,
  FailureRecord,
  MuxTool,
  ProgressReporter,
  ResolutionResult,
} from '../src/download/core/types';

type Execute = (url: string, reporter: ProgressReporter, isCancelled: () => boolean) => Promise<ExecutionOutcome>;

class FakeMux implements MuxTool {
  readonly name = 'fake-mux';

  constructor(private readonly available = true) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async run(): Promise<void> {
    return undefined;
  }
}

function downloaded(url: string): ExecutionOutcome {
  return {
    kind: 'downloaded',
    filePath: `/media/${url}.mp4`,
    item: { sourceUrl: url, title: url, description: '' },
  };
}

interface Recorded {
  phases: BatchPhase[];
  statuses: string[];
  overall: number[];
  itemProgress: number[];
  failures: FailureRecord[][];
  completed: BatchSummary[];
  order: string[];
}

function record(orchestrator: BatchOrchestrator): Recorded {
  const recorded: Recorded = {
    phases: [],
    statuses: [],
    overall: [],
    itemProgress: [],
    failures: [],
    completed: [],
    order: [],
  };
  orchestrator.on(BatchEvents.PHASE, (phase: BatchPhase) => recorded.phases.push(phase));
  orchestrator.on(BatchEvents.STATUS, (text: string) => recorded.statuses.push(text));
  orchestrator.on(BatchEvents.OVERALL_PROGRESS, (percent: number) => recorded.overall.push(percent));
  orchestrator.on(BatchEvents.ITEM_PROGRESS, (percent: number) => recorded.itemProgress.push(percent));
  orchestrator.on(BatchEvents.FAILURES, (failures: FailureRecord[]) => {
    recorded.order.push('failures');
    recorded.failures.push(failures);
  });
  orchestrator.on(BatchEvents.COMPLETED, (summary: BatchSummary) => {
    recorded.order.push('completed');
    recorded.completed.push(summary);
  });
  return recorded;
}

describe('BatchOrchestrator', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bmd-batch-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function build(
    resolution: ResolutionResult,
    execute: Execute,
    options: { mux?: MuxTool; coolOffEvery?: number; coolOffMaxMs?: number; random?: () => number } = {},
  ): {
    orchestrator: BatchOrchestrator;
    resolve: jest.Mock<Promise<ResolutionResult>, Parameters<UrlResolver['resolve']>>;
  } {
    const resolve = jest.fn<Promise<ResolutionResult>, Parameters<UrlResolver['resolve']>>(
      async () => resolution,
    );
    const orchestrator = new BatchOrchestrator({
      resolver: { resolve },
      executor: {
        execute: (url, _destination, _settings, reporter, isCancelled) => execute(url, reporter, isCancelled),
      },
      mux: options.mux ?? new FakeMux(),
      coolOffEvery: options.coolOffEvery ?? 0,
      coolOffMaxMs: options.coolOffMaxMs,
      random: options.random,
    });
    return { orchestrator, resolve };
  }

  it('runs a single video through every phase', async () => {
    const { orchestrator } = build({ urls: ['v1'], failures: [] }, async (url, reporter) => {
      reporter.itemProgress(50);
      return downloaded(url);
    });
    const recorded = record(orchestrator);

    const summary = await orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS);

    expect(recorded.phases).toEqual([BatchPhase.RESOLVING, BatchPhase.DOWNLOADING, BatchPhase.COMPLETED]);
    expect(recorded.statuses).toEqual(['Resolving URLs...', 'Downloading 1 of 1', STATUS_COMPLETE]);
    expect(recorded.overall).toEqual([0, 100]);
    expect(recorded.itemProgress).toEqual([50, 0]);
    expect(recorded.failures).toEqual([[]]);
    expect(recorded.order).toEqual(['failures', 'completed']);
    expect(recorded.completed).toEqual([summary]);
    expect(summary).toEqual({
      totalCount: 1,
      completedCount: 1,
      downloaded: 1,
      skipped: 0,
      failures: [],
      cancelled: false,
    });
    expect(orchestrator.getPhase()).toBe(BatchPhase.COMPLETED);
    expect(orchestrator.isRunning()).toBe(false);
  });

  it('collects resolution and download failures in order', async () => {
    const resolutionFailure = createFailure('https://example.com/missing', FailureReason.NO_METADATA);
    const downloadFailure = createFailure('v2', FailureReason.DOWNLOAD_ERROR, 'HTTP Error 403: Forbidden');
    const { orchestrator } = build(
      { urls: ['v1', 'v2', 'v3'], failures: [resolutionFailure] },
      async (url) => {
        if (url === 'v2') {
          return { kind: 'failed', failure: downloadFailure };
        }
        if (url === 'v3') {
          return { kind: 'skipped', filePath: '/media/v3.mp4' };
        }
        return downloaded(url);
      },
    );
    const recorded = record(orchestrator);

    const summary = await orchestrator.start(['https://example.com/list'], dir, DEFAULT_SETTINGS);

    expect(recorded.overall).toEqual([0, 33, 66, 100]);
    expect(recorded.failures).toEqual([[resolutionFailure, downloadFailure]]);
    expect(summary).toMatchObject({ totalCount: 3, completedCount: 3, downloaded: 1, skipped: 1 });
    expect(summary.failures.map((failure) => failure.url)).toEqual(['https://example.com/missing', 'v2']);
  });

  it('stops before the next item once cancelled', async () => {
    const urls = Array.from({ length: 10 }, (_, i) => `v${i + 1}`);
    const started: string[] = [];
    const { orchestrator } = build({ urls, failures: [] }, async (url) => {
      started.push(url);
      if (url === 'v2') {
        orchestrator.stop();
      }
      return downloaded(url);
    });
    const recorded = record(orchestrator);

    const summary = await orchestrator.start(['https://example.com/list'], dir, DEFAULT_SETTINGS);

    expect(started).toEqual(['v1', 'v2']);
    expect(recorded.phases).toEqual([
      BatchPhase.RESOLVING,
      BatchPhase.DOWNLOADING,
      BatchPhase.CANCELLING,
      BatchPhase.COMPLETED,
    ]);
    expect(recorded.overall).toEqual([0, 10, 20]);
    expect(recorded.statuses[recorded.statuses.length - 1]).toBe(STATUS_CANCELLED);
    expect(recorded.completed).toHaveLength(1);
    expect(summary).toMatchObject({ totalCount: 10, completedCount: 2, downloaded: 2, cancelled: true, failures: [] });
  });

  it('records the interrupted item as cancelled', async () => {
    const { orchestrator } = build({ urls: ['v1', 'v2', 'v3'], failures: [] }, async (url, _reporter, isCancelled) => {
      if (url === 'v2') {
        orchestrator.stop();
        return isCancelled() ? { kind: 'cancelled' } : downloaded(url);
      }
      return downloaded(url);
    });

    const summary = await orchestrator.start(['https://example.com/list'], dir, DEFAULT_SETTINGS);

    expect(summary.completedCount).toBe(1);
    expect(summary.failures).toEqual([{ url: 'v2', reason: FailureReason.CANCELLED }]);
    expect(summary.cancelled).toBe(true);
  });

  it('fails only the item whose executor throws', async () => {
    const { orchestrator } = build({ urls: ['v1', 'v2'], failures: [] }, async (url) => {
      if (url === 'v1') {
        throw new Error('disk full');
      }
      return downloaded(url);
    });

    const summary = await orchestrator.start(['https://example.com/list'], dir, DEFAULT_SETTINGS);

    expect(summary.failures).toEqual([{ url: 'v1', reason: FailureReason.DOWNLOAD_ERROR, detail: 'disk full' }]);
    expect(summary.downloaded).toBe(1);
    expect(summary.completedCount).toBe(2);
  });

  it('ends straight away when the mux tool is missing', async () => {
    const { orchestrator, resolve } = build(
      { urls: ['v1'], failures: [] },
      async (url) => downloaded(url),
      { mux: new FakeMux(false) },
    );
    const recorded = record(orchestrator);

    const summary = await orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS);

    const message = 'fake-mux is not installed or not on PATH. Please install it to continue.';
    expect(recorded.statuses).toEqual([message]);
    expect(recorded.phases).toEqual([BatchPhase.COMPLETED]);
    expect(recorded.failures).toEqual([]);
    expect(recorded.completed).toHaveLength(1);
    expect(summary.fatalError).toBe(message);
    expect(resolve).not.toHaveBeenCalled();
  });

  it('ends straight away when the destination cannot be created', async () => {
    const blocker = path.join(dir, 'file');
    fs.writeFileSync(blocker, 'not a directory');
    const { orchestrator } = build({ urls: ['v1'], failures: [] }, async (url) => downloaded(url));

    const summary = await orchestrator.start(['https://youtu.be/v1'], path.join(blocker, 'out'), DEFAULT_SETTINGS);

    expect(summary.fatalError).toBe(`Cannot write to destination directory: ${path.join(blocker, 'out')}`);
    expect(summary.completedCount).toBe(0);
  });

  it('passes the cookie file from the settings to resolution', async () => {
    const { orchestrator, resolve } = build({ urls: [], failures: [] }, async (url) => downloaded(url));

    await orchestrator.start(['https://youtu.be/v1'], dir, { ...DEFAULT_SETTINGS, cookiesFile: 'cookies.txt' });

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve.mock.calls[0]?.[2]).toEqual({ cookiesFile: 'cookies.txt' });
  });

  it('skips resolution when stopped while preconditions are checked', async () => {
    const { orchestrator, resolve } = build({ urls: ['v1'], failures: [] }, async (url) => downloaded(url));
    const recorded = record(orchestrator);

    const pending = orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS);
    orchestrator.stop();
    const summary = await pending;

    expect(recorded.phases).toEqual([BatchPhase.CANCELLING, BatchPhase.COMPLETED]);
    expect(recorded.statuses).toEqual([STATUS_CANCELLED]);
    expect(recorded.failures).toEqual([[]]);
    expect(resolve).not.toHaveBeenCalled();
    expect(summary).toMatchObject({ totalCount: 0, completedCount: 0, cancelled: true });
  });

  it('rejects an empty URL list', async () => {
    const { orchestrator } = build({ urls: [], failures: [] }, async (url) => downloaded(url));

    await expect(orchestrator.start([], dir, DEFAULT_SETTINGS)).rejects.toThrow(BatchPreconditionError);
    await expect(orchestrator.start(['  '], dir, DEFAULT_SETTINGS)).rejects.toThrow('No URLs to download');
    expect(orchestrator.getPhase()).toBe(BatchPhase.IDLE);
  });

  it('refuses to start while a batch is running', async () => {
    const { orchestrator } = build({ urls: ['v1'], failures: [] }, async (url) => downloaded(url));

    const first = orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS);
    await expect(orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS)).rejects.toThrow(
      'A batch is already running',
    );
    await first;

    const again = await orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS);
    expect(again.completedCount).toBe(1);
  });

  it('completes with nothing to download when everything failed to resolve', async () => {
    const failure = createFailure('https://example.com/missing', FailureReason.NO_METADATA);
    const { orchestrator } = build({ urls: [], failures: [failure] }, async (url) => downloaded(url));
    const recorded = record(orchestrator);

    const summary = await orchestrator.start(['https://example.com/missing'], dir, DEFAULT_SETTINGS);

    expect(recorded.overall).toEqual([0]);
    expect(summary).toMatchObject({ totalCount: 0, completedCount: 0, failures: [failure] });
  });

  it('cuts the cool-off sleep short when stopped', async () => {
    const random = jest.fn(() => 1);
    const { orchestrator } = build(
      { urls: ['v1', 'v2'], failures: [] },
      async (url) => downloaded(url),
      { coolOffEvery: 1, coolOffMaxMs: 60000, random },
    );
    orchestrator.on(BatchEvents.OVERALL_PROGRESS, (percent: number) => {
      if (percent === 50) {
        setTimeout(() => orchestrator.stop(), 10);
      }
    });

    const summary = await orchestrator.start(['https://example.com/list'], dir, DEFAULT_SETTINGS);

    expect(random).toHaveBeenCalledTimes(1);
    expect(summary.completedCount).toBe(1);
    expect(summary.cancelled).toBe(true);
  });

  it('hands out snapshots that do not change the batch', async () => {
    const { orchestrator } = build({ urls: ['v1'], failures: [] }, async (url) => downloaded(url));
    await orchestrator.start(['https://youtu.be/v1'], dir, DEFAULT_SETTINGS);

    const snapshot = orchestrator.getState();
    snapshot.failures.push(createFailure('x', FailureReason.CANCELLED));

    expect(orchestrator.getState().failures).toEqual([]);
    expect(snapshot.queue[0]?.title).toBe('v1');
  });

  it('counts every item exactly once', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.constantFrom('downloaded', 'skipped', 'failed'), { minLength: 1, maxLength: 15 }),
        async (kinds) => {
          const urls = kinds.map((_, i) => `v${i}`);
          const { orchestrator } = build({ urls, failures: [] }, async (url) => {
            const kind = kinds[urls.indexOf(url)];
            if (kind === 'skipped') {
              return { kind: 'skipped', filePath: `/media/${url}.mp4` };
            }
            if (kind === 'failed') {
              return { kind: 'failed', failure: createFailure(url, FailureReason.DOWNLOAD_ERROR, 'boom') };
            }
            return downloaded(url);
          });
          const recorded = record(orchestrator);

          const summary = await orchestrator.start(['https://example.com/list'], dir, DEFAULT_SETTINGS);

          expect(summary.completedCount).toBe(kinds.length);
          expect(summary.downloaded + summary.skipped + summary.failures.length).toBe(kinds.length);
          expect(recorded.overall[recorded.overall.length - 1]).toBe(100);
          expect(recorded.overall.filter((percent) => percent === 100)).toHaveLength(1);
          for (let i = 1; i < recorded.overall.length; i++) {
            expect(recorded.overall[i]).toBeGreaterThanOrEqual(recorded.overall[i - 1] ?? 0);
          }
          expect(recorded.completed).toHaveLength(1);
        },
      ),
      { numRuns: 30 },
    );
  });
});
