import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import {
  AggregatedIngestionError,
  DEFAULT_DISKSTATS_SOURCE,
  DEFAULT_REFRESH_INTERVAL,
  SourceUnavailableError,
  getLogger,
} from '@diskpulse/shared';
import type { IngestionSummary } from '@diskpulse/shared';
import type { EventBus } from '../events/EventBus.js';
import type { DiskStatsEngine } from '../diskstats/DiskStatsEngine.js';

const logger = getLogger('diskstats-collector');

export interface DiskStatsCollectorOptions {
  source?: string;
  interval?: number;
  platform?: NodeJS.Platform;
  clock?: () => number;
  /** Let the refresh timer hold the process open. Off by default: the timer is unref'd. */
  keepAlive?: boolean;
}

/**
 * Reads the diskstats source on a fixed interval and feeds it to the engine.
 * Refreshes never overlap: each one starts after the previous has settled.
 */
export class DiskStatsCollector {
  private engine: DiskStatsEngine;
  private eventBus: EventBus;
  private source: string;
  private interval: number;
  private platform: NodeJS.Platform;
  private clock: () => number;
  private keepAlive: boolean;
  private timer: NodeJS.Timeout | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private latest: IngestionSummary | null = null;

  constructor(engine: DiskStatsEngine, eventBus: EventBus, options: DiskStatsCollectorOptions = {}) {
    this.engine = engine;
    this.eventBus = eventBus;
    this.source = options.source ?? DEFAULT_DISKSTATS_SOURCE;
    this.interval = options.interval ?? DEFAULT_REFRESH_INTERVAL;
    this.platform = options.platform ?? process.platform;
    this.clock = options.clock ?? Date.now;
    this.keepAlive = options.keepAlive ?? false;
  }

  isSupported(): boolean {
    return this.platform === 'linux' && existsSync(this.source);
  }

  start(): boolean {
    if (this.timer) return true;

    if (!this.isSupported()) {
      logger.info(
        { platform: this.platform, source: this.source },
        'Disk stats unavailable on this host, collector not started',
      );
      return false;
    }

    this.tick();
    this.timer = setInterval(() => this.tick(), this.interval);
    if (!this.keepAlive) {
      this.timer.unref();
    }
    logger.info({ interval: this.interval, source: this.source }, 'Disk stats collector started');
    return true;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  getLatest(): IngestionSummary | null {
    return this.latest;
  }

  /**
   * Read and ingest the source once, after any refresh already in progress.
   * Rejects with SourceUnavailableError when the source cannot be read; malformed lines
   * are logged and reported through the resolved summary.
   */
  refresh(): Promise<IngestionSummary> {
    const run = this.queue.then(() => this.collect());
    // Keep the chain alive; the caller observes failures through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private tick(): void {
    this.refresh().catch((err: unknown) => {
      logger.warn({ err, source: this.source }, 'Error gathering linux disk metrics');
    });
  }

  private async collect(): Promise<IngestionSummary> {
    const lines = await this.readLines();
    const now = this.clock();

    let summary: IngestionSummary;
    try {
      summary = this.engine.ingestSnapshot(lines, now);
    } catch (err) {
      if (!(err instanceof AggregatedIngestionError)) throw err;
      summary = err.summary;
      for (const failure of err.failures) {
        logger.warn(
          { lineNumber: failure.lineNumber, line: failure.line, source: this.source },
          `Skipped malformed diskstats line: ${failure.reason}`,
        );
      }
      this.eventBus.emit('diskstats:malformed', {
        timestamp: new Date(now),
        failures: err.failures.map(({ lineNumber, reason }) => ({ lineNumber, reason })),
      });
    }

    this.latest = summary;
    this.eventBus.emit('diskstats:refresh', {
      timestamp: new Date(now),
      devices: summary.devices,
      failures: summary.failures.length,
    });
    return summary;
  }

  private async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.source, 'utf8');
    } catch (err) {
      const error = new SourceUnavailableError(this.source, err);
      this.eventBus.emit('diskstats:error', {
        timestamp: new Date(this.clock()),
        source: this.source,
        message: error.message,
      });
      throw error;
    }
    return content.split('\n');
  }
}
