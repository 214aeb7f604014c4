import { getLogger, resolveCollectorConfig, setLogLevel } from '@diskpulse/shared';
import type { CollectorConfig, DiskStatsRefreshEvent } from '@diskpulse/shared';
import { EventBus } from '../events/EventBus.js';
import { DiskStatsEngine } from '../diskstats/DiskStatsEngine.js';
import { DiskStatsCollector } from '../metrics/DiskStatsCollector.js';
import { getMetricRegistry } from '../metrics/MetricRegistry.js';
import type { InMemoryMetricRegistry } from '../metrics/MetricRegistry.js';

export interface DiskPulseDaemonOptions {
  registry?: InMemoryMetricRegistry;
  eventBus?: EventBus;
  handleSignals?: boolean;
  /** Keep the process alive on the collector's timer while running. */
  keepAlive?: boolean;
}

export class DiskPulseDaemon {
  readonly config: CollectorConfig;
  readonly registry: InMemoryMetricRegistry;
  readonly eventBus: EventBus;
  readonly engine: DiskStatsEngine;
  readonly collector: DiskStatsCollector;
  private handleSignals: boolean;
  private running: boolean = false;
  private shutdown = (): void => {
    this.stop();
  };
  private logRefresh = (event: DiskStatsRefreshEvent): void => {
    getLogger().debug(
      { devices: event.devices.length, failures: event.failures, metrics: this.registry.getMetrics().size },
      'Disk stats refreshed',
    );
  };

  constructor(config: unknown = {}, options: DiskPulseDaemonOptions = {}) {
    this.config = resolveCollectorConfig(config);
    setLogLevel(this.config.logging.level);

    this.registry = options.registry ?? getMetricRegistry();
    this.eventBus = options.eventBus ?? new EventBus();
    this.handleSignals = options.handleSignals ?? true;
    this.engine = new DiskStatsEngine({ registry: this.registry, prefix: this.config.prefix });
    this.collector = new DiskStatsCollector(this.engine, this.eventBus, {
      source: this.config.source,
      interval: this.config.interval,
      keepAlive: options.keepAlive ?? false,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;

    const logger = getLogger();
    logger.info({ source: this.config.source, prefix: this.config.prefix }, 'diskpulse starting...');

    this.eventBus.on('diskstats:refresh', this.logRefresh);
    if (this.handleSignals) {
      process.on('SIGINT', this.shutdown);
      process.on('SIGTERM', this.shutdown);
    }

    this.collector.start();
    this.running = true;
    logger.info({ pid: process.pid }, 'diskpulse started');
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    this.collector.stop();

    if (this.handleSignals) {
      process.off('SIGINT', this.shutdown);
      process.off('SIGTERM', this.shutdown);
    }

    this.eventBus.emit('system:shutdown', undefined);
    this.eventBus.off('diskstats:refresh', this.logRefresh);
    getLogger().info('diskpulse stopped');
  }
}
