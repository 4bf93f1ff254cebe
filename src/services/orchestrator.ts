import type { Writable } from 'node:stream';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type { EnvConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { Image } from '../models/image.js';
import { parseHostEndpoints, type HostEndpoint } from '../models/host.js';
import { CronSchedule } from '../scheduler/cron.js';
import { ScanScheduler } from '../scheduler/scheduler.js';
import {
  DockerHostClient,
  dockerClientOptionsFromConfig,
  type ContainerSource,
} from './docker-client.js';
import { collectInventory, type HostFailure } from './inventory.js';
import {
  ensureReportDir,
  scanImage,
  scannerOptionsFromConfig,
  type ScanOutcome,
} from './scan-runner.js';
import {
  sendNotification,
  senderOptionsFromConfig,
  type NotificationResult,
  type NotifyConfig,
} from './notifier.js';

const log = createChildLogger('orchestrator');

export type RunStatus = 'completed' | 'partial' | 'inventory_unavailable';

export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  hostsQueried: number;
  hostFailures: HostFailure[];
  containersSeen: number;
  /** Containers whose image was already in the inventory */
  duplicates: number;
  imagesFound: number;
  clean: number;
  vulnerable: number;
  failedScans: number;
  notificationsSent: number;
  notificationsFailed: number;
  vulnerableImages: Image[];
}

export interface ScanCycleDeps {
  sources: readonly ContainerSource[];
  scan: (image: Image, signal: AbortSignal) => Promise<ScanOutcome>;
  notify: (image: Image, signal: AbortSignal) => Promise<NotificationResult>;
  /** Called once before the first scan of the run */
  prepare?: () => Promise<void>;
  hostConcurrency?: number;
  scanConcurrency?: number;
  signal?: AbortSignal;
}

function runStatus(hostsQueried: number, hostFailures: number): RunStatus {
  if (hostFailures === 0) return 'completed';
  return hostFailures >= hostsQueried ? 'inventory_unavailable' : 'partial';
}

/**
 * One complete run: inventory across all hosts, then every unique image
 * scanned, then a notification per vulnerable image. Each stage settles
 * before the next begins; one failing host, scan or notification never stops
 * the others.
 */
export async function runScanCycle(deps: ScanCycleDeps): Promise<RunSummary> {
  const runId = uuidv4();
  const startedAt = new Date();
  const signal = deps.signal ?? new AbortController().signal;
  const runLog = log.child({ runId });
  runLog.info({ hosts: deps.sources.length }, 'Running image scan');

  const { inventory, hostsQueried, hostFailures, containersSeen, duplicates } = await collectInventory(deps.sources, {
    concurrency: deps.hostConcurrency,
    signal,
  });
  const status = runStatus(hostsQueried, hostFailures.length);

  const images = inventory.values();
  if (images.length > 0 && deps.prepare) {
    await deps.prepare();
  }

  const scanLimit = pLimit(deps.scanConcurrency ?? 1);
  const scanResults = await Promise.allSettled(
    images.map((image) =>
      scanLimit(async () => {
        if (signal.aborted) {
          return { image, status: 'failed', reportPath: '', exitCode: null, durationMs: 0, error: 'run aborted' } satisfies ScanOutcome;
        }
        return deps.scan(image, signal);
      }),
    ),
  );

  let clean = 0;
  let failedScans = 0;
  const vulnerableImages: Image[] = [];
  scanResults.forEach((result, i) => {
    if (result.status === 'rejected') {
      failedScans++;
      runLog.error({ image: images[i].displayName, digest: images[i].contentDigest, err: result.reason }, 'Scan threw');
      return;
    }
    switch (result.value.status) {
      case 'clean':
        clean++;
        break;
      case 'vulnerable':
        vulnerableImages.push(result.value.image);
        break;
      case 'failed':
        failedScans++;
        break;
    }
  });

  if (status === 'inventory_unavailable') {
    runLog.error({ failedHosts: hostFailures.map((f) => f.host) }, 'Inventory unavailable: every host failed');
  } else if (vulnerableImages.length === 0) {
    runLog.info({ scanned: images.length, failedScans }, 'No vulnerabilities found');
  }

  let notificationsSent = 0;
  let notificationsFailed = 0;
  for (const image of vulnerableImages) {
    runLog.warn({ image: image.displayName, digest: image.contentDigest }, `Found vulnerabilities in ${image.displayName}`);
    if (signal.aborted) {
      notificationsFailed++;
      continue;
    }
    try {
      const result = await deps.notify(image, signal);
      if (result.status === 'sent') notificationsSent++;
      else notificationsFailed++;
    } catch (err) {
      notificationsFailed++;
      runLog.error({ image: image.displayName, digest: image.contentDigest, err }, 'Notification threw');
    }
  }

  const finishedAt = new Date();
  const summary: RunSummary = {
    runId,
    status,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    hostsQueried,
    hostFailures,
    containersSeen,
    duplicates,
    imagesFound: images.length,
    clean,
    vulnerable: vulnerableImages.length,
    failedScans,
    notificationsSent,
    notificationsFailed,
    vulnerableImages,
  };

  runLog.info(
    {
      status,
      durationMs: summary.durationMs,
      hosts: hostsQueried,
      failedHosts: hostFailures.length,
      containers: containersSeen,
      duplicates,
      images: summary.imagesFound,
      clean,
      vulnerable: summary.vulnerable,
      failedScans,
      notificationsSent,
      notificationsFailed,
    },
    'Run summary',
  );
  return summary;
}

export interface OrchestratorOptions {
  config: EnvConfig;
  /** Where scanner output is streamed; defaults to process.stdout */
  stdout?: Writable;
  /** Environment the scanner-prefixed variables are read from */
  env?: NodeJS.ProcessEnv;
  createSource?: (host: HostEndpoint) => ContainerSource & { close(): Promise<void> };
  now?: () => Date;
}

/**
 * Owns the hosts, the schedule and the scheduler for one process.
 * start() validates everything up front and throws on bad input, so the
 * caller can terminate before the loop begins.
 */
export class Orchestrator {
  private scheduler: ScanScheduler | null = null;
  private sources: Array<ContainerSource & { close(): Promise<void> }> = [];
  private notifyConfig: NotifyConfig | null = null;

  constructor(private readonly options: OrchestratorOptions) {}

  /** Returns the first scheduled run time. */
  start(scheduleExpr: string, hosts: readonly string[], notify: NotifyConfig): Date {
    if (this.scheduler) {
      throw new Error('Orchestrator already started');
    }
    const schedule = CronSchedule.parse(scheduleExpr);
    const endpoints = parseHostEndpoints(hosts);

    const scheduler = new ScanScheduler(schedule, (signal) => this.runCycle(signal), {
      tickMs: this.options.config.SCHEDULER_TICK_MS,
      now: this.options.now,
    });
    const firstRun = scheduler.start();
    if (!firstRun) {
      throw new Error(`Schedule "${scheduleExpr}" never fires`);
    }
    this.configure(endpoints, notify);
    this.scheduler = scheduler;
    log.info({ hosts: this.sources.map((s) => s.label), firstRunAt: firstRun.toISOString() }, 'Orchestrator started');
    return firstRun;
  }

  /** A single run outside of any schedule. */
  async runOnce(hosts: readonly string[], notify: NotifyConfig, signal?: AbortSignal): Promise<RunSummary> {
    this.configure(parseHostEndpoints(hosts), notify);
    return this.runCycle(signal ?? new AbortController().signal);
  }

  async stop(): Promise<void> {
    if (this.scheduler) {
      await this.scheduler.stop();
      this.scheduler = null;
    }
    const sources = this.sources;
    this.sources = [];
    const results = await Promise.allSettled(sources.map((s) => s.close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        log.warn({ host: sources[i].label, err: r.reason }, 'Failed to close host client');
      }
    });
  }

  get nextRunAt(): Date | null {
    return this.scheduler?.nextRunAt ?? null;
  }

  private configure(endpoints: readonly HostEndpoint[], notify: NotifyConfig): void {
    const createSource = this.options.createSource
      ?? ((host: HostEndpoint) => new DockerHostClient(host, dockerClientOptionsFromConfig(this.options.config)));
    this.sources = endpoints.map(createSource);
    this.notifyConfig = notify;
  }

  private runCycle(signal: AbortSignal): Promise<RunSummary> {
    const { config, stdout, env } = this.options;
    const notify = this.notifyConfig;
    if (!notify) {
      return Promise.reject(new Error('Orchestrator is not configured'));
    }
    const scanner = scannerOptionsFromConfig(config);
    const sender = senderOptionsFromConfig(config);

    return runScanCycle({
      sources: this.sources,
      scan: (image, s) => scanImage(image, scanner, { env, stdout, signal: s }),
      notify: (image, s) => sendNotification(image, notify, sender, s),
      prepare: () => ensureReportDir(scanner.reportDir),
      hostConcurrency: config.HOST_CONCURRENCY,
      scanConcurrency: config.SCAN_CONCURRENCY,
      signal,
    });
  }
}
