import { logger, withSpan, type StatusPatch } from '@forgeline/shared';
import type { OperatorConfig } from './config.js';
import type { JobRunner, JobState } from './job-runner.js';
import type { ControllerProfile } from './profiles.js';
import type { StatusStore } from './status-store.js';
import { sleep as defaultSleep, type Sleep } from './util.js';

const log = logger.child({ module: 'job-monitor' });

/** Status messages are shown in dashboards and stored on the object. */
export const MAX_STATUS_MESSAGE_LENGTH = 500;

export type MonitorOutcome = 'succeeded' | 'failed' | 'abandoned' | 'stopped';

export function truncateMessage(message: string, max = MAX_STATUS_MESSAGE_LENGTH): string {
  if (message.length <= max) return message;
  return `${message.slice(0, max - 3)}...`;
}

export interface JobMonitorDeps<TSpec> {
  profile: ControllerProfile<TSpec>;
  store: StatusStore;
  jobs: JobRunner;
  config: OperatorConfig;
  sleep?: Sleep;
  now?: () => Date;
}

/**
 * Polls one job until it succeeds, exhausts its retry budget, or either the
 * job or its owning object disappears. The retry ceiling is the job's own
 * backoffLimit; the monitor never changes it.
 */
export class JobMonitor<TSpec> {
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly deps: JobMonitorDeps<TSpec>) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async run(jobName: string, objectName: string, signal?: AbortSignal): Promise<MonitorOutcome> {
    log.info({ jobName, objectName }, 'starting job monitoring');
    for (;;) {
      await this.sleep(this.deps.config.timing.pollIntervalMs, signal);
      if (signal?.aborted) {
        log.info({ jobName, objectName }, 'job monitoring stopped');
        return 'stopped';
      }
      const outcome = await this.poll(jobName, objectName);
      if (outcome) return outcome;
    }
  }

  /**
   * One polling step. Returns undefined while the job is still in progress
   * or its final status has not been stored yet.
   */
  async poll(jobName: string, objectName: string): Promise<Exclude<MonitorOutcome, 'stopped'> | undefined> {
    const { store, jobs, profile, config } = this.deps;

    try {
      const obj = await store.get(objectName);
      if (!obj) {
        log.info({ jobName, objectName }, 'object no longer exists, stopping job monitoring');
        return 'abandoned';
      }
    } catch (err) {
      log.warn({ err, objectName }, 'failed to check object existence');
    }

    let job: JobState | undefined;
    try {
      job = await jobs.getJob(jobName);
    } catch (err) {
      log.warn({ err, jobName }, 'failed to get job');
      return undefined;
    }

    if (!job) {
      log.info({ jobName, objectName }, 'job not found, stopping monitoring');
      return 'abandoned';
    }

    if (job.succeeded > 0) {
      log.info({ jobName, objectName }, 'job completed successfully');
      const patch = profile.succeededStatus(objectName, this.now(), config);
      const written = await this.writeStatus(objectName, jobName, patch);
      return written ? 'succeeded' : undefined;
    }

    const exhausted = job.failed > 0 && job.failed >= job.backoffLimit;
    if (exhausted || job.failedCondition) {
      log.info(
        { jobName, objectName, failed: job.failed, reason: job.failedCondition?.reason },
        'job failed',
      );
      const message = await this.diagnose(job);
      const written = await this.writeStatus(objectName, jobName, profile.failedStatus(message, this.now()));
      return written ? 'failed' : undefined;
    }

    return undefined;
  }

  /** Best-effort log excerpt from the job's first pod. */
  private async diagnose(job: JobState): Promise<string> {
    const { jobs, profile, config } = this.deps;
    const prefix = profile.failurePrefix;
    const fallback = job.failedCondition?.message ? `${prefix}: ${job.failedCondition.message}` : prefix;

    try {
      const pods = await jobs.listPodsForJob(job.name);
      const podName = pods[0];
      if (!podName) return truncateMessage(fallback);
      const logs = (await jobs.getLogs(podName, { tailLines: config.logTailLines })).trim();
      if (!logs) return truncateMessage(fallback);
      return truncateMessage(`${prefix}: ${logs}`);
    } catch (err) {
      log.warn({ err, jobName: job.name }, 'failed to fetch job logs');
      return truncateMessage(fallback);
    }
  }

  /**
   * Writes the final status. Returns false when the store could not be
   * reached, so the next poll tries again.
   */
  private async writeStatus(objectName: string, jobName: string, patch: StatusPatch): Promise<boolean> {
    const { store, profile } = this.deps;
    try {
      await withSpan(
        'operator.monitor.status',
        { 'resource.kind': profile.kind, 'resource.name': objectName, 'job.name': jobName, 'status.phase': patch.phase ?? '' },
        async () => {
          const result = await store.updateStatus(objectName, patch);
          if (result === 'not-found') {
            log.info({ objectName, jobName }, 'object deleted before final status could be written');
          }
        },
      );
    } catch (err) {
      log.error({ err, objectName, jobName, phase: patch.phase }, 'failed to write final status, retrying');
      return false;
    }
    return true;
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export interface MonitorRunner {
  run(jobName: string, objectName: string, signal?: AbortSignal): Promise<MonitorOutcome>;
}

export interface MonitorInfo {
  jobName: string;
  objectName: string;
  startedAt: Date;
}

interface MonitorEntry extends MonitorInfo {
  abort: AbortController;
  done: Promise<MonitorOutcome>;
}

/**
 * In-flight monitors keyed by job name. Starting a monitor for a job that
 * is already watched is a no-op; entries drop out when their monitor ends.
 */
export class MonitorRegistry {
  private readonly entries = new Map<string, MonitorEntry>();

  constructor(private readonly runner: MonitorRunner) {}

  start(jobName: string, objectName: string): void {
    if (this.entries.has(jobName)) {
      log.debug({ jobName, objectName }, 'job already monitored');
      return;
    }

    const abort = new AbortController();
    const done = this.runner
      .run(jobName, objectName, abort.signal)
      .catch((err: unknown): MonitorOutcome => {
        log.error({ err, jobName, objectName }, 'job monitor crashed');
        return 'abandoned';
      })
      .finally(() => {
        this.entries.delete(jobName);
      });

    this.entries.set(jobName, { jobName, objectName, startedAt: new Date(), abort, done });
  }

  has(jobName: string): boolean {
    return this.entries.has(jobName);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): MonitorInfo[] {
    return [...this.entries.values()].map(({ jobName, objectName, startedAt }) => ({ jobName, objectName, startedAt }));
  }

  /** Resolves with the outcome of a running monitor, or undefined if none is registered. */
  outcome(jobName: string): Promise<MonitorOutcome> | undefined {
    return this.entries.get(jobName)?.done;
  }

  /** Resolves once every monitor registered at call time has ended. */
  async whenIdle(): Promise<void> {
    await Promise.all([...this.entries.values()].map((entry) => entry.done));
  }

  /** Aborts every monitor. Used at shutdown; state is re-derived from the store on restart. */
  stopAll(): void {
    for (const entry of this.entries.values()) {
      entry.abort.abort();
    }
  }
}
