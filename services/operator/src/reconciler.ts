import { isPendingPhase, logger, withSpan, type DesiredStateObject, type StatusPatch } from '@forgeline/shared';
import type { OperatorConfig } from './config.js';
import { buildJobManifest, jobNameFor } from './job-manifest.js';
import { truncateMessage } from './job-monitor.js';
import { JobExistsError, type JobRunner } from './job-runner.js';
import type { ControllerProfile } from './profiles.js';
import type { StatusStore } from './status-store.js';
import type { StorageCleaner } from './storage-cleanup.js';
import { errorMessage } from './util.js';

const log = logger.child({ module: 'reconciler' });

/** Deleted-object uids remembered for duplicate suppression. */
const CLEANED_MEMORY = 1_000;

export type SkipReason = 'not-found' | 'phase' | 'job-exists';

export type ReconcileOutcome =
  | { action: 'created'; jobName: string }
  | { action: 'skipped'; reason: SkipReason }
  | { action: 'invalid'; error: string }
  | { action: 'failed'; jobName: string; error: string };

export type CleanupOutcome = 'cleaned' | 'skipped' | 'duplicate' | 'failed';

export interface MonitorStarter {
  start(jobName: string, objectName: string): void;
}

export interface ReconcilerDeps<TSpec> {
  profile: ControllerProfile<TSpec>;
  store: StatusStore;
  jobs: JobRunner;
  monitors: MonitorStarter;
  config: OperatorConfig;
  cleaner?: StorageCleaner;
  now?: () => Date;
}

/** What the controller loop needs from a reconciler, whatever the resource kind. */
export interface EventHandler {
  reconcile(name: string): Promise<ReconcileOutcome>;
  handleDeleted(object: DesiredStateObject): Promise<CleanupOutcome>;
  resumeActive(): Promise<number>;
}

export class Reconciler<TSpec> implements EventHandler {
  private readonly now: () => Date;
  private readonly cleaned = new Set<string>();

  constructor(private readonly deps: ReconcilerDeps<TSpec>) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Drive an Added/Modified object forward. Only objects whose phase is
   * absent or Pending get a job; everything else is left to its monitor.
   * Returns as soon as the job exists, without waiting on it.
   */
  async reconcile(name: string): Promise<ReconcileOutcome> {
    const { profile } = this.deps;
    return withSpan('operator.reconcile', { 'resource.kind': profile.kind, 'resource.name': name }, async (span) => {
      const outcome = await this.reconcileObject(name);
      span.setAttribute('reconcile.action', outcome.action);
      return outcome;
    });
  }

  private async reconcileObject(name: string): Promise<ReconcileOutcome> {
    const { profile, store, jobs, monitors, config } = this.deps;

    // The event payload may be stale; act on the current object.
    const current = await store.get(name);
    if (!current) {
      log.info({ name }, 'object no longer exists, skipping');
      return { action: 'skipped', reason: 'not-found' };
    }

    const phase = current.status?.phase;
    log.info({ name, phase: phase ?? '' }, 'processing object');
    if (!isPendingPhase(phase)) {
      return { action: 'skipped', reason: 'phase' };
    }

    const decoded = profile.decodeSpec(current.spec);
    if (!decoded.ok) {
      log.warn({ name, error: decoded.error }, 'invalid spec');
      await this.writeStatus(
        name,
        profile.failedStatus(truncateMessage(`Invalid spec: ${decoded.error}`), this.now()),
        true,
      );
      return { action: 'invalid', error: decoded.error };
    }

    const now = this.now();
    const jobName = jobNameFor(name, profile.jobSuffix, now);

    if (await jobs.getJob(jobName)) {
      log.info({ name, jobName }, 'job already exists');
      return { action: 'skipped', reason: 'job-exists' };
    }

    const manifest = buildJobManifest({
      template: profile.template,
      objectName: name,
      jobName,
      env: profile.buildEnv(name, decoded.spec, config),
      config,
    });

    // Claim the object: only the delivery that still sees Pending may proceed.
    try {
      const claimed = await store.updateStatus(name, profile.startedStatus(jobName, now), {
        expectPhase: isPendingPhase,
      });
      if (claimed === 'not-found') return { action: 'skipped', reason: 'not-found' };
      if (claimed === 'precondition-failed') {
        log.info({ name }, 'object was claimed by another delivery');
        return { action: 'skipped', reason: 'phase' };
      }
    } catch (err) {
      log.warn({ err, name, jobName }, `failed to update status to ${profile.activePhase}, creating job anyway`);
    }

    try {
      await jobs.createJob(manifest);
    } catch (err) {
      if (err instanceof JobExistsError) {
        log.info({ name, jobName }, 'job already exists');
        return { action: 'skipped', reason: 'job-exists' };
      }
      const error = errorMessage(err);
      log.error({ err, name, jobName }, 'failed to create job');
      await this.writeStatus(
        name,
        profile.failedStatus(truncateMessage(`Failed to create ${profile.jobNoun}: ${error}`), this.now()),
        false,
      );
      return { action: 'failed', jobName, error };
    }

    log.info({ name, jobName }, `created ${profile.jobNoun}`);
    monitors.start(jobName, name);
    return { action: 'created', jobName };
  }

  /**
   * Cleanup for a deleted object. Failures are logged only: the object is
   * gone and has nowhere to record them.
   */
  async handleDeleted(object: DesiredStateObject): Promise<CleanupOutcome> {
    const { profile, cleaner } = this.deps;
    const { name } = object.metadata;
    const key = object.metadata.uid ?? name;

    if (this.cleaned.has(key)) {
      log.debug({ name }, 'cleanup already handled');
      return 'duplicate';
    }
    this.remember(key);

    if (!profile.cleansStorage) {
      log.info({ name }, `${profile.kind} deleted`);
      return 'skipped';
    }
    if (!cleaner) {
      log.warn({ name }, 'storage cleanup is not configured, leaving artifacts in place');
      return 'skipped';
    }

    log.info({ name }, `${profile.kind} deleted, cleaning up storage`);
    try {
      await cleaner.removeSite(name);
      return 'cleaned';
    } catch (err) {
      log.error({ err, name }, 'error cleaning up storage');
      return 'failed';
    }
  }

  /**
   * Reattach monitors to objects left in the active phase, e.g. after a
   * controller restart. Throws when the store cannot be listed.
   */
  async resumeActive(): Promise<number> {
    const { profile, store, monitors } = this.deps;
    const objects = await store.list();
    let resumed = 0;
    for (const obj of objects) {
      const jobName = obj.status?.jobName;
      if (obj.status?.phase === profile.activePhase && jobName) {
        monitors.start(jobName, obj.metadata.name);
        resumed++;
      }
    }
    log.info({ resumed, total: objects.length }, 'resumed monitoring of active jobs');
    return resumed;
  }

  private remember(key: string): void {
    this.cleaned.add(key);
    if (this.cleaned.size > CLEANED_MEMORY) {
      const oldest = this.cleaned.values().next();
      if (!oldest.done) this.cleaned.delete(oldest.value);
    }
  }

  private async writeStatus(name: string, patch: StatusPatch, onlyIfPending: boolean): Promise<void> {
    try {
      await this.deps.store.updateStatus(name, patch, onlyIfPending ? { expectPhase: isPendingPhase } : {});
    } catch (err) {
      log.error({ err, name, phase: patch.phase }, 'failed to update status');
    }
  }
}
