import { logger } from '@forgeline/shared';
import type { OperatorConfig } from './config.js';
import { watchResources, type ResourceEvent, type WatchSource } from './event-watcher.js';
import { JobMonitor, MonitorRegistry } from './job-monitor.js';
import type { JobRunner } from './job-runner.js';
import type { ControllerProfile } from './profiles.js';
import { Reconciler, type EventHandler } from './reconciler.js';
import type { StatusStore } from './status-store.js';
import type { StorageCleaner } from './storage-cleanup.js';
import { sleep as defaultSleep, type Sleep } from './util.js';

const log = logger.child({ module: 'controller' });

export interface ControllerOptions {
  handler: EventHandler;
  events: (signal?: AbortSignal) => AsyncIterable<ResourceEvent>;
  monitors: Pick<MonitorRegistry, 'stopAll' | 'size'>;
  /** Pause before handling Added/Modified so status writes racing the event can land. */
  eventSettleMs?: number;
  sleep?: Sleep;
}

/**
 * Drains the event stream with a single consumer, one event at a time, in
 * delivery order. Job monitoring happens on the registry's own tasks.
 */
export class Controller {
  private readonly sleep: Sleep;

  constructor(private readonly options: ControllerOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(signal?: AbortSignal): Promise<void> {
    // Also the startup probe: an unreachable store fails the process here.
    await this.options.handler.resumeActive();

    for await (const event of this.options.events(signal)) {
      if (signal?.aborted) break;
      await this.dispatch(event, signal);
    }

    this.options.monitors.stopAll();
    log.info({ inFlight: this.options.monitors.size }, 'controller stopped');
  }

  async dispatch(event: ResourceEvent, signal?: AbortSignal): Promise<void> {
    const { handler, eventSettleMs = 0 } = this.options;

    switch (event.type) {
      case 'Added':
      case 'Modified': {
        const { name } = event.object.metadata;
        if (eventSettleMs > 0) await this.sleep(eventSettleMs, signal);
        try {
          const outcome = await handler.reconcile(name);
          log.debug({ name, event: event.type, ...outcome }, 'event handled');
        } catch (err) {
          log.error({ err, name, event: event.type }, 'error handling event');
        }
        break;
      }
      case 'Deleted':
        await handler.handleDeleted(event.object);
        break;
      case 'Error':
        log.warn({ message: event.message }, 'watch error event');
        break;
    }
  }
}

export interface ControllerClients {
  store: StatusStore;
  jobs: JobRunner;
  watchSource: WatchSource;
  cleaner?: StorageCleaner;
}

export interface ControllerRuntime {
  sleep?: Sleep;
  now?: () => Date;
}

/** Wire watcher, reconciler, monitors and controller for one resource kind. */
export function createController<TSpec>(
  profile: ControllerProfile<TSpec>,
  config: OperatorConfig,
  clients: ControllerClients,
  runtime: ControllerRuntime = {},
): { controller: Controller; reconciler: Reconciler<TSpec>; monitors: MonitorRegistry } {
  const { store, jobs, watchSource, cleaner } = clients;
  const { sleep = defaultSleep, now } = runtime;

  const monitor = new JobMonitor({ profile, store, jobs, config, sleep, now });
  const monitors = new MonitorRegistry(monitor);
  const reconciler = new Reconciler({ profile, store, jobs, monitors, config, cleaner, now });

  const controller = new Controller({
    handler: reconciler,
    monitors,
    eventSettleMs: config.timing.eventSettleMs,
    sleep,
    events: (signal) =>
      watchResources(watchSource, {
        signal,
        openRetryMs: config.timing.watchRetryMs,
        restartDelayMs: config.timing.watchRestartMs,
        sleep,
      }),
  });

  return { controller, reconciler, monitors };
}
