import * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { logger, type DesiredStateObject, type ResourceGroupVersion } from '@forgeline/shared';
import { parseResourceObject } from './resource-spec.js';
import { sleep as defaultSleep, type Sleep } from './util.js';

const log = logger.child({ module: 'event-watcher' });

export const DEFAULT_OPEN_RETRY_MS = 5_000;
export const DEFAULT_RESTART_DELAY_MS = 2_000;

export interface RawWatchEvent {
  type: string;
  object: unknown;
}

export interface WatchHandle {
  abort(): void;
}

/** One watch stream per `open` call; `onDone` fires when the server ends it. */
export interface WatchSource {
  open(onEvent: (event: RawWatchEvent) => void, onDone: (err?: unknown) => void): Promise<WatchHandle>;
}

export type ResourceEvent =
  | { type: 'Added' | 'Modified' | 'Deleted'; object: DesiredStateObject }
  | { type: 'Error'; message: string };

export interface WatchOptions {
  signal?: AbortSignal;
  openRetryMs?: number;
  restartDelayMs?: number;
  sleep?: Sleep;
}

// ---------------------------------------------------------------------------
// Buffer between the watch callback and the async consumer
// ---------------------------------------------------------------------------

class EventChannel<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private closed = false;
  private waiter: (() => void) | undefined;

  push(item: T): void {
    if (this.closed) return;
    this.buffer.push(item);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Event decoding
// ---------------------------------------------------------------------------

const watchStatusSchema = z
  .object({
    message: z.string().optional(),
    reason: z.string().optional(),
    code: z.number().optional(),
  })
  .passthrough();

function describeWatchError(object: unknown): string {
  const status = watchStatusSchema.safeParse(object);
  if (!status.success) return 'unknown watch error';
  const { message, reason, code } = status.data;
  const text = message ?? reason ?? 'unknown watch error';
  return code !== undefined ? `${text} (code ${code})` : text;
}

function toResourceEvent(raw: RawWatchEvent): ResourceEvent | undefined {
  let type: 'Added' | 'Modified' | 'Deleted';
  switch (raw.type) {
    case 'ADDED':
      type = 'Added';
      break;
    case 'MODIFIED':
      type = 'Modified';
      break;
    case 'DELETED':
      type = 'Deleted';
      break;
    case 'ERROR':
      return { type: 'Error', message: describeWatchError(raw.object) };
    default:
      log.debug({ type: raw.type }, 'ignoring watch event type');
      return undefined;
  }

  const object = parseResourceObject(raw.object);
  if (!object) {
    log.warn({ type: raw.type }, 'ignoring watch event without a usable object');
    return undefined;
  }
  return { type, object };
}

// ---------------------------------------------------------------------------
// Restartable event stream
// ---------------------------------------------------------------------------

/**
 * Infinite stream of resource events. A failed open is retried after
 * `openRetryMs`; a stream the server closes is reopened after
 * `restartDelayMs`. Delivery is at-least-once: every reopen replays the
 * current objects as Added. Ends only when `signal` aborts.
 */
export async function* watchResources(
  source: WatchSource,
  options: WatchOptions = {},
): AsyncGenerator<ResourceEvent> {
  const {
    signal,
    openRetryMs = DEFAULT_OPEN_RETRY_MS,
    restartDelayMs = DEFAULT_RESTART_DELAY_MS,
    sleep = defaultSleep,
  } = options;

  while (!signal?.aborted) {
    const channel = new EventChannel<RawWatchEvent>();
    let streamError: unknown;
    let handle: WatchHandle;

    try {
      handle = await source.open(
        (event) => channel.push(event),
        (err) => {
          streamError = err;
          channel.close();
        },
      );
    } catch (err) {
      log.warn({ err, retryMs: openRetryMs }, 'failed to open watch, retrying');
      await sleep(openRetryMs, signal);
      continue;
    }

    const onAbort = () => channel.close();
    signal?.addEventListener('abort', onAbort, { once: true });
    log.info('watching for events');

    try {
      for await (const raw of channel) {
        const event = toResourceEvent(raw);
        if (event) yield event;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      handle.abort();
    }

    if (signal?.aborted) return;
    if (streamError) {
      log.warn({ err: streamError, retryMs: restartDelayMs }, 'watch stream ended with error, restarting');
    } else {
      log.info({ retryMs: restartDelayMs }, 'watch stream closed, restarting');
    }
    await sleep(restartDelayMs, signal);
  }
}

// ---------------------------------------------------------------------------
// Kubernetes source
// ---------------------------------------------------------------------------

export function watchPath(resource: ResourceGroupVersion, namespace: string): string {
  return `/apis/${resource.group}/${resource.version}/namespaces/${namespace}/${resource.plural}`;
}

export class KubeWatchSource implements WatchSource {
  private readonly watch: k8s.Watch;

  constructor(
    kc: k8s.KubeConfig,
    private readonly path: string,
  ) {
    this.watch = new k8s.Watch(kc);
  }

  async open(onEvent: (event: RawWatchEvent) => void, onDone: (err?: unknown) => void): Promise<WatchHandle> {
    const request = await this.watch.watch(
      this.path,
      {},
      (type: string, object: unknown) => onEvent({ type, object }),
      (err: unknown) => onDone(err),
    );
    return { abort: () => request.abort() };
  }
}
