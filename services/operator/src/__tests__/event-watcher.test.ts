import { describe, it, expect, vi } from 'vitest';

vi.mock('@forgeline/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@forgeline/shared')>();
  return {
    ...actual,
    logger: {
      child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
    },
  };
});

import { watchPath, watchResources, type ResourceEvent } from '../event-watcher.js';
import { ScriptedWatchSource, rawObject } from './helpers/fakes.js';

async function take(stream: AsyncIterable<ResourceEvent>, count: number): Promise<ResourceEvent[]> {
  const events: ResourceEvent[] = [];
  for await (const event of stream) {
    events.push(event);
    if (events.length === count) break;
  }
  return events;
}

function summarize(event: ResourceEvent): string {
  return event.type === 'Error' ? `Error:${event.message}` : `${event.type}:${event.object.metadata.name}`;
}

describe('watchResources', () => {
  it('maps watch events to resource events in delivery order', async () => {
    const source = new ScriptedWatchSource([
      {
        events: [
          { type: 'ADDED', object: rawObject('docs') },
          { type: 'MODIFIED', object: rawObject('docs', { phase: 'Building' }) },
          { type: 'DELETED', object: rawObject('blog') },
        ],
      },
    ]);

    const events = await take(watchResources(source, { sleep: vi.fn() }), 3);

    expect(events.map(summarize)).toEqual(['Added:docs', 'Modified:docs', 'Deleted:blog']);
    const modified = events[1];
    expect(modified?.type === 'Modified' && modified.object.status?.phase).toBe('Building');
  });

  it('skips bookmarks and objects without a name', async () => {
    const source = new ScriptedWatchSource([
      {
        events: [
          { type: 'BOOKMARK', object: { metadata: { resourceVersion: '12' } } },
          { type: 'ADDED', object: { metadata: {} } },
          { type: 'ADDED', object: 'not an object' },
          { type: 'ADDED', object: rawObject('docs') },
        ],
      },
    ]);

    const events = await take(watchResources(source, { sleep: vi.fn() }), 1);

    expect(events.map(summarize)).toEqual(['Added:docs']);
  });

  it('surfaces server error events with their code', async () => {
    const source = new ScriptedWatchSource([
      {
        events: [
          { type: 'ERROR', object: { kind: 'Status', message: 'too old resource version', code: 410 } },
          { type: 'ERROR', object: { reason: 'Expired' } },
          { type: 'ERROR', object: null },
        ],
      },
    ]);

    const events = await take(watchResources(source, { sleep: vi.fn() }), 3);

    expect(events).toEqual([
      { type: 'Error', message: 'too old resource version (code 410)' },
      { type: 'Error', message: 'Expired' },
      { type: 'Error', message: 'unknown watch error' },
    ]);
  });

  it('retries a failed open and reopens a closed stream', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const source = new ScriptedWatchSource([
      { openError: new Error('connection refused') },
      { events: [{ type: 'ADDED', object: rawObject('docs') }], end: 'close' },
      { events: [{ type: 'ADDED', object: rawObject('docs') }], end: new Error('stream reset') },
      { events: [{ type: 'ADDED', object: rawObject('blog') }] },
    ]);

    const events = await take(watchResources(source, { sleep, openRetryMs: 5_000, restartDelayMs: 2_000 }), 3);

    expect(events.map(summarize)).toEqual(['Added:docs', 'Added:docs', 'Added:blog']);
    expect(source.opens).toBe(4);
    expect(sleep.mock.calls).toEqual([
      [5_000, undefined],
      [2_000, undefined],
      [2_000, undefined],
    ]);
  });

  it('releases the stream when the consumer stops', async () => {
    const source = new ScriptedWatchSource([{ events: [{ type: 'ADDED', object: rawObject('docs') }] }]);

    await take(watchResources(source, { sleep: vi.fn() }), 1);

    expect(source.aborts).toBe(1);
  });

  it('ends once the signal aborts', async () => {
    const abort = new AbortController();
    const source = new ScriptedWatchSource([{ events: [{ type: 'ADDED', object: rawObject('docs') }] }]);
    const stream = watchResources(source, { signal: abort.signal, sleep: vi.fn() });

    const first = await stream.next();
    expect(first.done).toBe(false);

    abort.abort();
    const next = await stream.next();

    expect(next.done).toBe(true);
    expect(source.opens).toBe(1);
    expect(source.aborts).toBe(1);
  });

  it('does not open a stream when already aborted', async () => {
    const abort = new AbortController();
    abort.abort();
    const source = new ScriptedWatchSource([]);

    const events = await take(watchResources(source, { signal: abort.signal }), 1);

    expect(events).toEqual([]);
    expect(source.opens).toBe(0);
  });
});

describe('watchPath', () => {
  it('builds the namespaced collection path of a custom resource', () => {
    expect(watchPath({ group: 'hosting.example.com', version: 'v1', plural: 'staticsites' }, 'static-hosting')).toBe(
      '/apis/hosting.example.com/v1/namespaces/static-hosting/staticsites',
    );
  });
});
