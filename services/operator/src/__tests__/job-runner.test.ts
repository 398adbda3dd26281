import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@forgeline/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@forgeline/shared')>();
  return {
    ...actual,
    logger: {
      child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
    },
  };
});

import { JobExistsError, KubeJobRunner, toJobState } from '../job-runner.js';

function apiError(code: number): Error {
  return Object.assign(new Error(`HTTP ${code}`), { code });
}

describe('toJobState', () => {
  it('reads counters and the configured backoff limit', () => {
    const state = toJobState('docs-build-1', {
      spec: { backoffLimit: 3, template: {} },
      status: { succeeded: 1, failed: 2 },
    });

    expect(state).toEqual({ name: 'docs-build-1', succeeded: 1, failed: 2, backoffLimit: 3 });
  });

  it('defaults missing counters to zero and the backoff limit to six', () => {
    expect(toJobState('docs-build-1', {})).toEqual({
      name: 'docs-build-1',
      succeeded: 0,
      failed: 0,
      backoffLimit: 6,
    });
  });

  it('picks up a true Failed condition', () => {
    const state = toJobState('docs-build-1', {
      status: {
        failed: 1,
        conditions: [
          { type: 'Complete', status: 'False' },
          { type: 'Failed', status: 'True', reason: 'DeadlineExceeded', message: 'deadline passed' },
        ],
      },
    });

    expect(state.failedCondition).toEqual({ reason: 'DeadlineExceeded', message: 'deadline passed' });
  });

  it('ignores a Failed condition that is not true', () => {
    const state = toJobState('docs-build-1', {
      status: { conditions: [{ type: 'Failed', status: 'False' }] },
    });

    expect(state.failedCondition).toBeUndefined();
  });
});

describe('KubeJobRunner', () => {
  const batchApi = {
    createNamespacedJob: vi.fn(),
    readNamespacedJob: vi.fn(),
  };
  const coreApi = {
    listNamespacedPod: vi.fn(),
    readNamespacedPodLog: vi.fn(),
  };
  let runner: KubeJobRunner;

  beforeEach(() => {
    vi.resetAllMocks();
    runner = new KubeJobRunner(batchApi, coreApi, 'static-hosting');
  });

  it('submits the job to its namespace', async () => {
    batchApi.createNamespacedJob.mockResolvedValue({});
    const job = { metadata: { name: 'docs-build-1' } };

    await runner.createJob(job);

    expect(batchApi.createNamespacedJob).toHaveBeenCalledWith({ namespace: 'static-hosting', body: job });
  });

  it('turns a name conflict into JobExistsError', async () => {
    batchApi.createNamespacedJob.mockRejectedValue(apiError(409));

    const err = await runner.createJob({ metadata: { name: 'docs-build-1' } }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(JobExistsError);
    expect(err).toHaveProperty('message', 'Job docs-build-1 already exists');
  });

  it('rethrows other creation errors', async () => {
    batchApi.createNamespacedJob.mockRejectedValue(apiError(403));

    await expect(runner.createJob({ metadata: { name: 'docs-build-1' } })).rejects.toThrow('HTTP 403');
  });

  it('returns undefined for a job that does not exist', async () => {
    batchApi.readNamespacedJob.mockRejectedValue(apiError(404));

    await expect(runner.getJob('docs-build-1')).resolves.toBeUndefined();
  });

  it('reads job state', async () => {
    batchApi.readNamespacedJob.mockResolvedValue({ spec: { backoffLimit: 3, template: {} }, status: { succeeded: 1 } });

    await expect(runner.getJob('docs-build-1')).resolves.toEqual({
      name: 'docs-build-1',
      succeeded: 1,
      failed: 0,
      backoffLimit: 3,
    });
    expect(batchApi.readNamespacedJob).toHaveBeenCalledWith({ name: 'docs-build-1', namespace: 'static-hosting' });
  });

  it('finds pods by the job-name label', async () => {
    coreApi.listNamespacedPod.mockResolvedValue({
      items: [{ metadata: { name: 'docs-build-1-abcde' } }, { metadata: {} }],
    });

    await expect(runner.listPodsForJob('docs-build-1')).resolves.toEqual(['docs-build-1-abcde']);
    expect(coreApi.listNamespacedPod).toHaveBeenCalledWith({
      namespace: 'static-hosting',
      labelSelector: 'job-name=docs-build-1',
    });
  });

  it('requests only the tail of the logs when asked', async () => {
    coreApi.readNamespacedPodLog.mockResolvedValue('done\n');

    await expect(runner.getLogs('docs-build-1-abcde', { tailLines: 50 })).resolves.toBe('done\n');
    expect(coreApi.readNamespacedPodLog).toHaveBeenCalledWith({
      name: 'docs-build-1-abcde',
      namespace: 'static-hosting',
      tailLines: 50,
    });
  });
});
