import type * as k8s from '@kubernetes/client-node';
import { logger } from '@forgeline/shared';
import { isConflict, isNotFound } from './kube.js';

const log = logger.child({ module: 'job-runner' });

/** Kubernetes applies this when a Job leaves backoffLimit unset. */
const K8S_DEFAULT_BACKOFF_LIMIT = 6;

export type BatchClient = Pick<k8s.BatchV1Api, 'createNamespacedJob' | 'readNamespacedJob'>;
export type CoreClient = Pick<k8s.CoreV1Api, 'listNamespacedPod' | 'readNamespacedPodLog'>;

export class JobExistsError extends Error {
  constructor(readonly jobName: string) {
    super(`Job ${jobName} already exists`);
    this.name = 'JobExistsError';
  }
}

export interface JobState {
  name: string;
  succeeded: number;
  failed: number;
  backoffLimit: number;
  /** Set once the Job controller has given up (backoff exhausted or deadline exceeded). */
  failedCondition?: {
    reason?: string;
    message?: string;
  };
}

export interface LogOptions {
  tailLines?: number;
}

export interface JobRunner {
  createJob(job: k8s.V1Job): Promise<void>;
  /** Returns undefined when the Job does not exist. */
  getJob(name: string): Promise<JobState | undefined>;
  listPodsForJob(jobName: string): Promise<string[]>;
  getLogs(podName: string, options?: LogOptions): Promise<string>;
}

export function toJobState(name: string, job: k8s.V1Job): JobState {
  const failedCondition = job.status?.conditions?.find((c) => c.type === 'Failed' && c.status === 'True');
  return {
    name,
    succeeded: job.status?.succeeded ?? 0,
    failed: job.status?.failed ?? 0,
    backoffLimit: job.spec?.backoffLimit ?? K8S_DEFAULT_BACKOFF_LIMIT,
    ...(failedCondition && {
      failedCondition: { reason: failedCondition.reason, message: failedCondition.message },
    }),
  };
}

export class KubeJobRunner implements JobRunner {
  constructor(
    private readonly batchApi: BatchClient,
    private readonly coreApi: CoreClient,
    private readonly namespace: string,
  ) {}

  async createJob(job: k8s.V1Job): Promise<void> {
    const name = job.metadata?.name ?? '';
    try {
      await this.batchApi.createNamespacedJob({ namespace: this.namespace, body: job });
    } catch (err) {
      if (isConflict(err)) throw new JobExistsError(name);
      throw err;
    }
    log.info({ jobName: name, namespace: this.namespace }, 'job created');
  }

  async getJob(name: string): Promise<JobState | undefined> {
    try {
      const job = await this.batchApi.readNamespacedJob({ name, namespace: this.namespace });
      return toJobState(name, job);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async listPodsForJob(jobName: string): Promise<string[]> {
    const pods = await this.coreApi.listNamespacedPod({
      namespace: this.namespace,
      labelSelector: `job-name=${jobName}`,
    });
    return pods.items.flatMap((pod) => (pod.metadata?.name ? [pod.metadata.name] : []));
  }

  async getLogs(podName: string, options: LogOptions = {}): Promise<string> {
    return this.coreApi.readNamespacedPodLog({
      name: podName,
      namespace: this.namespace,
      ...(options.tailLines !== undefined && { tailLines: options.tailLines }),
    });
  }
}
