import type * as k8s from '@kubernetes/client-node';
import type { OperatorConfig } from './config.js';

/** Job names end up in the `job-name` pod label, which caps them at 63 characters. */
const MAX_JOB_NAME_LENGTH = 63;

export interface JobTemplate {
  appLabel: string;
  ownerLabel: string;
  containerName: string;
  resources: k8s.V1ResourceRequirements;
}

export interface JobManifestInput {
  template: JobTemplate;
  objectName: string;
  jobName: string;
  env: k8s.V1EnvVar[];
  config: Pick<OperatorConfig, 'namespace' | 'jobImage' | 'job'>;
}

/**
 * `<object>-<suffix>-<unix seconds>`. Long object names are cut so the
 * discriminator always survives.
 */
export function jobNameFor(objectName: string, suffix: string, now: Date): string {
  const tail = `-${suffix}-${Math.floor(now.getTime() / 1000)}`;
  const base = objectName.slice(0, MAX_JOB_NAME_LENGTH - tail.length).replace(/[-.]+$/, '');
  return `${base}${tail}`;
}

export function buildJobManifest(input: JobManifestInput): k8s.V1Job {
  const { template, objectName, jobName, env, config } = input;
  const labels = {
    app: template.appLabel,
    [template.ownerLabel]: objectName,
  };

  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: {
      name: jobName,
      namespace: config.namespace,
      labels,
    },
    spec: {
      backoffLimit: config.job.backoffLimit,
      activeDeadlineSeconds: config.job.deadlineSeconds,
      ...(config.job.ttlSecondsAfterFinished !== undefined && {
        ttlSecondsAfterFinished: config.job.ttlSecondsAfterFinished,
      }),
      template: {
        metadata: { labels },
        spec: {
          restartPolicy: 'Never',
          containers: [{
            name: template.containerName,
            image: config.jobImage,
            env,
            resources: template.resources,
          }],
        },
      },
    },
  };
}
