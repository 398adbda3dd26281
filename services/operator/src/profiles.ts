import type * as k8s from '@kubernetes/client-node';
import type { ResourceGroupVersion, ResourcePhase, StatusPatch } from '@forgeline/shared';
import type { OperatorConfig } from './config.js';
import type { JobTemplate } from './job-manifest.js';
import {
  decodeResearchSessionSpec,
  decodeStaticSiteSpec,
  type ResearchSessionSpec,
  type SourceSpec,
  type SpecDecodeResult,
  type StaticSiteSpec,
} from './resource-spec.js';

/**
 * Everything that differs between the resource kinds the controller can
 * drive. The reconcile/monitor loop itself is shared.
 */
export interface ControllerProfile<TSpec> {
  kind: string;
  resource: ResourceGroupVersion;
  template: JobTemplate;
  jobSuffix: string;
  /** Phase written when the job is handed to a monitor. */
  activePhase: ResourcePhase;
  /** Used in "Failed to create <jobNoun>: ..." messages. */
  jobNoun: string;
  /** Prefix of the Failed message written when the job itself fails. */
  failurePrefix: string;
  /** Whether deleting an object removes its uploaded artifacts. */
  cleansStorage: boolean;
  decodeSpec(raw: unknown): SpecDecodeResult<TSpec>;
  buildEnv(objectName: string, spec: TSpec, config: OperatorConfig): k8s.V1EnvVar[];
  startedStatus(jobName: string, now: Date): StatusPatch;
  succeededStatus(objectName: string, now: Date, config: OperatorConfig): StatusPatch;
  failedStatus(message: string, now: Date): StatusPatch;
}

/** RFC 3339 without fractional seconds. */
export function timestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function siteUrl(siteName: string, baseDomain: string): string {
  const host = siteName.toLowerCase().replace(/_/g, '-');
  return `https://${host}.${baseDomain}`;
}

function env(name: string, value: string): k8s.V1EnvVar {
  return { name, value };
}

function storageEnv(config: OperatorConfig): k8s.V1EnvVar[] {
  return [
    env('MINIO_ENDPOINT', config.storage.endpoint),
    env('MINIO_ACCESS_KEY', config.storage.accessKey),
    env('MINIO_SECRET_KEY', config.storage.secretKey),
  ];
}

// ---------------------------------------------------------------------------
// StaticSite
// ---------------------------------------------------------------------------

/** The builder image still names archive downloads `url`. */
function builderSourceType(source: SourceSpec): string {
  return source.type === 'archive' ? 'url' : source.type;
}

export const staticSiteProfile: ControllerProfile<StaticSiteSpec> = {
  kind: 'StaticSite',
  resource: { group: 'hosting.example.com', version: 'v1', plural: 'staticsites' },
  template: {
    appLabel: 'static-site-builder',
    ownerLabel: 'static-site',
    containerName: 'builder',
    resources: {
      requests: { cpu: '500m', memory: '1Gi' },
      limits: { cpu: '2000m', memory: '4Gi' },
    },
  },
  jobSuffix: 'build',
  activePhase: 'Building',
  jobNoun: 'build job',
  failurePrefix: 'Build failed',
  cleansStorage: true,

  decodeSpec: decodeStaticSiteSpec,

  buildEnv(siteName, spec, config) {
    const vars: k8s.V1EnvVar[] = [
      env('SITE_NAME', siteName),
      env('SOURCE_TYPE', builderSourceType(spec.source)),
      ...storageEnv(config),
      env('BUILD_ENABLED', String(spec.build.enabled)),
      env('BUILD_COMMAND', spec.build.command),
      env('BUILD_OUTPUT_DIR', spec.build.outputDir),
      env('SPA_MODE', String(spec.spa ?? false)),
    ];

    const { source } = spec;
    switch (source.type) {
      case 'git':
        vars.push(env('GIT_REPOSITORY', source.git.repository));
        if (source.git.branch) vars.push(env('GIT_BRANCH', source.git.branch));
        if (source.git.path) vars.push(env('GIT_PATH', source.git.path));
        break;
      case 'docker':
        vars.push(env('DOCKER_IMAGE', source.docker.image));
        if (source.docker.path) vars.push(env('DOCKER_PATH', source.docker.path));
        break;
      case 'archive':
        vars.push(env('URL_ARCHIVE', source.archive.url));
        if (source.archive.path) vars.push(env('URL_PATH', source.archive.path));
        break;
    }
    return vars;
  },

  startedStatus(jobName) {
    return { phase: 'Building', message: 'Build job created and running', jobName };
  },

  succeededStatus(siteName, now, config) {
    return {
      phase: 'Ready',
      message: 'Site built and deployed successfully',
      url: siteUrl(siteName, config.baseDomain),
      lastBuildTime: timestamp(now),
    };
  },

  failedStatus(message) {
    return { phase: 'Failed', message };
  },
};

// ---------------------------------------------------------------------------
// ResearchSession
// ---------------------------------------------------------------------------

export const researchSessionProfile: ControllerProfile<ResearchSessionSpec> = {
  kind: 'ResearchSession',
  resource: { group: 'research.example.com', version: 'v1', plural: 'researchsessions' },
  template: {
    appLabel: 'claude-runner',
    ownerLabel: 'research-session',
    containerName: 'claude-runner',
    resources: {
      requests: { cpu: '100m', memory: '256Mi' },
      limits: { cpu: '1000m', memory: '1Gi' },
    },
  },
  jobSuffix: 'run',
  activePhase: 'Running',
  jobNoun: 'job',
  failurePrefix: 'Job failed',
  cleansStorage: false,

  decodeSpec: decodeResearchSessionSpec,

  buildEnv(sessionName, spec, config) {
    return [
      env('RESEARCH_SESSION_NAME', sessionName),
      env('RESEARCH_SESSION_NAMESPACE', config.namespace),
      env('PROMPT', spec.prompt),
      env('WEBSITE_URL', spec.websiteURL),
      env('LLM_MODEL', spec.llmSettings.model),
      env('LLM_TEMPERATURE', spec.llmSettings.temperature.toFixed(2)),
      env('LLM_MAX_TOKENS', String(spec.llmSettings.maxTokens)),
      env('TIMEOUT', String(spec.timeout)),
      env('BACKEND_API_URL', config.backendApiUrl),
      env('TRACE_ENABLED', String(spec.traceSettings?.enabled ?? false)),
      ...(spec.traceSettings ? [env('TRACE_RETENTION', spec.traceSettings.retention)] : []),
      ...storageEnv(config),
    ];
  },

  startedStatus(jobName, now) {
    return {
      phase: 'Running',
      message: 'Job created and running',
      startTime: timestamp(now),
      jobName,
    };
  },

  succeededStatus(_sessionName, now) {
    return {
      phase: 'Completed',
      message: 'Job completed successfully',
      completionTime: timestamp(now),
    };
  },

  failedStatus(message, now) {
    return { phase: 'Failed', message, completionTime: timestamp(now) };
  },
};
