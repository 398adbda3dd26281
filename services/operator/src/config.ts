import { logger } from '@forgeline/shared';

const log = logger.child({ module: 'config' });

export type ControllerKind = 'staticsite' | 'researchsession';

const VALID_KINDS: ControllerKind[] = ['staticsite', 'researchsession'];

const DEFAULT_NAMESPACES: Record<ControllerKind, string> = {
  staticsite: 'static-hosting',
  researchsession: 'default',
};

const DEFAULT_IMAGES: Record<ControllerKind, string> = {
  staticsite: 'quay.io/example/static-site-builder:latest',
  researchsession: 'claude-runner:latest',
};

export class ControllerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ControllerConfigError';
  }
}

export interface StorageConfig {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  region: string;
}

export interface OperatorConfig {
  kind: ControllerKind;
  namespace: string;
  jobImage: string;
  baseDomain: string;
  backendApiUrl: string;
  storage: StorageConfig;
  job: {
    backoffLimit: number;
    deadlineSeconds: number;
    ttlSecondsAfterFinished?: number;
  };
  timing: {
    pollIntervalMs: number;
    watchRetryMs: number;
    watchRestartMs: number;
    eventSettleMs: number;
  };
  logTailLines: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < min) {
    log.warn({ key, configured: raw, using: fallback }, 'invalid numeric setting, using default');
    return fallback;
  }
  return parsed;
}

function normalizeEndpoint(endpoint: string, secure: boolean): string {
  if (/^https?:\/\//i.test(endpoint)) return endpoint;
  return `http${secure ? 's' : ''}://${endpoint}`;
}

function isKind(value: string): value is ControllerKind {
  return VALID_KINDS.some((kind) => kind === value);
}

/**
 * Read the operator configuration from the environment. Called once at
 * startup; there is no hot reload.
 */
export function loadConfig(env: Env = process.env): OperatorConfig {
  const kindRaw = (readString(env, 'CONTROLLER_KIND') ?? 'staticsite').toLowerCase();
  if (!isKind(kindRaw)) {
    throw new ControllerConfigError(
      `Unknown CONTROLLER_KIND: ${kindRaw}. Expected one of: ${VALID_KINDS.join(', ')}`,
    );
  }
  const kind = kindRaw;

  const legacyImage = kind === 'staticsite' ? readString(env, 'BUILDER_IMAGE') : readString(env, 'RUNNER_IMAGE');
  const secureRaw = (readString(env, 'MINIO_SECURE') ?? '').toLowerCase();
  const secure = secureRaw === 'true' || secureRaw === '1';

  const ttlRaw = readString(env, 'JOB_TTL_SECONDS');
  const ttl = ttlRaw === undefined ? undefined : readInt(env, 'JOB_TTL_SECONDS', 0, 0);

  const config: OperatorConfig = {
    kind,
    namespace: readString(env, 'NAMESPACE') ?? DEFAULT_NAMESPACES[kind],
    jobImage: readString(env, 'JOB_IMAGE') ?? legacyImage ?? DEFAULT_IMAGES[kind],
    baseDomain: readString(env, 'BASE_DOMAIN') ?? 'sites.apps.example.com',
    backendApiUrl: readString(env, 'BACKEND_API_URL') ?? '',
    storage: {
      endpoint: normalizeEndpoint(readString(env, 'MINIO_ENDPOINT') ?? 'http://minio.minio.svc:9000', secure),
      accessKey: readString(env, 'MINIO_ACCESS_KEY') ?? '',
      secretKey: readString(env, 'MINIO_SECRET_KEY') ?? '',
      bucket: readString(env, 'STORAGE_BUCKET') ?? 'sites',
      region: readString(env, 'MINIO_REGION') ?? 'us-east-1',
    },
    job: {
      backoffLimit: readInt(env, 'JOB_BACKOFF_LIMIT', 3, 0),
      deadlineSeconds: readInt(env, 'JOB_DEADLINE_SECONDS', 1800, 1),
      ...(ttl !== undefined && { ttlSecondsAfterFinished: ttl }),
    },
    timing: {
      pollIntervalMs: readInt(env, 'POLL_INTERVAL_MS', 10_000, 1),
      watchRetryMs: readInt(env, 'WATCH_RETRY_MS', 5_000, 0),
      watchRestartMs: readInt(env, 'WATCH_RESTART_MS', 2_000, 0),
      eventSettleMs: readInt(env, 'EVENT_SETTLE_MS', 100, 0),
    },
    logTailLines: readInt(env, 'LOG_TAIL_LINES', 50, 1),
  };

  if (!config.storage.accessKey || !config.storage.secretKey) {
    log.warn('MINIO_ACCESS_KEY/MINIO_SECRET_KEY not set, storage cleanup is disabled');
  }

  log.info(
    {
      kind: config.kind,
      namespace: config.namespace,
      jobImage: config.jobImage,
      storageEndpoint: config.storage.endpoint,
      baseDomain: config.baseDomain,
    },
    'operator configuration loaded',
  );

  return config;
}
