import * as k8s from '@kubernetes/client-node';
import { logger } from '@forgeline/shared';
import { loadConfig, type OperatorConfig } from './config.js';
import { createController } from './controller.js';
import { KubeWatchSource, watchPath } from './event-watcher.js';
import { KubeJobRunner } from './job-runner.js';
import { loadKubeConfig } from './kube.js';
import { researchSessionProfile, staticSiteProfile, type ControllerProfile } from './profiles.js';
import { KubeStatusStore } from './status-store.js';
import { createStorageCleaner } from './storage-cleanup.js';

const log = logger.child({ module: 'operator' });

async function runOperator<TSpec>(
  profile: ControllerProfile<TSpec>,
  config: OperatorConfig,
  kc: k8s.KubeConfig,
  signal: AbortSignal,
): Promise<void> {
  const store = new KubeStatusStore(kc.makeApiClient(k8s.CustomObjectsApi), profile.resource, config.namespace);
  const jobs = new KubeJobRunner(kc.makeApiClient(k8s.BatchV1Api), kc.makeApiClient(k8s.CoreV1Api), config.namespace);
  const watchSource = new KubeWatchSource(kc, watchPath(profile.resource, config.namespace));
  const cleaner = profile.cleansStorage ? createStorageCleaner(config.storage) : undefined;

  const { controller } = createController(profile, config, { store, jobs, watchSource, cleaner });

  log.info(
    { kind: profile.kind, namespace: config.namespace, image: config.jobImage },
    `${profile.kind} operator starting`,
  );
  await controller.run(signal);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const kc = loadKubeConfig();
  const abort = new AbortController();

  // No graceful drain: monitors are re-derived from the store on restart.
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      log.info({ signal }, 'shutting down');
      abort.abort();
      process.exit(0);
    });
  }

  if (config.kind === 'staticsite') {
    await runOperator(staticSiteProfile, config, kc, abort.signal);
  } else {
    await runOperator(researchSessionProfile, config, kc, abort.signal);
  }
}

main().catch((err) => {
  log.error({ err }, 'fatal startup error');
  process.exit(1);
});
