import * as k8s from '@kubernetes/client-node';
import { logger } from '@forgeline/shared';

const log = logger.child({ module: 'kube' });

/**
 * In-cluster service account first, then KUBECONFIG / ~/.kube/config for
 * running the operator from a workstation.
 */
export function loadKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (process.env.KUBERNETES_SERVICE_HOST) {
    kc.loadFromCluster();
    log.info('using in-cluster kube config');
    return kc;
  }
  kc.loadFromDefault();
  log.info({ context: kc.getCurrentContext() }, 'using default kube config');
  return kc;
}

/** HTTP status of a failed API call, across client-node error shapes. */
export function apiStatusCode(err: unknown): number | undefined {
  if (err instanceof k8s.ApiException) return err.code;
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'number') return err.code;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return apiStatusCode(err) === 404;
}

export function isConflict(err: unknown): boolean {
  return apiStatusCode(err) === 409;
}
