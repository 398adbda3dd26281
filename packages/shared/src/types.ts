// --- Desired-state resources ---

/** Phases the controller writes onto `status.phase`. An empty string means "never reconciled". */
export type ResourcePhase =
  | ''
  | 'Pending'
  | 'Building'
  | 'Running'
  | 'Ready'
  | 'Completed'
  | 'Failed'
  | 'Deleting';

/** Status sub-document. Only the controller writes it. */
export interface ResourceStatus {
  phase?: string;
  message?: string;
  jobName?: string;
  url?: string;
  finalOutput?: string;
  lastBuildTime?: string;
  startTime?: string;
  completionTime?: string;
  [key: string]: unknown;
}

/** Fields the controller may merge into `status`. */
export type StatusPatch = Partial<Record<keyof ResourceStatus & string, string>>;

export interface ResourceMetadata {
  name: string;
  namespace?: string;
  uid?: string;
  resourceVersion?: string;
  [key: string]: unknown;
}

/**
 * A user-authored custom resource as returned by the API server.
 * `spec` stays opaque until a controller profile decodes it.
 */
export interface DesiredStateObject {
  apiVersion?: string;
  kind?: string;
  metadata: ResourceMetadata;
  spec?: Record<string, unknown>;
  status?: ResourceStatus;
  [key: string]: unknown;
}

export interface ResourceGroupVersion {
  group: string;
  version: string;
  plural: string;
}

// --- Phase helpers ---

/**
 * True when the controller should drive new work for this phase:
 * absent, empty or Pending.
 */
export function isPendingPhase(phase: string | undefined): boolean {
  return phase === undefined || phase === '' || phase === 'Pending';
}
