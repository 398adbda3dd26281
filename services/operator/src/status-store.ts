import type * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { logger, type DesiredStateObject, type ResourceGroupVersion, type StatusPatch } from '@forgeline/shared';
import { isConflict, isNotFound } from './kube.js';
import { parseResourceObject } from './resource-spec.js';

const log = logger.child({ module: 'status-store' });

const MAX_CONFLICT_RETRIES = 3;

export type CustomObjectsClient = Pick<
  k8s.CustomObjectsApi,
  'getNamespacedCustomObject' | 'listNamespacedCustomObject' | 'replaceNamespacedCustomObjectStatus'
>;

export type StatusUpdateResult = 'updated' | 'not-found' | 'precondition-failed';

export interface StatusUpdateOptions {
  /**
   * Guard evaluated against the freshly read phase. When it returns false the
   * write is skipped and `precondition-failed` is returned.
   */
  expectPhase?: (phase: string | undefined) => boolean;
}

/**
 * Access to the desired-state objects and their controller-owned status.
 * `undefined` and `not-found` mean the object was deleted, which is an
 * expected outcome rather than an error.
 */
export interface StatusStore {
  get(name: string): Promise<DesiredStateObject | undefined>;
  list(): Promise<DesiredStateObject[]>;
  updateStatus(name: string, patch: StatusPatch, options?: StatusUpdateOptions): Promise<StatusUpdateResult>;
}

const listSchema = z.object({ items: z.array(z.unknown()).default([]) });

export class KubeStatusStore implements StatusStore {
  constructor(
    private readonly api: CustomObjectsClient,
    private readonly resource: ResourceGroupVersion,
    private readonly namespace: string,
  ) {}

  private target() {
    return {
      group: this.resource.group,
      version: this.resource.version,
      plural: this.resource.plural,
      namespace: this.namespace,
    };
  }

  async get(name: string): Promise<DesiredStateObject | undefined> {
    try {
      const raw: unknown = await this.api.getNamespacedCustomObject({ ...this.target(), name });
      return parseResourceObject(raw);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async list(): Promise<DesiredStateObject[]> {
    const raw: unknown = await this.api.listNamespacedCustomObject(this.target());
    const parsed = listSchema.safeParse(raw);
    if (!parsed.success) return [];
    const objects: DesiredStateObject[] = [];
    for (const item of parsed.data.items) {
      const obj = parseResourceObject(item);
      if (obj) objects.push(obj);
    }
    return objects;
  }

  /**
   * Read-modify-write: re-fetch the object, merge the patch into its status
   * and write it back with the fetched resourceVersion. A 409 means someone
   * else wrote in between, so the merge is redone from a fresh read.
   */
  async updateStatus(
    name: string,
    patch: StatusPatch,
    options: StatusUpdateOptions = {},
  ): Promise<StatusUpdateResult> {
    for (let attempt = 1; attempt <= MAX_CONFLICT_RETRIES; attempt++) {
      const current = await this.get(name);
      if (!current) {
        log.info({ name }, 'object no longer exists, skipping status update');
        return 'not-found';
      }

      if (options.expectPhase && !options.expectPhase(current.status?.phase)) {
        log.debug({ name, phase: current.status?.phase }, 'status precondition no longer holds');
        return 'precondition-failed';
      }

      const body: DesiredStateObject = {
        ...current,
        status: { ...current.status, ...patch },
      };

      try {
        await this.api.replaceNamespacedCustomObjectStatus({ ...this.target(), name, body });
        log.debug({ name, phase: body.status?.phase }, 'status updated');
        return 'updated';
      } catch (err) {
        if (isNotFound(err)) {
          log.info({ name }, 'object deleted during status update, skipping');
          return 'not-found';
        }
        if (isConflict(err)) {
          log.debug({ name, attempt }, 'status update conflicted, retrying from a fresh read');
          continue;
        }
        throw err;
      }
    }
    throw new Error(`Status update for ${name} conflicted ${MAX_CONFLICT_RETRIES} times`);
  }
}
