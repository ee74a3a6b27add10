import type { KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';
import { isDeepStrictEqual } from 'node:util';
import type { SearchDatabase } from '../apis/v1alpha1/search-database.js';
import { controllerReference } from '../builders/labels.js';
import type { EventRecorder, ResourceClient } from '../services/kube-client.js';
import { PreconditionError } from '../types/index.js';
import { logDebug, logInfo } from '../utils/logger.js';

export type SyncOutcome = 'created' | 'updated' | 'unchanged' | 'verified';

interface StepBase<T extends KubernetesObject> {
  /** Kind, for messages. */
  kind: string;
  objectName: string;
  client: ResourceClient<T>;
}

/** User-provided object: must exist, never written. */
export interface VerifyStep<T extends KubernetesObject> extends StepBase<T> {
  mode: 'verify';
}

export interface CreatedEvent {
  reason: string;
  message: string;
}

/** Created when absent, never updated afterwards. */
export interface CreateOnceStep<T extends KubernetesObject> extends StepBase<T> {
  mode: 'create-once';
  build: () => T;
  createdEvent?: CreatedEvent;
}

/** Kept equal to the desired object on its mutable fields. */
export interface ReconcileStep<T extends KubernetesObject> extends StepBase<T> {
  mode: 'reconcile';
  build: () => T;
  /** The fields the operator owns; compared desired against live. */
  project: (obj: T) => unknown;
  /** Live object with the desired mutable fields copied in. */
  apply: (live: T, desired: T) => T;
  /** `exact` for maps that must not carry extra keys, such as ConfigMap data. */
  compare?: 'subset' | 'exact';
  createdEvent?: CreatedEvent;
}

export type SyncStep<T extends KubernetesObject> = VerifyStep<T> | CreateOnceStep<T> | ReconcileStep<T>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * True when `desired` is contained in `live`. Undefined desired values match
 * anything; empty desired lists and maps also match an absent live field;
 * lists must have the same length and match element-wise. Numbers and
 * strings compare by their string form, as the API server may return either
 * for int-or-string fields.
 */
export function isSubset(desired: unknown, live: unknown): boolean {
  if (desired === undefined) return true;
  if (Array.isArray(desired)) {
    if (live === undefined || live === null) return desired.length === 0;
    if (!Array.isArray(live) || live.length !== desired.length) return false;
    return desired.every((item, index) => isSubset(item, live[index]));
  }
  if (isPlainObject(desired)) {
    const keys = Object.keys(desired).filter((key) => desired[key] !== undefined);
    if (live === undefined || live === null) return keys.length === 0;
    if (!isPlainObject(live)) return false;
    return keys.every((key) => isSubset(desired[key], live[key]));
  }
  if (desired instanceof Date) {
    return live instanceof Date ? desired.getTime() === live.getTime() : desired.toISOString() === live;
  }
  if ((typeof desired === 'number' && typeof live === 'string') || (typeof desired === 'string' && typeof live === 'number')) {
    return String(desired) === String(live);
  }
  return desired === live;
}

function controllerOf(metadata: V1ObjectMeta | undefined): string | undefined {
  return metadata?.ownerReferences?.find((ref) => ref.controller === true)?.uid;
}

function withOwner<T extends KubernetesObject>(obj: T, db: SearchDatabase): T {
  const metadata = obj.metadata ?? {};
  const others = (metadata.ownerReferences ?? []).filter((ref) => ref.uid !== db.metadata.uid);
  return { ...obj, metadata: { ...metadata, ownerReferences: [...others, controllerReference(db)] } };
}

/**
 * Ensures one owned object exists and matches its desired state. Every step
 * reads first and writes only on absence or difference, so a second pass over
 * an unchanged world issues no writes.
 */
export class ResourceSyncer {
  constructor(private readonly recorder: EventRecorder) {}

  async sync<T extends KubernetesObject>(db: SearchDatabase, step: SyncStep<T>, signal: AbortSignal): Promise<SyncOutcome> {
    const { namespace } = db.metadata;
    const ref = `${step.kind} ${namespace}/${step.objectName}`;

    signal.throwIfAborted();
    const live = await step.client.get(namespace, step.objectName);
    signal.throwIfAborted();

    if (step.mode === 'verify') {
      if (!live) {
        throw new PreconditionError(`${ref} not found`);
      }
      return 'verified';
    }

    if (!live) {
      await step.client.create(namespace, withOwner(step.build(), db));
      logInfo(`Created ${ref}`, { namespace, name: db.metadata.name });
      if (step.createdEvent) {
        await this.recorder.record(db, 'Normal', step.createdEvent.reason, step.createdEvent.message);
      }
      return 'created';
    }

    const owner = controllerOf(live.metadata);
    if (owner !== undefined && owner !== db.metadata.uid) {
      throw new PreconditionError(`${ref} is controlled by another owner`);
    }

    if (step.mode === 'create-once') {
      return 'unchanged';
    }

    const desired = step.build();
    const wanted = step.project(desired);
    const actual = step.project(live);
    const same = step.compare === 'exact' ? isDeepStrictEqual(wanted, actual) : isSubset(wanted, actual);
    if (same && owner !== undefined) {
      return 'unchanged';
    }

    // Adopts unowned objects of the same name
    await step.client.replace(namespace, step.objectName, withOwner(step.apply(live, desired), db));
    logDebug(`Updated ${ref}`, { namespace, name: db.metadata.name });
    return 'updated';
  }
}
