import type { SearchDatabaseObject } from '../apis/v1alpha1/search-database.js';
import type { DatabaseClient, EventRecorder } from '../services/kube-client.js';
import { databaseLogger } from '../utils/logger.js';
import { writeStatusIfChanged } from './status-aggregator.js';

export const FINALIZER = 'searchdb.io/finalizer';

export function hasFinalizer(db: SearchDatabaseObject): boolean {
  return db.metadata.finalizers?.includes(FINALIZER) ?? false;
}

export class FinalizerManager {
  constructor(
    private readonly databases: DatabaseClient,
    private readonly recorder: EventRecorder,
  ) {}

  /** Adds the finalizer. Returns false when it was already present. */
  async ensure(db: SearchDatabaseObject): Promise<boolean> {
    if (hasFinalizer(db)) return false;
    const { namespace, name } = db.metadata;
    databaseLogger(namespace, name).info('Adding finalizer');
    await this.databases.patchFinalizers(db, [...(db.metadata.finalizers ?? []), FINALIZER]);
    return true;
  }

  /**
   * Delete intent: mark the descriptor Deleting, run cleanup, then release
   * it. Owned objects are left to the garbage collector. Any failure
   * propagates before the finalizer is removed.
   */
  async finalize(db: SearchDatabaseObject, signal: AbortSignal): Promise<void> {
    if (!hasFinalizer(db)) return;
    const { namespace, name } = db.metadata;
    const log = databaseLogger(namespace, name);
    log.info('Finalizing');

    signal.throwIfAborted();
    const deleting = await writeStatusIfChanged(this.databases, db, { ...db.status, phase: 'Deleting' });

    signal.throwIfAborted();
    await this.cleanup(deleting);

    signal.throwIfAborted();
    await this.databases.patchFinalizers(
      deleting,
      (deleting.metadata.finalizers ?? []).filter((finalizer) => finalizer !== FINALIZER),
    );
    log.info('Finalizer removed');
  }

  private async cleanup(db: SearchDatabaseObject): Promise<void> {
    await this.recorder.record(db, 'Normal', 'Deleted', `SearchDatabase ${db.metadata.name} deleted`);
  }
}
