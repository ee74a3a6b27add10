import {
  CONDITION_DEGRADED,
  isBackupEnabled,
  isConnectionPoolingEnabled,
  isMonitoringEnabled,
  names,
  resolveSpec,
  type SearchDatabase,
  type SearchDatabaseObject,
} from '../apis/v1alpha1/search-database.js';
import { FinalizerManager } from '../reconcilers/finalizer-manager.js';
import { ResourceSyncer } from '../reconcilers/resource-syncer.js';
import { StatusAggregator, writeStatusIfChanged } from '../reconcilers/status-aggregator.js';
import { buildSyncPlan } from '../reconcilers/sync-plan.js';
import type { EventRecorder, KubeClient } from '../services/kube-client.js';
import { ReconcileError, type ReconcileRequest, type ReconcileResult, type WatchSource } from '../types/index.js';
import { formatKubeError } from '../utils/kube-errors.js';
import { databaseLogger, logError } from '../utils/logger.js';
import { StatusUpdater } from '../utils/status-updater.js';
import { BaseController, type ControllerOptions } from './base-controller.js';

export interface SearchDatabaseControllerOptions extends ControllerOptions {
  clusterDomain: string;
  uploaderImage: string;
  requeueAfterSuccessMs: number;
}

/**
 * Drives every SearchDatabase toward its spec: finalizer, phase
 * initialisation, the ordered sync plan, then status aggregation.
 */
export class SearchDatabaseController extends BaseController {
  private readonly syncer: ResourceSyncer;
  private readonly finalizers: FinalizerManager;
  private readonly aggregator: StatusAggregator;

  constructor(
    private readonly client: KubeClient,
    private readonly recorder: EventRecorder,
    sources: WatchSource[],
    private readonly settings: SearchDatabaseControllerOptions,
  ) {
    super(settings, sources);
    this.syncer = new ResourceSyncer(recorder);
    this.finalizers = new FinalizerManager(client.databases, recorder);
    this.aggregator = new StatusAggregator(client, settings.clusterDomain);
  }

  public async reconcile(
    request: ReconcileRequest,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<ReconcileResult> {
    const { namespace, name } = request;
    const log = databaseLogger(namespace, name);

    const db = await this.client.databases.get(namespace, name);
    if (!db) {
      log.debug('SearchDatabase not found, skipping reconciliation');
      return {};
    }
    signal.throwIfAborted();

    if (db.metadata.deletionTimestamp) {
      await this.finalizers.finalize(db, signal);
      return {};
    }

    if (await this.finalizers.ensure(db)) {
      return { requeue: true };
    }

    if (!db.status?.phase) {
      await writeStatusIfChanged(this.client.databases, db, { ...db.status, phase: 'Pending' });
      return { requeue: true };
    }

    let current: SearchDatabase;
    try {
      current = resolveSpec(db);
    } catch (error) {
      return this.handleSyncFailure(db, 'Invalid SearchDatabase spec', error);
    }

    if (db.status.phase === 'Pending') {
      signal.throwIfAborted();
      current = await writeStatusIfChanged(this.client.databases, current, { ...db.status, phase: 'Creating' });
      await this.recorder.record(current, 'Normal', 'Creating', `Creating SearchDatabase ${name}`);
      log.info('SearchDatabase entering Creating');
    }

    const plan = buildSyncPlan(current, this.client, {
      clusterDomain: this.settings.clusterDomain,
      uploaderImage: this.settings.uploaderImage,
    });
    for (const step of plan) {
      try {
        await step.execute(this.syncer, signal);
      } catch (error) {
        if (signal.aborted) throw error;
        return this.handleSyncFailure(current, step.message, error);
      }
    }

    await this.aggregator.aggregate(current, signal);
    await this.reportRetained(current);
    return { requeueAfter: this.settings.requeueAfterSuccessMs };
  }

  /**
   * The single failure path: phase Failed, Degraded=True and a Warning event,
   * all carrying the error's reason. Problems only the user can fix are
   * logged as warnings.
   */
  private async handleSyncFailure(db: SearchDatabaseObject, stepMessage: string, error: unknown): Promise<ReconcileResult> {
    const { namespace, name } = db.metadata;
    const message = `${stepMessage}: ${formatKubeError(error)}`;
    const reason = error instanceof ReconcileError && error.reason ? error.reason : 'ReconciliationFailed';
    if (error instanceof ReconcileError && !error.temporary) {
      databaseLogger(namespace, name).warn(message, { reason });
    } else {
      logError(`Reconciliation of ${namespace}/${name} failed`, error, { namespace, name, step: stepMessage });
    }

    const conditions = StatusUpdater.updateCondition(db.status?.conditions ?? [], CONDITION_DEGRADED, 'True', reason, message);
    await writeStatusIfChanged(this.client.databases, db, { ...db.status, phase: 'Failed', message, conditions });
    await this.recorder.record(db, 'Warning', reason, message);

    return { requeueAfter: this.options.requeueAfterErrorMs };
  }

  /** Disabled tiers keep the objects they created; say so. */
  private async reportRetained(db: SearchDatabase): Promise<void> {
    const { namespace, name } = db.metadata;
    const retained: string[] = [];

    if (!isConnectionPoolingEnabled(db) && (await this.client.deployments.get(namespace, names.poolerDeployment(db)))) {
      retained.push(`Deployment/${names.poolerDeployment(db)}`);
    }
    if (!isMonitoringEnabled(db) && (await this.client.services.get(namespace, names.metricsService(db)))) {
      retained.push(`Service/${names.metricsService(db)}`);
    }
    if (!isBackupEnabled(db) && (await this.client.cronJobs.get(namespace, names.backupCronJob(db)))) {
      retained.push(`CronJob/${names.backupCronJob(db)}`);
    }

    if (retained.length > 0) {
      databaseLogger(namespace, name).warn('Disabled components still have objects; they are removed with the SearchDatabase', {
        retained,
      });
    }
  }
}
