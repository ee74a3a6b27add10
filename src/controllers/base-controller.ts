import type { Controller, ReconcileRequest, ReconcileResult, WatchSource } from '../types/index.js';
import { formatKubeError } from '../utils/kube-errors.js';
import { logDebug, logError, logInfo } from '../utils/logger.js';
import { WorkQueue } from './work-queue.js';

export interface ControllerOptions {
  name: string;
  maxConcurrentReconciles: number;
  /** Deadline for one reconciliation pass. */
  reconcileTimeoutMs: number;
  /** Delay before retrying a pass that threw. */
  requeueAfterErrorMs: number;
}

export function requestKeyOf(request: ReconcileRequest): string {
  return `${request.namespace}/${request.name}`;
}

export abstract class BaseController implements Controller {
  readonly name: string;
  protected readonly options: ControllerOptions;
  protected queue?: WorkQueue<ReconcileRequest>;
  protected isRunning = false;
  private shutdown?: AbortController;
  private workers: Promise<void>[] = [];

  constructor(
    options: ControllerOptions,
    private readonly sources: WatchSource[],
  ) {
    this.name = options.name;
    this.options = options;
  }

  public async start(): Promise<void> {
    if (this.isRunning) {
      logInfo(`Controller ${this.name} is already running`);
      return;
    }

    logInfo(`Starting controller ${this.name}...`, { workers: this.options.maxConcurrentReconciles });
    this.isRunning = true;
    this.shutdown = new AbortController();
    const queue = new WorkQueue<ReconcileRequest>(requestKeyOf);
    this.queue = queue;

    for (const source of this.sources) {
      await source.start((request) => queue.add(request));
    }

    this.workers = Array.from({ length: this.options.maxConcurrentReconciles }, () => this.runWorker(queue));
  }

  public async stop(): Promise<void> {
    if (!this.isRunning) return;
    logInfo(`Stopping controller ${this.name}...`);
    this.isRunning = false;
    this.shutdown?.abort();

    await Promise.all(this.sources.map((source) => source.stop()));
    this.queue?.shutDown();
    await Promise.all(this.workers);
    this.workers = [];
    this.queue = undefined;
  }

  public getIsRunning(): boolean {
    return this.isRunning;
  }

  /** Queue a pass for `request`, now or after `afterMs`. */
  public enqueue(request: ReconcileRequest, afterMs = 0): void {
    this.queue?.addAfter(request, afterMs);
  }

  protected abstract reconcile(request: ReconcileRequest, signal: AbortSignal): Promise<ReconcileResult>;

  private async runWorker(queue: WorkQueue<ReconcileRequest>): Promise<void> {
    for (;;) {
      const request = await queue.get();
      if (!request) return;
      try {
        await this.processRequest(queue, request);
      } finally {
        queue.done(request);
      }
    }
  }

  private async processRequest(queue: WorkQueue<ReconcileRequest>, request: ReconcileRequest): Promise<void> {
    const key = requestKeyOf(request);
    const signals = [AbortSignal.timeout(this.options.reconcileTimeoutMs)];
    if (this.shutdown) signals.push(this.shutdown.signal);
    const signal = AbortSignal.any(signals);

    try {
      logDebug(`Reconciling ${key}`, { namespace: request.namespace, name: request.name });
      const result = await this.reconcile(request, signal);

      if (result.requeueAfter && result.requeueAfter > 0) {
        logDebug(`Requeueing ${key} after ${result.requeueAfter}ms`);
        queue.addAfter(request, result.requeueAfter);
      } else if (result.requeue) {
        queue.add(request);
      }
    } catch (error) {
      if (!this.isRunning) {
        logDebug(`Pass for ${key} interrupted by shutdown`);
        return;
      }
      logError(`Error reconciling ${key}`, error, {
        namespace: request.namespace,
        name: request.name,
        detail: formatKubeError(error),
      });
      queue.addAfter(request, this.options.requeueAfterErrorMs);
    }
  }
}
