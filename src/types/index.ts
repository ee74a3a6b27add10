// Condition types for status reporting
export type ConditionStatus = 'True' | 'False' | 'Unknown';

export interface Condition {
  type: string;
  status: ConditionStatus;
  lastTransitionTime: string;
  reason: string;
  message: string;
}

// Identity of a reconciled object
export interface ReconcileRequest {
  namespace: string;
  name: string;
}

// Controller result types
export interface ReconcileResult {
  requeue?: boolean;
  requeueAfter?: number; // milliseconds
}

// Error types
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly temporary: boolean = true,
    public readonly reason?: string
  ) {
    super(message);
    this.name = 'ReconcileError';
  }
}

/** A user-referenced object is missing, or an object we need is owned by someone else. */
export class PreconditionError extends ReconcileError {
  constructor(message: string) {
    super(message, false, 'PreconditionMissing');
    this.name = 'PreconditionError';
  }
}

/** The descriptor's spec does not validate; retried only after the user edits it. */
export class InvalidSpecError extends ReconcileError {
  constructor(message: string) {
    super(message, false, 'InvalidSpec');
    this.name = 'InvalidSpecError';
  }
}

/**
 * Source of change notifications. Each notification names the identity of
 * the descriptor to reconcile, already resolved from owned objects.
 */
export interface WatchSource {
  readonly name: string;
  start(onChange: (request: ReconcileRequest) => void): Promise<void>;
  stop(): Promise<void>;
}

// Controller interface
export interface Controller {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  getIsRunning(): boolean;
}
