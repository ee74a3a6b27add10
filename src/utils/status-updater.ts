import type { Condition, ConditionStatus } from '../types/index.js';

export class StatusUpdater {
  /**
   * Returns a new condition list with `type` set. The transition time moves
   * only when the condition's status flips; reason and message are always
   * refreshed.
   */
  static updateCondition(
    conditions: Condition[],
    type: string,
    status: ConditionStatus,
    reason: string,
    message: string,
    now: Date = new Date()
  ): Condition[] {
    const existingIndex = conditions.findIndex(c => c.type === type);

    const newCondition: Condition = {
      type,
      status,
      reason,
      message,
      lastTransitionTime: now.toISOString(),
    };

    if (existingIndex === -1) {
      return [...conditions, newCondition];
    }

    const existing = conditions[existingIndex];
    if (existing.status === status) {
      newCondition.lastTransitionTime = existing.lastTransitionTime;
    }

    return [
      ...conditions.slice(0, existingIndex),
      newCondition,
      ...conditions.slice(existingIndex + 1),
    ];
  }
}
