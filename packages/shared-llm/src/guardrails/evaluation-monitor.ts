/**
 * FILE PURPOSE: Count guardrail outcomes to surface silent degradation
 *
 * WHY: Failing open keeps chat available when the assessor is down, but it
 *      also hides the outage from operators. If half of all evaluations
 *      degrade, responses are effectively unscreened.
 * HOW: Counters per action plus a degraded counter. Alert levels on the
 *      degraded rate: 10% warn, 30% page, 50% rollback.
 */

import type { GuardrailAction } from './types.js';

export interface DegradationEvent {
  reason: string;
  timestamp: number;
}

export interface EvaluationStats {
  total: number;
  byAction: Record<GuardrailAction, number>;
  degradedCount: number;
  degradedRate: number;
  recentDegradations: DegradationEvent[];
}

export type AlertLevel = 'ok' | 'warn' | 'page' | 'rollback';

/**
 * EXAMPLE:
 * ```typescript
 * const monitor = new EvaluationMonitor();
 * const guardrail = new ResponseGuardrail({ client, config, monitor });
 * // ...
 * if (monitor.getAlertLevel() !== 'ok') alertOnCall(monitor.getStats());
 * ```
 */
export class EvaluationMonitor {
  private readonly byAction: Record<GuardrailAction, number> = { allow: 0, warn: 0, block: 0, log: 0 };
  private degradedCount = 0;
  private recent: DegradationEvent[] = [];
  private readonly maxRecentEvents: number;

  constructor(maxRecentEvents = 50) {
    this.maxRecentEvents = maxRecentEvents;
  }

  /** Record a completed evaluation and the action enforced for it. */
  recordEvaluation(action: GuardrailAction): void {
    this.byAction[action]++;
  }

  /** Record an evaluation that failed open. */
  recordDegraded(reason: string): void {
    this.byAction.log++;
    this.degradedCount++;
    this.recent.push({ reason, timestamp: Date.now() });
    if (this.recent.length > this.maxRecentEvents) this.recent.shift();
  }

  private total(): number {
    return this.byAction.allow + this.byAction.warn + this.byAction.block + this.byAction.log;
  }

  getDegradedRate(): number {
    const total = this.total();
    return total > 0 ? this.degradedCount / total : 0;
  }

  getStats(): EvaluationStats {
    return {
      total: this.total(),
      byAction: { ...this.byAction },
      degradedCount: this.degradedCount,
      degradedRate: this.getDegradedRate(),
      recentDegradations: [...this.recent],
    };
  }

  getAlertLevel(): AlertLevel {
    const rate = this.getDegradedRate();
    if (rate >= 0.5) return 'rollback';
    if (rate >= 0.3) return 'page';
    if (rate >= 0.1) return 'warn';
    return 'ok';
  }

  reset(): void {
    this.byAction.allow = 0;
    this.byAction.warn = 0;
    this.byAction.block = 0;
    this.byAction.log = 0;
    this.degradedCount = 0;
    this.recent = [];
  }
}
