/**
 * Governor Metrics Module
 *
 * Prometheus metrics for:
 * - Governance decisions and rate-limit hits
 * - Step durations and task outcomes
 * - Active mode and mode transitions
 * - Collector failures and pending approvals
 */

import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

// Dedicated registry for governor metrics
export const metricsRegistry = new Registry();

let defaultMetricsRegistered = false;

/**
 * Register process-level default metrics once (called when the server starts)
 */
export function registerDefaultMetrics(): void {
  if (defaultMetricsRegistered) return;
  collectDefaultMetrics({ register: metricsRegistry });
  defaultMetricsRegistered = true;
}

/**
 * Governance decision counter
 */
export const governanceDecisions = new Counter({
  name: 'governor_decisions_total',
  help: 'Total governance gate decisions',
  labelNames: ['outcome', 'category', 'mode'],
  registers: [metricsRegistry],
});

/**
 * Rate limit hits counter
 */
export const rateLimitHits = new Counter({
  name: 'governor_rate_limit_hits_total',
  help: 'Total capability requests refused by a rate limit',
  labelNames: ['key', 'mode'],
  registers: [metricsRegistry],
});

/**
 * Step duration histogram
 */
export const stepDuration = new Histogram({
  name: 'governor_step_duration_ms',
  help: 'State machine step duration in milliseconds',
  labelNames: ['state', 'outcome'],
  buckets: [5, 25, 100, 250, 1000, 2500, 5000, 15000, 60000],
  registers: [metricsRegistry],
});

/**
 * Task outcome counter
 */
export const taskOutcomes = new Counter({
  name: 'governor_tasks_total',
  help: 'Total finished tasks by terminal state and error code',
  labelNames: ['state', 'error_code'],
  registers: [metricsRegistry],
});

/**
 * Active mode gauge (1 for the active mode, 0 otherwise)
 */
export const activeMode = new Gauge({
  name: 'governor_active_mode',
  help: 'Currently active operating mode',
  labelNames: ['mode'],
  registers: [metricsRegistry],
});

/**
 * Mode transition counter
 */
export const modeTransitions = new Counter({
  name: 'governor_mode_transitions_total',
  help: 'Total mode transitions',
  labelNames: ['from', 'to'],
  registers: [metricsRegistry],
});

/**
 * Collector failure counter
 */
export const collectorFailures = new Counter({
  name: 'governor_collector_failures_total',
  help: 'Total metric collector failures (errors and timeouts)',
  labelNames: ['collector'],
  registers: [metricsRegistry],
});

/**
 * Pending approvals gauge
 */
export const pendingApprovals = new Gauge({
  name: 'governor_pending_approvals',
  help: 'Approval requests awaiting a decision',
  labelNames: ['kind'],
  registers: [metricsRegistry],
});

export function recordDecision(outcome: string, category: string, mode: string): void {
  governanceDecisions.inc({ outcome, category, mode });
}

export function recordRateLimitHit(key: string, mode: string): void {
  rateLimitHits.inc({ key, mode });
}

export function recordStepDuration(state: string, outcome: string, durationMs: number): void {
  stepDuration.observe({ state, outcome }, durationMs);
}

export function recordTaskOutcome(state: string, errorCode?: string): void {
  taskOutcomes.inc({ state, error_code: errorCode ?? 'none' });
}

export function recordActiveMode(mode: string, allModes: readonly string[]): void {
  for (const candidate of allModes) {
    activeMode.set({ mode: candidate }, candidate === mode ? 1 : 0);
  }
}

export function recordModeTransition(from: string, to: string): void {
  modeTransitions.inc({ from, to });
}

export function recordCollectorFailure(collector: string): void {
  collectorFailures.inc({ collector });
}

export function recordPendingApprovals(kind: string, count: number): void {
  pendingApprovals.set({ kind }, count);
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}
