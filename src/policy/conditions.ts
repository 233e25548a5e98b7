/**
 * Comparator evaluation shared by the mode controller (transition rules) and
 * the sampler (threshold crossings that become control signals).
 */
import { Comparator, GovernancePolicy } from './schema';

export function compare(value: number, operator: Comparator, threshold: number): boolean {
  switch (operator) {
    case '>':
      return value > threshold;
    case '<':
      return value < threshold;
    case '>=':
      return value >= threshold;
    case '<=':
      return value <= threshold;
    case '==':
      return value === threshold;
    case '!=':
      return value !== threshold;
  }
}

/**
 * A metric threshold watched by the sampler.
 */
export interface SignalThreshold {
  /** Signal name, e.g. `cpu_load>85` */
  name: string;
  metric: string;
  operator: Comparator;
  value: number;
}

/**
 * One watch per distinct condition across all transition rules.
 */
export function deriveSignalThresholds(policy: GovernancePolicy): SignalThreshold[] {
  const thresholds = new Map<string, SignalThreshold>();
  for (const rule of policy.transition_rules) {
    for (const condition of rule.conditions) {
      const name = `${condition.metric}${condition.operator}${condition.value}`;
      if (!thresholds.has(name)) {
        thresholds.set(name, {
          name,
          metric: condition.metric,
          operator: condition.operator,
          value: condition.value,
        });
      }
    }
  }
  return [...thresholds.values()];
}
