/**
 * Shared test fixtures: the shipped governance policy, with overrides.
 */
import { join } from 'path';
import { ALL_MODES, Mode } from '../control/modes';
import { loadPolicy, parsePolicy } from '../policy/loader';
import { GovernancePolicy, ModeDefinition } from '../policy/schema';

export const POLICY_DIR = join(__dirname, '..', '..', 'config', 'governance');

export function loadTestPolicy(): GovernancePolicy {
  return loadPolicy(POLICY_DIR);
}

export interface PolicyChanges {
  modes?: Partial<Record<Mode, Partial<ModeDefinition>>>;
  transition_rules?: unknown[];
  tools?: Record<string, unknown>;
  approval?: { timeout_seconds: number };
}

export function policyWith(changes: PolicyChanges): GovernancePolicy {
  const base = loadTestPolicy();
  const modes: Record<string, unknown> = {};
  for (const mode of ALL_MODES) {
    modes[mode] = { ...base.modes[mode], ...changes.modes?.[mode] };
  }

  return parsePolicy(
    {
      ...base,
      modes,
      transition_rules: changes.transition_rules ?? base.transition_rules,
      tools: changes.tools ? { ...base.tools, ...changes.tools } : base.tools,
      approval: changes.approval ?? base.approval,
    },
    'test',
  );
}

/**
 * Let pending promise callbacks run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
