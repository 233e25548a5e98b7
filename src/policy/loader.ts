/**
 * Governance Policy Loader
 *
 * Reads the policy documents (YAML or JSON), validates them against the
 * schema and returns a deeply frozen GovernancePolicy. Every failure is a
 * PolicyError: the caller is expected to refuse to start.
 */
import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { isTransitionAllowed } from '../control/modes';
import { GovernancePolicy, GovernancePolicySchema } from './schema';
import { PolicyError } from './errors';

/**
 * Files read when the policy path is a directory.
 * `approval.yaml` is optional; the others are required.
 */
export const POLICY_FILES = {
  modes: 'modes.yaml',
  transitions: 'transitions.yaml',
  capabilities: 'capabilities.yaml',
  approval: 'approval.yaml',
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(' -> ') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate already-parsed policy data.
 */
export function parsePolicy(data: unknown, source = 'inline'): GovernancePolicy {
  const result = GovernancePolicySchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new PolicyError(`Governance policy validation failed (${source}):\n${issues.join('\n')}`, {
      source,
      issues,
    });
  }

  const policy = deepFreeze(result.data);
  for (const warning of policyWarnings(policy)) {
    logger.warn({ source, warning }, 'Governance policy warning');
  }
  return policy;
}

/**
 * Non-fatal inconsistencies: rules that can never take effect.
 */
export function policyWarnings(policy: GovernancePolicy): string[] {
  const warnings: string[] = [];
  for (const rule of policy.transition_rules) {
    if (!isTransitionAllowed(rule.from, rule.to)) {
      warnings.push(`transition rule '${rule.name}' targets unreachable edge ${rule.from} -> ${rule.to}`);
    }
  }
  return warnings;
}

function readDocument(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new PolicyError(`Unable to read policy document ${path}: ${errorMessage(error)}`);
  }

  try {
    return yaml.load(content, { filename: path });
  } catch (error) {
    throw new PolicyError(`Unable to parse policy document ${path}: ${errorMessage(error)}`);
  }
}

function readSection(path: string, required: boolean): Record<string, unknown> {
  if (!existsSync(path)) {
    if (required) {
      throw new PolicyError(`Required policy document is missing: ${path}`);
    }
    return {};
  }

  const document = readDocument(path);
  if (document === undefined || document === null) {
    return {};
  }
  if (!isRecord(document)) {
    throw new PolicyError(`Policy document ${path} must contain a mapping at the top level`);
  }
  return document;
}

/**
 * Load a single document holding every policy section.
 */
export function loadPolicyFromFile(path: string): GovernancePolicy {
  const document = readSection(path, true);
  return parsePolicy(document, path);
}

/**
 * Load a policy directory (modes, transitions, capabilities, approval).
 */
export function loadPolicyFromDirectory(dir: string): GovernancePolicy {
  const modes = readSection(join(dir, POLICY_FILES.modes), true);
  const transitions = readSection(join(dir, POLICY_FILES.transitions), true);
  const capabilities = readSection(join(dir, POLICY_FILES.capabilities), true);
  const approval = readSection(join(dir, POLICY_FILES.approval), false);

  const merged: Record<string, unknown> = {
    modes: modes.modes,
    transition_rules: transitions.transition_rules,
    tools: capabilities.tools,
    model_roles: capabilities.model_roles,
    approval: approval.approval,
  };

  logger.info({ dir }, 'Loading governance policy');
  return parsePolicy(merged, dir);
}

/**
 * Load a policy from a file or a directory.
 */
export function loadPolicy(path: string): GovernancePolicy {
  if (!existsSync(path)) {
    throw new PolicyError(`Governance policy path does not exist: ${path}`);
  }

  const policy = statSync(path).isDirectory()
    ? loadPolicyFromDirectory(path)
    : loadPolicyFromFile(path);

  logger.info(
    {
      path,
      transition_rules: policy.transition_rules.length,
      tools: Object.keys(policy.tools).length,
      model_roles: Object.keys(policy.model_roles).length,
    },
    'Governance policy loaded',
  );
  return policy;
}
