/**
 * Policy CLI Commands
 *
 * Commands:
 * - policy validate <path>: Load and validate a governance policy
 * - policy constraints <path> --mode <MODE>: Print a mode's constraint set
 */
import { deriveConstraintSet } from '../control/constraint-set';
import { ALL_MODES, allowedTargets, isMode } from '../control/modes';
import { loadPolicy, policyWarnings } from '../policy/loader';
import { errorMessage } from '../utils/errors';

export interface PolicyCommandOptions {
  json?: boolean;
}

export interface ConstraintsCommandOptions extends PolicyCommandOptions {
  mode: string;
}

export type Output = (line: string) => void;

const stdout: Output = (line) => console.log(line);
const stderr: Output = (line) => console.error(line);

/**
 * Validate a policy file or directory. Returns the process exit code.
 */
export function policyValidate(
  path: string,
  options: PolicyCommandOptions = {},
  out: Output = stdout,
  err: Output = stderr,
): number {
  try {
    const policy = loadPolicy(path);
    const warnings = policyWarnings(policy);

    if (options.json) {
      out(
        JSON.stringify(
          {
            valid: true,
            transition_rules: policy.transition_rules.length,
            tools: Object.keys(policy.tools).length,
            model_roles: Object.keys(policy.model_roles).length,
            warnings,
          },
          null,
          2,
        ),
      );
      return 0;
    }

    out(`Policy at ${path} is valid`);
    out(`  transition rules: ${policy.transition_rules.length}`);
    out(`  tools: ${Object.keys(policy.tools).length}`);
    out(`  model roles: ${Object.keys(policy.model_roles).length}`);
    for (const warning of warnings) {
      out(`  warning: ${warning}`);
    }
    return 0;
  } catch (error) {
    if (options.json) {
      out(JSON.stringify({ valid: false, error: errorMessage(error) }, null, 2));
    } else {
      err(`Policy at ${path} is invalid: ${errorMessage(error)}`);
    }
    return 1;
  }
}

/**
 * Print the constraint set a policy yields for one mode.
 */
export function policyConstraints(
  path: string,
  options: ConstraintsCommandOptions,
  out: Output = stdout,
  err: Output = stderr,
): number {
  const mode = options.mode.toUpperCase();
  if (!isMode(mode)) {
    err(`Unknown mode '${options.mode}'. Expected one of: ${ALL_MODES.join(', ')}`);
    return 1;
  }

  try {
    const constraints = deriveConstraintSet(mode, loadPolicy(path));

    if (options.json) {
      out(JSON.stringify(constraints, null, 2));
      return 0;
    }

    out(`=== ${mode} ===`);
    out(`Allowed categories: ${constraints.allowedCategories.join(', ') || '(none)'}`);
    out(`Approval required for: ${constraints.approvalRequired.join(', ') || '(none)'}`);
    out(`Allowed model roles: ${constraints.allowedModelRoles.join(', ') || '(none)'}`);
    out(`Max concurrent tasks: ${constraints.concurrencyCeiling}`);
    out(`Step timeout: ${constraints.stepTimeoutMs}ms`);
    out(`Task budget: ${constraints.taskBudgetMs}ms`);
    out(`Sampling interval: ${constraints.samplingIntervalMs}ms`);
    out(`Tool calls per minute: ${constraints.toolCallsPerMinute}`);
    out(`Model calls per minute: ${constraints.modelCallsPerMinute}`);
    out(`Can transition to: ${allowedTargets(mode).join(', ')}`);
    return 0;
  } catch (error) {
    err(`Unable to load policy at ${path}: ${errorMessage(error)}`);
    return 1;
  }
}
