#!/usr/bin/env node
/**
 * Agent Governor CLI
 *
 * Commands:
 * - policy validate <path>
 * - policy constraints <path> --mode <MODE>
 * - serve [--port <port>] [--policy <path>]
 */
import { Command } from 'commander';
import { policyConstraints, policyValidate } from './commands/policy';
import { serve } from './commands/serve';
import { loadConfig } from './utils/config';
import { errorMessage } from './utils/errors';

export function buildProgram(): Command {
  const program = new Command();
  program.name('governor').description('Governed task-execution engine').version('0.1.0');

  const policy = new Command('policy').description('Inspect governance policies');

  policy
    .command('validate')
    .description('Load and validate a policy file or directory')
    .argument('<path>', 'Policy file or directory')
    .option('--json', 'Print machine-readable output')
    .action((path: string, options: { json?: boolean }) => {
      process.exitCode = policyValidate(path, options);
    });

  policy
    .command('constraints')
    .description("Print a mode's constraint set")
    .argument('<path>', 'Policy file or directory')
    .requiredOption('-m, --mode <mode>', 'Mode (NORMAL, ALERT, DEGRADED, LOCKDOWN, RECOVERY)')
    .option('--json', 'Print machine-readable output')
    .action((path: string, options: { mode: string; json?: boolean }) => {
      process.exitCode = policyConstraints(path, options);
    });

  program.addCommand(policy);

  program
    .command('serve')
    .description('Run the governor with its HTTP control surface')
    .option('-p, --port <port>', 'Port to listen on (default: PORT)')
    .option('--policy <path>', 'Policy file or directory (default: GOVERNANCE_POLICY_PATH)')
    .action(async (options: { port?: string; policy?: string }) => {
      await serve(loadConfig(), options);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exit(1);
    });
}
