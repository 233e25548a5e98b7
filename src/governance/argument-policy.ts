/**
 * Static argument policy for tools: path and command allow/deny globs.
 */
import os from 'os';
import path from 'path';
import picomatch from 'picomatch';
import { ToolPolicy } from '../policy/schema';

const PATH_ARGUMENTS = ['path', 'file', 'directory'] as const;

function expandHome(pattern: string, home: string): string {
  return pattern.replace(/^\$HOME(?=\/|$)/, home).replace(/^~(?=\/|$)/, home);
}

function matches(
  value: string,
  patterns: readonly string[],
  home: string,
  options: picomatch.PicomatchOptions = {},
): boolean {
  if (patterns.length === 0) return false;
  const isMatch = picomatch(
    patterns.map((pattern) => expandHome(pattern, home)),
    { dot: true, ...options },
  );
  return isMatch(value);
}

// Command lines are not paths: a single star must also cross slashes.
const COMMAND_MATCH: picomatch.PicomatchOptions = { bash: true };

function checkPath(value: string, policy: ToolPolicy, home: string): string | undefined {
  const resolved = path.resolve(expandHome(value, home));

  if (matches(resolved, policy.forbidden_paths, home)) {
    return `Path '${resolved}' matches a forbidden pattern`;
  }
  if (policy.allowed_paths.length > 0 && !matches(resolved, policy.allowed_paths, home)) {
    return `Path '${resolved}' is outside the allowed paths`;
  }
  return undefined;
}

function checkCommand(value: string, policy: ToolPolicy, home: string): string | undefined {
  const command = value.trim().replace(/\s+/g, ' ');

  if (matches(command, policy.forbidden_commands, home, COMMAND_MATCH)) {
    return `Command '${command}' matches a forbidden pattern`;
  }
  if (policy.allowed_commands.length > 0 && !matches(command, policy.allowed_commands, home, COMMAND_MATCH)) {
    return `Command '${command}' is not in the allowed commands`;
  }
  return undefined;
}

/**
 * Returns the denial reason, or undefined when the arguments are permitted.
 */
export function checkToolArguments(
  policy: ToolPolicy,
  args: Readonly<Record<string, unknown>> = {},
  home: string = os.homedir(),
): string | undefined {
  for (const name of PATH_ARGUMENTS) {
    const value = args[name];
    if (typeof value === 'string') {
      const reason = checkPath(value, policy, home);
      if (reason) return reason;
    }
  }

  const command = args.command;
  if (typeof command === 'string') {
    return checkCommand(command, policy, home);
  }
  return undefined;
}
