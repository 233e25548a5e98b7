import { GovernorError } from '../utils/errors';

/**
 * Thrown when the governance policy is missing, unparseable or invalid.
 * Fatal at startup: the governor never runs with an undefined mode.
 */
export class PolicyError extends GovernorError {
  constructor(message: string, details?: unknown) {
    super(message, 'POLICY_ERROR', 500, details);
    this.name = 'PolicyError';
  }
}
