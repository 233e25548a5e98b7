import { GovernorError } from '../utils/errors';
import { Mode } from './modes';

/**
 * A transition the policy asks for is not a valid edge of the mode graph.
 * Logged and skipped; the current mode stays active.
 */
export class ModeTransitionError extends GovernorError {
  constructor(from: Mode, to: Mode, details?: unknown) {
    super(`Mode transition ${from} -> ${to} is not allowed`, 'MODE_TRANSITION_ERROR', 409, details);
    this.name = 'ModeTransitionError';
  }
}
