import { GovernorError } from '../utils/errors';

/**
 * One collector failed or timed out. The reading is omitted for the cycle;
 * the other collectors and the sampler keep running.
 */
export class CollectionError extends GovernorError {
  readonly collector: string;

  constructor(collector: string, message: string, details?: unknown) {
    super(message, 'COLLECTION_ERROR', 500, details);
    this.name = 'CollectionError';
    this.collector = collector;
  }
}
