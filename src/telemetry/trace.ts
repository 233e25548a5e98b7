/**
 * Trace Context
 *
 * Correlates everything that happens during one task execution. The trace
 * owns the step sequence counter: sequence numbers start at 1 and are handed
 * out strictly increasing, without gaps, for as long as the trace lives.
 */
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/logger';

export class TraceContext {
  readonly trace_id: string;
  readonly parent_span_id?: string;
  private sequence: number;

  private constructor(traceId: string, parentSpanId: string | undefined, lastSequence: number) {
    this.trace_id = traceId;
    this.parent_span_id = parentSpanId;
    this.sequence = lastSequence;
  }

  /**
   * Start a new trace with a generated identifier.
   */
  static newTrace(parentSpanId?: string): TraceContext {
    return new TraceContext(uuidv4(), parentSpanId, 0);
  }

  /**
   * Resume a trace that already issued `lastSequence` step numbers.
   */
  static resume(traceId: string, lastSequence: number, parentSpanId?: string): TraceContext {
    if (!Number.isInteger(lastSequence) || lastSequence < 0) {
      throw new RangeError(`lastSequence must be a non-negative integer, got ${lastSequence}`);
    }
    return new TraceContext(traceId, parentSpanId, lastSequence);
  }

  /** Last sequence number handed out (0 before the first step) */
  get lastSequence(): number {
    return this.sequence;
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  /**
   * Create a child span identifier under this trace.
   */
  newSpanId(): string {
    return uuidv4();
  }

  /**
   * Logger bound to this trace's correlation id.
   */
  bind(logger: Logger): Logger {
    return logger.child({ trace_id: this.trace_id });
  }
}
