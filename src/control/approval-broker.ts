/**
 * Approval Broker
 *
 * Holds requests that need a human decision (a capability the active mode
 * gates behind approval, or a mode transition whose rule asks for one) and
 * settles each exactly once: approved, rejected, or timed out.
 */
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { NotFoundError, errorMessage } from '../utils/errors';
import {
  APPROVAL_DENIED,
  APPROVAL_GRANTED,
  APPROVAL_REQUIRED,
  APPROVAL_TIMED_OUT,
} from '../telemetry/events';
import { recordPendingApprovals } from '../telemetry/metrics';

export type ApprovalKind = 'capability' | 'mode_transition';

export type ApprovalOutcome = 'approved' | 'rejected' | 'timed_out';

export interface ApprovalRequest {
  id: string;
  kind: ApprovalKind;
  subject: string;
  reason: string;
  trace_id?: string;
  requested_at: number;
  expires_at: number;
  details?: Record<string, unknown>;
}

export interface ApprovalResolution {
  request_id: string;
  outcome: ApprovalOutcome;
  approver?: string;
  note?: string;
  resolved_at: number;
}

export interface ApprovalRequestInput {
  kind: ApprovalKind;
  subject: string;
  reason: string;
  trace_id?: string;
  details?: Record<string, unknown>;
  timeoutMs?: number;
}

export interface PendingApproval {
  request: ApprovalRequest;
  decision: Promise<ApprovalResolution>;
}

interface Entry {
  request: ApprovalRequest;
  settle: (resolution: ApprovalResolution) => void;
  timer: NodeJS.Timeout;
}

export class ApprovalBroker {
  private readonly entries = new Map<string, Entry>();
  private readonly requestListeners = new Set<(request: ApprovalRequest) => void>();
  private readonly defaultTimeoutMs: number;
  private readonly clock: Clock;

  constructor(options: { defaultTimeoutMs: number; clock?: Clock }) {
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.clock = options.clock ?? systemClock;
  }

  request(input: ApprovalRequestInput): PendingApproval {
    const timeoutMs = Math.max(0, input.timeoutMs ?? this.defaultTimeoutMs);
    const now = this.clock.now();
    const request: ApprovalRequest = Object.freeze({
      id: uuidv4(),
      kind: input.kind,
      subject: input.subject,
      reason: input.reason,
      trace_id: input.trace_id,
      requested_at: now,
      expires_at: now + timeoutMs,
      details: input.details,
    });

    const decision = new Promise<ApprovalResolution>((resolve) => {
      const timer = setTimeout(() => {
        this.settle(request.id, 'timed_out');
      }, timeoutMs);
      timer.unref();
      this.entries.set(request.id, { request, settle: resolve, timer });
    });

    logger.info(
      {
        event: APPROVAL_REQUIRED,
        request_id: request.id,
        kind: request.kind,
        subject: request.subject,
        trace_id: request.trace_id,
        timeout_ms: timeoutMs,
      },
      'Approval requested',
    );
    this.updateGauge();

    for (const listener of this.requestListeners) {
      try {
        listener(request);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Approval listener failed');
      }
    }

    return { request, decision };
  }

  approve(id: string, approver?: string, note?: string): ApprovalResolution {
    return this.settle(id, 'approved', approver, note);
  }

  reject(id: string, approver?: string, note?: string): ApprovalResolution {
    return this.settle(id, 'rejected', approver, note);
  }

  /**
   * Requests still awaiting a decision, oldest first.
   */
  pending(kind?: ApprovalKind): ApprovalRequest[] {
    return [...this.entries.values()]
      .map((entry) => entry.request)
      .filter((request) => kind === undefined || request.kind === kind)
      .sort((a, b) => a.requested_at - b.requested_at);
  }

  get(id: string): ApprovalRequest | undefined {
    return this.entries.get(id)?.request;
  }

  onRequest(listener: (request: ApprovalRequest) => void): () => void {
    this.requestListeners.add(listener);
    return () => this.requestListeners.delete(listener);
  }

  /**
   * Time out everything still pending.
   */
  close(): void {
    for (const id of [...this.entries.keys()]) {
      this.settle(id, 'timed_out');
    }
  }

  private settle(id: string, outcome: ApprovalOutcome, approver?: string, note?: string): ApprovalResolution {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new NotFoundError(`Approval request '${id}' not found or already resolved`, { request_id: id });
    }

    clearTimeout(entry.timer);
    this.entries.delete(id);

    const resolution: ApprovalResolution = Object.freeze({
      request_id: id,
      outcome,
      approver,
      note,
      resolved_at: this.clock.now(),
    });

    const event =
      outcome === 'approved' ? APPROVAL_GRANTED : outcome === 'rejected' ? APPROVAL_DENIED : APPROVAL_TIMED_OUT;
    logger.info(
      { event, request_id: id, kind: entry.request.kind, subject: entry.request.subject, approver },
      'Approval resolved',
    );

    this.updateGauge();
    entry.settle(resolution);
    return resolution;
  }

  private updateGauge(): void {
    recordPendingApprovals('capability', this.pending('capability').length);
    recordPendingApprovals('mode_transition', this.pending('mode_transition').length);
  }
}

