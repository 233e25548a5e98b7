import { ManualClock } from '../../utils/clock';
import { NotFoundError } from '../../utils/errors';
import { ApprovalBroker } from '../approval-broker';

describe('ApprovalBroker', () => {
  let clock: ManualClock;
  let broker: ApprovalBroker;

  beforeEach(() => {
    clock = new ManualClock(5_000);
    broker = new ApprovalBroker({ defaultTimeoutMs: 60_000, clock });
  });

  afterEach(() => {
    broker.close();
  });

  it('should register a pending request with its expiry', () => {
    const { request } = broker.request({
      kind: 'capability',
      subject: 'tool:run_command',
      reason: 'needs a human',
      trace_id: 'trace-1',
    });

    expect(request).toMatchObject({
      kind: 'capability',
      subject: 'tool:run_command',
      trace_id: 'trace-1',
      requested_at: 5_000,
      expires_at: 65_000,
    });
    expect(broker.pending()).toEqual([request]);
    expect(broker.get(request.id)).toBe(request);
  });

  it('should resolve the decision when approved', async () => {
    const { request, decision } = broker.request({ kind: 'capability', subject: 'tool:x', reason: 'r' });
    clock.advance(1_500);

    const resolution = broker.approve(request.id, 'alice', 'looks fine');

    await expect(decision).resolves.toEqual({
      request_id: request.id,
      outcome: 'approved',
      approver: 'alice',
      note: 'looks fine',
      resolved_at: 6_500,
    });
    expect(resolution.outcome).toBe('approved');
    expect(broker.pending()).toEqual([]);
  });

  it('should resolve the decision when rejected', async () => {
    const { request, decision } = broker.request({ kind: 'mode_transition', subject: 'ALERT -> LOCKDOWN', reason: 'r' });

    broker.reject(request.id, 'bob');

    await expect(decision).resolves.toMatchObject({ outcome: 'rejected', approver: 'bob' });
  });

  it('should settle each request only once', () => {
    const { request } = broker.request({ kind: 'capability', subject: 'tool:x', reason: 'r' });
    broker.approve(request.id);

    expect(() => broker.approve(request.id)).toThrow(NotFoundError);
    expect(() => broker.reject(request.id)).toThrow(NotFoundError);
  });

  it('should fail for an unknown request id', () => {
    expect(() => broker.approve('missing')).toThrow("Approval request 'missing' not found or already resolved");
  });

  it('should time out requests that are not decided', async () => {
    const { request, decision } = broker.request({ kind: 'capability', subject: 'tool:x', reason: 'r', timeoutMs: 5 });

    await expect(decision).resolves.toMatchObject({ request_id: request.id, outcome: 'timed_out' });
    expect(broker.get(request.id)).toBeUndefined();
  });

  it('should filter pending requests by kind, oldest first', () => {
    const first = broker.request({ kind: 'capability', subject: 'tool:a', reason: 'r' }).request;
    clock.advance(10);
    const transition = broker.request({ kind: 'mode_transition', subject: 'ALERT -> LOCKDOWN', reason: 'r' }).request;
    clock.advance(10);
    const second = broker.request({ kind: 'capability', subject: 'tool:b', reason: 'r' }).request;

    expect(broker.pending('capability')).toEqual([first, second]);
    expect(broker.pending('mode_transition')).toEqual([transition]);
    expect(broker.pending()).toHaveLength(3);
  });

  it('should notify request listeners and survive a failing one', () => {
    const seen: string[] = [];
    broker.onRequest(() => {
      throw new Error('listener broke');
    });
    broker.onRequest((request) => seen.push(request.subject));

    broker.request({ kind: 'capability', subject: 'tool:a', reason: 'r' });

    expect(seen).toEqual(['tool:a']);
  });

  it('should time out everything on close', async () => {
    const a = broker.request({ kind: 'capability', subject: 'tool:a', reason: 'r' });
    const b = broker.request({ kind: 'mode_transition', subject: 'NORMAL -> ALERT', reason: 'r' });

    broker.close();

    await expect(a.decision).resolves.toMatchObject({ outcome: 'timed_out' });
    await expect(b.decision).resolves.toMatchObject({ outcome: 'timed_out' });
    expect(broker.pending()).toEqual([]);
  });
});
