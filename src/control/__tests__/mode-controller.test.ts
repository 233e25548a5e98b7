import { ManualClock } from '../../utils/clock';
import { ApprovalBroker } from '../approval-broker';
import { ModeTransitionError } from '../errors';
import { ModeController } from '../mode-controller';
import { Mode } from '../modes';
import { TelemetryLog } from '../../telemetry/telemetry-log';
import { MetricSample, SAMPLE_SCHEMA_VERSION } from '../../sampler/types';
import { flushPromises, loadTestPolicy, policyWith } from '../../__tests__/fixtures';

function sampleAt(timestamp: number, readings: Record<string, number>): MetricSample {
  return { kind: 'system', schema_version: SAMPLE_SCHEMA_VERSION, timestamp, readings };
}

describe('ModeController', () => {
  let clock: ManualClock;
  let telemetry: TelemetryLog;
  let broker: ApprovalBroker;

  beforeEach(() => {
    clock = new ManualClock(1_000_000);
    telemetry = new TelemetryLog();
    broker = new ApprovalBroker({ defaultTimeoutMs: 60_000, clock });
  });

  afterEach(() => {
    broker.close();
  });

  function controller(initialMode = Mode.NORMAL, policy = loadTestPolicy()): ModeController {
    return new ModeController({ policy, approvals: broker, telemetry, clock, initialMode });
  }

  /** Feed one sample per `stepMs` from now until `durationMs` has passed */
  function feed(target: ModeController, durationMs: number, stepMs: number, readings: Record<string, number>): void {
    const end = clock.now() + durationMs;
    for (;;) {
      target.observeSample(sampleAt(clock.now(), readings));
      if (clock.now() >= end) break;
      clock.advance(stepMs);
    }
  }

  it('should start in NORMAL with version 0', () => {
    const modes = controller();
    const snapshot = modes.snapshot();

    expect(snapshot.mode).toBe(Mode.NORMAL);
    expect(snapshot.version).toBe(0);
    expect(snapshot.constraints.mode).toBe(Mode.NORMAL);
    expect(snapshot.constraints.concurrencyCeiling).toBe(5);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should escalate NORMAL to ALERT after cpu_load stays above 85 for 30 seconds', () => {
    const modes = controller();

    feed(modes, 25_000, 5_000, { cpu_load: 90 });
    expect(modes.mode).toBe(Mode.NORMAL);

    clock.advance(5_000);
    modes.observeSample(sampleAt(clock.now(), { cpu_load: 91 }));

    expect(modes.mode).toBe(Mode.ALERT);
    expect(modes.snapshot().version).toBe(1);
    expect(modes.snapshot().constraints.mode).toBe(Mode.ALERT);

    const [event] = telemetry.modeTransitions();
    expect(event).toMatchObject({
      old_mode: Mode.NORMAL,
      new_mode: Mode.ALERT,
      trigger_metric: 'cpu_load',
      trigger_value: 91,
      rule: 'NORMAL_to_ALERT',
      timestamp: 1_030_000,
    });
  });

  it('should not transition when the condition flickers faster than its duration', () => {
    const modes = controller();

    for (let i = 0; i < 24; i++) {
      modes.observeSample(sampleAt(clock.now(), { cpu_load: i % 2 === 0 ? 90 : 50 }));
      clock.advance(5_000);
      modes.tick();
    }

    expect(modes.mode).toBe(Mode.NORMAL);
    expect(modes.history()).toEqual([]);
  });

  it('should complete a sustained duration on tick without new samples', () => {
    const modes = controller();
    modes.observeSample(sampleAt(clock.now(), { cpu_load: 88 }));

    clock.advance(29_999);
    modes.tick();
    expect(modes.mode).toBe(Mode.NORMAL);

    clock.advance(1);
    modes.tick();
    expect(modes.mode).toBe(Mode.ALERT);
    expect(modes.history()[0].trigger_value).toBe(88);
  });

  it('should treat stale readings as missing', () => {
    const modes = new ModeController({ policy: loadTestPolicy(), telemetry, clock, staleAfterMs: 10_000 });
    modes.observeSample(sampleAt(clock.now(), { cpu_load: 95 }));

    clock.advance(10_001);
    modes.tick();
    clock.advance(25_000);
    modes.tick();

    expect(modes.mode).toBe(Mode.NORMAL);
  });

  it('should fire immediately for a zero-duration condition', () => {
    const modes = controller();
    modes.observeSample(sampleAt(clock.now(), { tool_errors: 5 }));

    expect(modes.mode).toBe(Mode.ALERT);
    expect(modes.history()[0]).toMatchObject({ rule: 'NORMAL_to_ALERT', trigger_metric: 'tool_errors' });
  });

  it('should de-escalate ALERT to NORMAL once every condition has held for 60 seconds', () => {
    const modes = controller(Mode.ALERT);
    const calm = { cpu_load: 40, memory_used: 50, policy_violations: 0 };

    feed(modes, 50_000, 10_000, calm);
    expect(modes.mode).toBe(Mode.ALERT);

    clock.advance(10_000);
    modes.observeSample(sampleAt(clock.now(), calm));

    expect(modes.mode).toBe(Mode.NORMAL);
    expect(telemetry.modeTransitions()[0]).toMatchObject({ old_mode: Mode.ALERT, new_mode: Mode.NORMAL });
  });

  it('should not de-escalate while one of the ALL conditions is false', () => {
    const modes = controller(Mode.ALERT);

    feed(modes, 120_000, 10_000, { cpu_load: 40, memory_used: 50, policy_violations: 1 });

    expect(modes.mode).toBe(Mode.ALERT);
  });

  it('should apply only the first rule that fires', () => {
    const modes = controller(
      Mode.NORMAL,
      policyWith({
        transition_rules: [
          {
            name: 'NORMAL_to_DEGRADED',
            from: 'NORMAL',
            to: 'DEGRADED',
            conditions: [{ metric: 'cpu_load', operator: '>', value: 90 }],
          },
          {
            name: 'NORMAL_to_ALERT',
            from: 'NORMAL',
            to: 'ALERT',
            conditions: [{ metric: 'cpu_load', operator: '>', value: 80 }],
          },
        ],
      }),
    );

    modes.observeSample(sampleAt(clock.now(), { cpu_load: 99 }));

    expect(modes.mode).toBe(Mode.DEGRADED);
    expect(modes.history().map((record) => record.rule)).toEqual(['NORMAL_to_DEGRADED']);
  });

  it('should restart sustained timers after a transition', () => {
    const modes = controller();
    feed(modes, 30_000, 5_000, { cpu_load: 96 });
    expect(modes.mode).toBe(Mode.ALERT);

    // ALERT_to_DEGRADED needs 60s counted from inside ALERT.
    feed(modes, 55_000, 5_000, { cpu_load: 96 });
    expect(modes.mode).toBe(Mode.ALERT);

    clock.advance(5_000);
    modes.observeSample(sampleAt(clock.now(), { cpu_load: 96 }));
    expect(modes.mode).toBe(Mode.DEGRADED);
  });

  describe('approval-gated transitions', () => {
    it('should wait for approval before entering LOCKDOWN', async () => {
      const modes = controller(Mode.ALERT);
      modes.observeSample(sampleAt(clock.now(), { policy_violations: 3 }));

      expect(modes.mode).toBe(Mode.ALERT);
      const [request] = broker.pending('mode_transition');
      expect(request.subject).toBe('ALERT -> LOCKDOWN');
      expect(modes.pendingApprovalId).toBe(request.id);

      broker.approve(request.id, 'operator');
      await flushPromises();

      expect(modes.mode).toBe(Mode.LOCKDOWN);
      expect(modes.pendingApprovalId).toBeUndefined();
      expect(modes.history()[0].reason).toBe("Transition rule 'ALERT_to_LOCKDOWN' approved by operator");
    });

    it('should stay in the current mode when the transition is rejected', async () => {
      const modes = controller(Mode.ALERT);
      modes.observeSample(sampleAt(clock.now(), { policy_violations: 4 }));

      broker.reject(broker.pending()[0].id);
      await flushPromises();

      expect(modes.mode).toBe(Mode.ALERT);
      expect(modes.pendingApprovalId).toBeUndefined();
    });

    it('should treat an expired approval as a rejection', async () => {
      const modes = controller(Mode.ALERT);
      modes.observeSample(sampleAt(clock.now(), { policy_violations: 3 }));

      broker.close();
      await flushPromises();

      expect(modes.mode).toBe(Mode.ALERT);
      expect(broker.pending()).toEqual([]);
    });

    it('should not fire other rules while an approval is pending', () => {
      const modes = controller(Mode.ALERT);
      modes.observeSample(sampleAt(clock.now(), { policy_violations: 3 }));

      feed(modes, 120_000, 10_000, { cpu_load: 99, policy_violations: 3 });

      expect(modes.mode).toBe(Mode.ALERT);
      expect(broker.pending('mode_transition')).toHaveLength(1);
    });

    it('should reset sustained timers that lapse while an approval is pending', async () => {
      const modes = controller(Mode.ALERT);
      const t0 = clock.now();
      modes.observeSample(sampleAt(t0, { cpu_load: 99, policy_violations: 3 }));
      const [request] = broker.pending('mode_transition');

      clock.set(t0 + 10_000);
      modes.observeSample(sampleAt(clock.now(), { cpu_load: 20, policy_violations: 3 }));
      clock.set(t0 + 59_000);
      modes.observeSample(sampleAt(clock.now(), { cpu_load: 99, policy_violations: 3 }));

      clock.set(t0 + 61_000);
      broker.reject(request.id);
      await flushPromises();
      clock.set(t0 + 62_000);
      modes.observeSample(sampleAt(clock.now(), { cpu_load: 99, policy_violations: 0 }));

      expect(modes.mode).toBe(Mode.ALERT);
      expect(modes.history()).toEqual([]);
    });

    it('should skip approval-gated rules when no broker is configured', () => {
      const modes = new ModeController({ policy: loadTestPolicy(), clock, initialMode: Mode.ALERT });
      modes.observeSample(sampleAt(clock.now(), { policy_violations: 3 }));

      expect(modes.mode).toBe(Mode.ALERT);
      expect(modes.pendingApprovalId).toBeUndefined();
    });
  });

  describe('transition graph', () => {
    const rules = [
      {
        name: 'NORMAL_to_LOCKDOWN',
        from: 'NORMAL',
        to: 'LOCKDOWN',
        conditions: [{ metric: 'policy_violations', operator: '>=', value: 1 }],
      },
      {
        name: 'NORMAL_to_ALERT',
        from: 'NORMAL',
        to: 'ALERT',
        conditions: [{ metric: 'policy_violations', operator: '>=', value: 1 }],
      },
    ];

    it('should skip a rule on a disallowed edge and try the next one', () => {
      const modes = controller(Mode.NORMAL, policyWith({ transition_rules: rules }));

      modes.observeSample(sampleAt(clock.now(), { policy_violations: 2 }));

      expect(modes.mode).toBe(Mode.ALERT);
      expect(modes.history()).toHaveLength(1);
      expect(modes.history()[0].rule).toBe('NORMAL_to_ALERT');
    });

    it('should allow manual transitions along the graph only', () => {
      const modes = controller();

      expect(() => modes.requestTransition(Mode.LOCKDOWN, 'incident')).toThrow(ModeTransitionError);
      expect(modes.mode).toBe(Mode.NORMAL);

      const snapshot = modes.requestTransition(Mode.DEGRADED, 'maintenance');
      expect(snapshot.mode).toBe(Mode.DEGRADED);
      expect(snapshot.version).toBe(1);
      expect(modes.history()[0]).toMatchObject({ from: Mode.NORMAL, to: Mode.DEGRADED, reason: 'maintenance' });
    });
  });

  describe('control signals', () => {
    it('should consume each signal id once', () => {
      const modes = controller();
      const signal = { id: 'sig-1', name: 'tool_errors>=5', metric: 'tool_errors', value: 6, timestamp: clock.now() };

      expect(modes.observeSignal(signal)).toBe(true);
      expect(modes.mode).toBe(Mode.ALERT);
      expect(modes.observeSignal(signal)).toBe(false);
    });

    it('should remember only the most recent signal ids', () => {
      const modes = new ModeController({ policy: loadTestPolicy(), clock, initialMode: Mode.LOCKDOWN, signalMemory: 2 });
      const signal = (id: string) => ({ id, name: 'cpu_load>85', metric: 'cpu_load', value: 50, timestamp: clock.now() });

      expect(modes.observeSignal(signal('a'))).toBe(true);
      expect(modes.observeSignal(signal('b'))).toBe(true);
      expect(modes.observeSignal(signal('c'))).toBe(true);

      expect(modes.observeSignal(signal('b'))).toBe(false);
      expect(modes.observeSignal(signal('c'))).toBe(false);
      expect(modes.observeSignal(signal('a'))).toBe(true);
    });

    it('should ignore readings older than the latest one', () => {
      const modes = controller();
      modes.observeSample(sampleAt(clock.now(), { cpu_load: 20 }));
      modes.observeSignal({
        id: 'late',
        name: 'cpu_load>85',
        metric: 'cpu_load',
        value: 99,
        timestamp: clock.now() - 40_000,
      });

      clock.advance(30_000);
      modes.tick();

      expect(modes.mode).toBe(Mode.NORMAL);
    });
  });

  it('should notify transition listeners with the new snapshot', () => {
    const modes = controller();
    const listener = jest.fn();
    modes.onTransition(listener);

    modes.requestTransition(Mode.ALERT, 'drill');

    expect(listener).toHaveBeenCalledTimes(1);
    const [snapshot, record] = listener.mock.calls[0];
    expect(snapshot.mode).toBe(Mode.ALERT);
    expect(record).toMatchObject({ from: Mode.NORMAL, to: Mode.ALERT, version: 1 });
  });

  it('should keep the old snapshot object unchanged after a transition', () => {
    const modes = controller();
    const before = modes.snapshot();

    modes.requestTransition(Mode.ALERT, 'drill');

    expect(before.mode).toBe(Mode.NORMAL);
    expect(before.constraints.mode).toBe(Mode.NORMAL);
    expect(modes.snapshot()).not.toBe(before);
  });
});
