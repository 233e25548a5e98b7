import { TelemetryEvent, TelemetryLog } from '../telemetry-log';
import { Mode } from '../../control/modes';
import { TaskState } from '../../execution/types';

function transition(traceId: string, sequence: number): TelemetryEvent {
  return {
    type: 'state_transition',
    trace_id: traceId,
    sequence,
    from_state: TaskState.INIT,
    to_state: TaskState.PLANNING,
    duration_ms: 3,
    timestamp: 1000 + sequence,
  };
}

describe('TelemetryLog', () => {
  it('should keep events in emission order and filter them by kind', () => {
    const log = new TelemetryLog();
    log.emit(transition('a', 1));
    log.emit({
      type: 'mode_transition',
      old_mode: Mode.NORMAL,
      new_mode: Mode.ALERT,
      trigger_metric: 'cpu_load',
      trigger_value: 90,
      reason: 'test',
      timestamp: 2000,
    });
    log.emit(transition('b', 1));
    log.emit(transition('a', 2));

    expect(log.events()).toHaveLength(4);
    expect(log.stateTransitions('a').map((event) => event.sequence)).toEqual([1, 2]);
    expect(log.stateTransitions()).toHaveLength(3);
    expect(log.modeTransitions()[0].new_mode).toBe(Mode.ALERT);
    expect(log.taskFailures()).toEqual([]);
  });

  it('should store frozen copies', () => {
    const log = new TelemetryLog();
    const event = transition('a', 1);
    log.emit(event);

    const [stored] = log.events();
    expect(stored).toEqual(event);
    expect(stored).not.toBe(event);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('should drop the oldest events beyond capacity', () => {
    const log = new TelemetryLog(2);
    log.emit(transition('a', 1));
    log.emit(transition('a', 2));
    log.emit(transition('a', 3));

    expect(log.stateTransitions().map((event) => event.sequence)).toEqual([2, 3]);
  });

  it('should notify subscribers and isolate failing ones', () => {
    const log = new TelemetryLog();
    const received: TelemetryEvent[] = [];
    log.subscribe(() => {
      throw new Error('subscriber broke');
    });
    const unsubscribe = log.subscribe((event) => received.push(event));

    log.emit(transition('a', 1));
    unsubscribe();
    log.emit(transition('a', 2));

    expect(received).toHaveLength(1);
  });
});
