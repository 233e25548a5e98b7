import { ManualClock } from '../../utils/clock';
import { Mode } from '../../control/modes';
import { ModelBackend, ModelCompletionRequest } from '../../execution/collaborators';
import { TaskState } from '../../execution/types';
import { MetricCollector } from '../../sampler/types';
import { Governor, RuntimeSettings } from '../governor';
import { loadTestPolicy } from '../../__tests__/fixtures';

const settings: RuntimeSettings = {
  sampler: { collectorTimeoutMs: 50, windowCapacity: 100, eventCountWindowMs: 600_000 },
  controller: { tickMs: 60_000, staleAfterMs: 60_000 },
  executor: { maxToolIterations: 3 },
};

describe('Governor', () => {
  let clock: ManualClock;
  let cpu: number;
  let requests: ModelCompletionRequest[];
  let governor: Governor;

  beforeEach(() => {
    clock = new ManualClock(2_000_000);
    cpu = 20;
    requests = [];
    const collectors: MetricCollector[] = [{ name: 'cpu_load', collect: () => cpu }];
    const model: ModelBackend = {
      complete: async (request) => {
        requests.push(request);
        return { content: 'All systems nominal', tool_calls: [] };
      },
    };
    governor = new Governor({ policy: loadTestPolicy(), settings, model, collectors, clock });
  });

  afterEach(() => {
    governor.stop();
  });

  it('should report health before starting', () => {
    expect(governor.health()).toEqual({
      status: 'healthy',
      mode: Mode.NORMAL,
      mode_version: 0,
      sampler_running: false,
      in_flight: 0,
      pending_approvals: 0,
    });
  });

  it('should sample event counts next to the configured collectors', async () => {
    const sample = await governor.sampler.sample();

    expect(sample.readings).toEqual({ cpu_load: 20, policy_violations: 0, tool_errors: 0, task_failures: 0 });
  });

  it('should escalate the mode from sustained samples and retune the sampler', async () => {
    governor.start();
    cpu = 97;

    await governor.sampler.sample();
    clock.advance(30_000);
    await governor.sampler.sample();

    expect(governor.controller.mode).toBe(Mode.ALERT);
    expect(governor.sampler.interval).toBe(2000);
    expect(governor.telemetry.modeTransitions()[0]).toMatchObject({
      old_mode: Mode.NORMAL,
      new_mode: Mode.ALERT,
      trigger_metric: 'cpu_load',
      trigger_value: 97,
    });
    expect(governor.health()).toMatchObject({ mode: Mode.ALERT, mode_version: 1, sampler_running: true });
  });

  it('should run submitted tasks with the built-in tools on offer', async () => {
    const ctx = await governor.submit({ prompt: 'How are we doing?', channel: 'system_health' }, 'req-9');

    expect(ctx.state).toBe(TaskState.COMPLETED);
    expect(ctx.output).toBe('All systems nominal');
    expect(ctx.parent_span_id).toBe('req-9');
    expect(requests[0].role).toBe('reasoning');
    expect(requests[0].tools?.map((tool) => tool.name)).toEqual([
      'read_file',
      'list_directory',
      'system_metrics_snapshot',
    ]);
  });

  it('should stop its loops', () => {
    governor.start();
    governor.stop();

    expect(governor.health().sampler_running).toBe(false);
  });
});
