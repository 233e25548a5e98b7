/**
 * Mode Routes
 *
 * Read-only view of the active mode, its constraints and the transition
 * history, plus an operator endpoint for a manual transition.
 */
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ModeSnapshot } from '../../control/constraint-set';
import { Mode } from '../../control/modes';
import { Governor } from '../../runtime/governor';
import { ValidationError } from '../../utils/errors';

const TransitionBodySchema = z.object({
  target: z.nativeEnum(Mode),
  reason: z.string().min(1).max(500),
});

export function serializeSnapshot(snapshot: ModeSnapshot) {
  const { constraints } = snapshot;
  return {
    mode: snapshot.mode,
    version: snapshot.version,
    since: new Date(snapshot.since).toISOString(),
    constraints: {
      allowed_categories: constraints.allowedCategories,
      require_approval_for: constraints.approvalRequired,
      allowed_model_roles: constraints.allowedModelRoles,
      max_concurrent_tasks: constraints.concurrencyCeiling,
      step_timeout_ms: constraints.stepTimeoutMs,
      task_budget_ms: constraints.taskBudgetMs,
      sampling_interval_ms: constraints.samplingIntervalMs,
      rate_limits: {
        tool_calls_per_minute: constraints.toolCallsPerMinute,
        model_calls_per_minute: constraints.modelCallsPerMinute,
      },
    },
  };
}

export function createModeRouter(governor: Governor): Router {
  const router = Router();

  /**
   * GET /api/v1/mode
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      ...serializeSnapshot(governor.controller.snapshot()),
      pending_transition_approval: governor.controller.pendingApprovalId ?? null,
    });
  });

  /**
   * GET /api/v1/mode/history
   */
  router.get('/history', (_req: Request, res: Response) => {
    res.json({ transitions: governor.controller.history() });
  });

  /**
   * POST /api/v1/mode/transition
   * Manual transition; must follow the allowed transition graph.
   */
  router.post('/transition', (req: Request, res: Response) => {
    const parsed = TransitionBodySchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError('Invalid transition request', {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }
    const snapshot = governor.controller.requestTransition(parsed.data.target, parsed.data.reason);
    res.json(serializeSnapshot(snapshot));
  });

  return router;
}
