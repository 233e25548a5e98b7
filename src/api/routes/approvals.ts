/**
 * Approval Routes
 *
 * Lists pending approvals (capabilities and mode transitions) and settles
 * them. Each approval settles once; a second decision is a 404.
 */
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ApprovalKind } from '../../control/approval-broker';
import { Governor } from '../../runtime/governor';
import { ValidationError } from '../../utils/errors';

const DecisionBodySchema = z
  .object({
    approver: z.string().min(1).max(200).optional(),
    note: z.string().max(2000).optional(),
  })
  .default({});

const KindSchema = z.enum(['capability', 'mode_transition']).optional();

function parseDecision(body: unknown): z.infer<typeof DecisionBodySchema> {
  const parsed = DecisionBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid approval decision', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return parsed.data;
}

function parseKind(value: unknown): ApprovalKind | undefined {
  const parsed = KindSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("Query parameter 'kind' must be 'capability' or 'mode_transition'");
  }
  return parsed.data;
}

export function createApprovalRouter(governor: Governor): Router {
  const router = Router();

  /**
   * GET /api/v1/approvals?kind=capability|mode_transition
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({ approvals: governor.approvals.pending(parseKind(req.query.kind)) });
  });

  /**
   * POST /api/v1/approvals/:id/approve
   */
  router.post('/:id/approve', (req: Request, res: Response) => {
    const { approver, note } = parseDecision(req.body);
    res.json(governor.approvals.approve(req.params.id, approver, note));
  });

  /**
   * POST /api/v1/approvals/:id/reject
   */
  router.post('/:id/reject', (req: Request, res: Response) => {
    const { approver, note } = parseDecision(req.body);
    res.json(governor.approvals.reject(req.params.id, approver, note));
  });

  return router;
}
