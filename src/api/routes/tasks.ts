/**
 * Task Routes
 */
import { Router, Request, Response } from 'express';
import { parseTaskRequest, toTaskResponse } from '../../execution/context';
import { Governor } from '../../runtime/governor';
import { asyncHandler } from '../middleware/error-handler';
import { requestTraceId } from '../middleware/trace';

export function createTaskRouter(governor: Governor): Router {
  const router = Router();

  /**
   * POST /api/v1/tasks
   * Runs a task to completion and returns its user-visible result. A failed
   * task is still a 200: the body carries only the trace reference.
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseTaskRequest(req.body);
      const context = await governor.submit(request, requestTraceId(res));
      res.json(toTaskResponse(context));
    }),
  );

  return router;
}
