/**
 * Node API Routes
 *
 * POST /node   { "type": "rescan", "timestamp"?: number } | { "type": "status" }
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { node, type HandlerSession } from '../handlers';
import { NodeActionSchema } from './schemas';

export function createNodeRouter(session: HandlerSession): Router {
  const router = Router();

  router.post(
    '/node',
    asyncHandler(async (req: Request, res: Response) => {
      const action = NodeActionSchema.parse(req.body);
      res.json(await node.postNode(session, action));
    })
  );

  return router;
}
