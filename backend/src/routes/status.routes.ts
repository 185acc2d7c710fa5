import { Router, Request, Response } from 'express';
import { StatusController } from '../controllers/status.controller';

export const createStatusRoutes = (controller: StatusController): Router => {
  const router = Router();

  router.get('/api/status', (req: Request, res: Response) => controller.getStatus(req, res));
  router.get('/health', (req: Request, res: Response) => controller.getHealth(req, res));

  return router;
};
