import { Router, Request, Response, NextFunction } from 'express';
import { ItineraryController } from '../controllers/itinerary.controller';
import { refinementValidation, tripRequestValidation, validateRequest } from '../middleware/validation.middleware';

export const createItineraryRoutes = (controller: ItineraryController): Router => {
  const router = Router();

  router.post('/generate', tripRequestValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.generateItinerary(req, res, next)
  );

  router.post('/refine', refinementValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.refineItinerary(req, res, next)
  );

  return router;
};
