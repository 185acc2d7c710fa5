import { Router, Request, Response, NextFunction } from 'express';
import {
  destinationValidation,
  directionsValidation,
  locationBodyValidation,
  staticMapValidation,
  validateRequest
} from '../middleware/validation.middleware';
import { unwrap } from '../middleware/error.middleware';
import { DirectionsParams, DirectionsService } from '../services/directions.service';
import { EnvironmentService } from '../services/environment.service';
import { StaticMapParams, StaticMapService } from '../services/static-map.service';

export interface MapsRouteServices {
  environment: Pick<EnvironmentService, 'describeLocation' | 'describeDestination'>;
  directions: DirectionsService;
  staticMap: StaticMapService;
}

export const createMapsRoutes = ({ environment, directions, staticMap }: MapsRouteServices): Router => {
  const router = Router();

  /**
   * POST /api/maps/location-info
   * Coordinates, time zone, current weather and nearby places for a location.
   */
  router.post('/location-info', locationBodyValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const location: string = req.body.location;
      console.log(`Location info request: "${location}"`);

      const info = unwrap(await environment.describeLocation(location));

      res.json({ success: true, ...info });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/maps/destination-details/:name
   * Location info plus the top attractions around a destination.
   */
  router.get('/destination-details/:name', destinationValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = req.params;
      console.log(`Destination details request: "${name}"`);

      const details = unwrap(await environment.describeDestination(name));

      res.json({ success: true, destination: name, ...details });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/maps/directions
   * Body: origin, destination, mode?, waypoints?
   */
  router.post('/directions', directionsValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params: DirectionsParams = req.body;
      console.log(`Directions request: "${params.origin}" -> "${params.destination}" (${params.mode ?? 'driving'})`);

      const routes = unwrap(await directions.getDirections(params));

      res.json({ success: true, routes });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/maps/static
   * Body: center, zoom?, size?, markers?
   */
  router.post('/static', staticMapValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => {
    try {
      const params: StaticMapParams = req.body;
      const url = unwrap(staticMap.buildUrl(params));

      res.json({ success: true, url });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
