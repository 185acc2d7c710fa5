import { Router, Request, Response, NextFunction } from 'express';
import { placeSearchValidation, validateRequest } from '../middleware/validation.middleware';
import { unwrap } from '../middleware/error.middleware';
import { GeocodingService } from '../services/geocoding.service';
import { PlaceSummary } from '../models/environment.model';
import { PlacesService } from '../services/places.service';

export interface PlacesRouteServices {
  geocoding: GeocodingService;
  places: PlacesService;
}

interface PlaceSearchBody {
  query?: string;
  location?: string;
  type?: string;
  radius?: number;
}

export const createPlacesRoutes = ({ geocoding, places }: PlacesRouteServices): Router => {
  const router = Router();

  /**
   * POST /api/places/search
   * Either a text query (optionally biased towards `location`),
   * or every place of `type` around `location`.
   */
  router.post('/search', placeSearchValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query, location, type, radius }: PlaceSearchBody = req.body;
      const near = location ? unwrap(await geocoding.getCoordinates(location)).location : undefined;

      let results: PlaceSummary[];
      if (query) {
        console.log(`Place search: "${query}"${location ? ` near "${location}"` : ''}`);
        results = unwrap(await places.textSearch(query, near, radius));
      } else if (near && type) {
        console.log(`Nearby search: ${type} around "${location}"`);
        results = unwrap(await places.searchNearby(near, type, radius));
      } else {
        results = [];
      }

      res.json({ success: true, places: results });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
