import { Router, Request, Response, NextFunction } from 'express';
import { locationQueryValidation, validateRequest } from '../middleware/validation.middleware';
import { unwrap } from '../middleware/error.middleware';
import { GeocodingService } from '../services/geocoding.service';
import { DEFAULT_FORECAST_DAYS, WeatherService } from '../services/weather.service';

export interface WeatherRouteServices {
  geocoding: GeocodingService;
  weather: WeatherService;
}

export const createWeatherRoutes = ({ geocoding, weather }: WeatherRouteServices): Router => {
  const router = Router();

  /**
   * GET /api/weather/forecast
   * Daily forecast for a named place.
   * Query params: location, days (1-5, default 5)
   */
  router.get('/forecast', locationQueryValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const location = String(req.query.location);
      const days = req.query.days === undefined ? DEFAULT_FORECAST_DAYS : Number(req.query.days);

      console.log(`Weather forecast request: "${location}" (${days} days)`);

      const place = unwrap(await geocoding.getCoordinates(location));
      const forecast = unwrap(await weather.getForecast(place.location, days));

      res.json({
        success: true,
        location: place,
        forecast: forecast.slice(0, days)
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/weather/current
   * Current conditions for a named place.
   * Query params: location
   */
  router.get('/current', locationQueryValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const location = String(req.query.location);

      console.log(`Current weather request: "${location}"`);

      const place = unwrap(await geocoding.getCoordinates(location));
      const current = unwrap(await weather.getCurrentWeather(place.location));

      res.json({
        success: true,
        location: place,
        weather: current
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
