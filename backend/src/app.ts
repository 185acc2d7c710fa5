import express, { Application } from 'express';
import cors from 'cors';
import { AppServices } from './container';
import { ItineraryController } from './controllers/itinerary.controller';
import { StatusController } from './controllers/status.controller';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createCurrencyRoutes } from './routes/currency.routes';
import { createItineraryRoutes } from './routes/itinerary.routes';
import { createMapsRoutes } from './routes/maps.routes';
import { createPlacesRoutes } from './routes/places.routes';
import { createStatusRoutes } from './routes/status.routes';
import { createWeatherRoutes } from './routes/weather.routes';

export const createApp = (services: AppServices): Application => {
  const app: Application = express();
  const { config } = services;

  // Middleware
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.get('/', (req, res) => {
    res.json({ message: 'Trip Itinerary Planner API' });
  });

  app.use(createStatusRoutes(new StatusController(config)));
  app.use('/api/itineraries', createItineraryRoutes(new ItineraryController(services.itinerary)));
  app.use('/api/maps', createMapsRoutes(services));
  app.use('/api/places', createPlacesRoutes(services));
  app.use('/api/weather', createWeatherRoutes(services));
  app.use('/api/currency', createCurrencyRoutes(services.currency));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
