import { Request, Response, NextFunction } from 'express';
import { RefinementInput } from '../models/itinerary.model';
import { TripRequestInput } from '../models/trip-request.model';
import { ItineraryService, toTripRequest } from '../services/itinerary.service';

export class ItineraryController {
  constructor(private readonly itineraryService: ItineraryService) {}

  // =============================================
  // Generate a new itinerary from trip preferences
  // =============================================
  async generateItinerary(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input: TripRequestInput = req.body;
      const trip = toTripRequest(input);

      const { itinerary, environment } = await this.itineraryService.generate(trip);

      res.json({
        success: true,
        itinerary,
        environment,
        generatedAt: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  }

  // =============================================
  // Rewrite an existing itinerary from feedback
  // =============================================
  async refineItinerary(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { itinerary, instruction }: RefinementInput = req.body;

      const refined = await this.itineraryService.refine(itinerary, instruction);

      res.json({
        success: true,
        itinerary: refined,
        refinedAt: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  }
}
