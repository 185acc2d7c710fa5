import { Request, Response } from 'express';
import { AppConfig } from '../config/environment';

export interface ServiceStatus {
  configured: boolean;
  [detail: string]: boolean | string | string[];
}

export class StatusController {
  constructor(private readonly config: Readonly<AppConfig>) {}

  getStatus(req: Request, res: Response): void {
    const { geminiApiKey, geminiModel, googleApiKey, openWeatherMapApiKey, nodeEnv } = this.config;

    const apis: Record<string, ServiceStatus> = {
      gemini: {
        configured: geminiApiKey !== undefined,
        model: geminiModel
      },
      google: {
        configured: googleApiKey !== undefined,
        services: ['Geocoding API', 'Places API', 'Time Zone API', 'Directions API', 'Maps Static API']
      },
      openweather: {
        configured: openWeatherMapApiKey !== undefined
      }
    };

    const healthy = Object.values(apis).every((api) => api.configured);

    res.json({
      timestamp: new Date().toISOString(),
      environment: nodeEnv,
      apis,
      overall_status: healthy ? 'healthy' : 'degraded'
    });
  }

  getHealth(req: Request, res: Response): void {
    res.json({ status: 'ok' });
  }
}
