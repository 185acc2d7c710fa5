import { Request, Response, NextFunction } from 'express';
import { AdapterFailure, AdapterResult } from '../services/adapter-result';

export interface FieldError {
  field: string;
  message: string;
}

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  errors: FieldError[];

  constructor(errors: FieldError[], message = 'Invalid request') {
    super(message, 400);
    this.errors = errors;
  }
}

const SERVICE_LABELS: Record<AdapterFailure['service'], string> = {
  gemini: 'The itinerary generator',
  geocoding: 'The geocoding service',
  places: 'The places service',
  timezone: 'The time zone service',
  directions: 'The directions service',
  'static-map': 'The map service',
  weather: 'The weather service',
  currency: 'The currency service'
};

const statusForFailure = (failure: AdapterFailure): number => {
  switch (failure.reason) {
    case 'not_configured':
      return 503;
    case 'timeout':
      return 504;
    case 'not_found':
      return 404;
    default:
      return 502;
  }
};

const messageForFailure = (failure: AdapterFailure): string => {
  const label = SERVICE_LABELS[failure.service];
  switch (failure.reason) {
    case 'not_configured':
      return `${label} is not available. Please check the API key configuration.`;
    case 'timeout':
      return `${label} took too long to respond. Please try again.`;
    case 'authentication':
      return `${label} rejected our credentials.`;
    case 'quota_exceeded':
      return `${label} is over its usage quota. Please try again later.`;
    case 'not_found':
      return `${label} found no results.`;
    case 'malformed_response':
      return `${label} returned a response we could not read.`;
    default:
      return `${label} is currently unavailable.`;
  }
};

/**
 * Raised when an external service fails in a way the request cannot
 * degrade around, such as the AI call behind itinerary generation.
 */
export class UpstreamServiceError extends AppError {
  failure: AdapterFailure;

  constructor(failure: AdapterFailure) {
    super(messageForFailure(failure), statusForFailure(failure));
    this.failure = failure;
  }
}

/** Returns the adapter's data, or throws its failure as an UpstreamServiceError. */
export const unwrap = <T>(result: AdapterResult<T>): T => {
  if (!result.ok) {
    throw new UpstreamServiceError(result.failure);
  }
  return result.data;
};

const isBodyParseError = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler.
  _next: NextFunction
): void => {
  if (err instanceof ValidationError) {
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
      errors: err.errors
    });
    return;
  }

  if (err instanceof UpstreamServiceError) {
    console.warn(`Upstream failure [${err.failure.service}/${err.failure.reason}]:`, err.failure.message);
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message
    });
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      status: 'error',
      message: 'Request body is not valid JSON'
    });
    return;
  }

  console.error('Error:', err);

  res.status(500).json({
    status: 'error',
    message: 'Internal server error'
  });
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    status: 'error',
    message: `Route ${req.originalUrl} not found`
  });
};
