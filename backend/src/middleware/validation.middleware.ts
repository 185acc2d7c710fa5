import { Request, Response, NextFunction } from 'express';
import { body, param, query, validationResult, ValidationChain } from 'express-validator';
import { TRAVEL_MODES } from '../services/directions.service';
import {
  BUDGET_TIERS,
  LODGING_PREFERENCES,
  MAX_CHILD_AGE,
  MAX_TRIP_DAYS,
  TRANSPORT_MODES
} from '../models/trip-request.model';
import { countTripDays, parseIsoDate } from '../utils/dates';
import { ValidationError } from './error.middleware';

export const MAX_INSTRUCTION_LENGTH = 2000;

const isCalendarDate = (value: unknown): boolean => {
  if (typeof value !== 'string' || parseIsoDate(value) === null) {
    throw new Error('Date must be a valid YYYY-MM-DD calendar date');
  }
  return true;
};

const checkTripLength = (start: unknown, end: unknown): void => {
  if (typeof start !== 'string' || typeof end !== 'string' || parseIsoDate(start) === null) {
    return;
  }
  const days = countTripDays(start, end);
  if (days === 0) {
    throw new Error('End date must be on or after start date');
  }
  if (days > MAX_TRIP_DAYS) {
    throw new Error(`Trips can be at most ${MAX_TRIP_DAYS} days long`);
  }
};

export const tripRequestValidation: ValidationChain[] = [
  body('destination')
    .isString().withMessage('Destination is required')
    .bail()
    .trim()
    .notEmpty().withMessage('Destination is required')
    .isLength({ max: 200 }).withMessage('Destination is too long'),
  body('start_date').custom(isCalendarDate).withMessage('Valid start date is required'),
  body('end_date')
    .custom(isCalendarDate).withMessage('Valid end date is required')
    .bail()
    .custom((value, { req }) => {
      checkTripLength(req.body?.start_date, value);
      return true;
    }),
  body('budget')
    .isIn([...BUDGET_TIERS]).withMessage(`Budget must be one of: ${BUDGET_TIERS.join(', ')}`),
  body('lodging')
    .optional()
    .isIn([...LODGING_PREFERENCES]).withMessage(`Lodging must be one of: ${LODGING_PREFERENCES.join(', ')}`),
  body('transport_modes').optional().isArray().withMessage('Transport modes must be an array'),
  body('transport_modes.*')
    .isIn([...TRANSPORT_MODES]).withMessage(`Transport mode must be one of: ${TRANSPORT_MODES.join(', ')}`),
  body('adults')
    .optional()
    .isInt({ min: 1, max: 20 }).withMessage('Adults must be between 1 and 20')
    .toInt(),
  body('child_ages').optional().isArray({ max: 10 }).withMessage('Child ages must be an array of at most 10 ages'),
  body('child_ages.*')
    .isInt({ min: 0, max: MAX_CHILD_AGE }).withMessage(`Child ages must be between 0 and ${MAX_CHILD_AGE}`)
    .toInt(),
  body('interests').optional().isArray({ max: 20 }).withMessage('Interests must be an array of at most 20 tags'),
  body('interests.*')
    .isString().withMessage('Interests must be text')
    .bail()
    .trim()
    .notEmpty().withMessage('Interests cannot be empty')
    .isLength({ max: 50 }).withMessage('Interest tags must be at most 50 characters'),
  body('special_requests')
    .optional()
    .isString().withMessage('Special requests must be text')
    .bail()
    .trim()
    .isLength({ max: 1000 }).withMessage('Special requests must be at most 1000 characters')
];

export const refinementValidation: ValidationChain[] = [
  body('instruction')
    .isString().withMessage('Instruction is required')
    .bail()
    .trim()
    .notEmpty().withMessage('Instruction is required')
    .isLength({ max: MAX_INSTRUCTION_LENGTH }).withMessage(`Instruction must be at most ${MAX_INSTRUCTION_LENGTH} characters`),
  body('itinerary').isObject().withMessage('Itinerary is required'),
  body('itinerary.destination')
    .isString().withMessage('Itinerary destination is required')
    .bail()
    .trim()
    .notEmpty().withMessage('Itinerary destination is required'),
  body('itinerary.startDate').custom(isCalendarDate).withMessage('Itinerary start date is invalid'),
  body('itinerary.endDate').custom(isCalendarDate).withMessage('Itinerary end date is invalid'),
  body('itinerary.currency')
    .isString().withMessage('Itinerary currency is required')
    .bail()
    .matches(/^[A-Z]{3}$/).withMessage('Itinerary currency must be an ISO 4217 code'),
  body('itinerary.days')
    .isArray({ min: 1, max: MAX_TRIP_DAYS }).withMessage('Itinerary must have at least one day')
    .bail()
    .custom((days: unknown[], { req }) => {
      const { startDate, endDate } = req.body?.itinerary ?? {};
      checkTripLength(startDate, endDate);
      if (typeof startDate === 'string' && typeof endDate === 'string' && days.length !== countTripDays(startDate, endDate)) {
        throw new Error('Itinerary must have one day per date in its range');
      }
      return true;
    }),
  body('itinerary.days.*.title').optional().isString().withMessage('Day title must be text'),
  body('itinerary.days.*.activities').isArray().withMessage('Day activities must be an array'),
  body('itinerary.days.*.activities.*.time').isString().withMessage('Activity time must be text'),
  body('itinerary.days.*.activities.*.description')
    .isString().withMessage('Activity description must be text'),
  body('itinerary.days.*.activities.*.location').isString().withMessage('Activity location must be text'),
  body('itinerary.days.*.activities.*.estimatedCost')
    .isFloat({ min: 0 }).withMessage('Activity cost must be a number of at least 0')
    .toFloat(),
  body('itinerary.summary').optional().isString(),
  body('itinerary.tips').optional().isArray(),
  body('itinerary.tips.*').isString()
];

export const locationBodyValidation: ValidationChain[] = [
  body('location').isString().bail().trim().notEmpty().withMessage('Location is required')
];

export const locationQueryValidation: ValidationChain[] = [
  query('location').isString().bail().trim().notEmpty().withMessage('Location is required'),
  query('days').optional().isInt({ min: 1, max: 5 }).withMessage('Days must be between 1 and 5').toInt()
];

export const destinationValidation: ValidationChain[] = [
  param('name').trim().notEmpty().withMessage('Destination name is required').isLength({ max: 200 }).withMessage('Destination is too long')
];

export const directionsValidation: ValidationChain[] = [
  body('origin').isString().bail().trim().notEmpty().withMessage('Origin is required'),
  body('destination').isString().bail().trim().notEmpty().withMessage('Destination is required'),
  body('mode').optional().isIn([...TRAVEL_MODES]).withMessage(`Mode must be one of: ${TRAVEL_MODES.join(', ')}`),
  body('waypoints').optional().isArray({ max: 23 }).withMessage('Waypoints must be an array'),
  body('waypoints.*').isString().trim().notEmpty()
];

export const placeSearchValidation: ValidationChain[] = [
  body('query').optional().isString().trim(),
  body('location').optional().isString().trim(),
  body('type').optional().isString().trim(),
  body('radius').optional().isInt({ min: 1, max: 50000 }).withMessage('Radius must be between 1 and 50000 meters').toInt(),
  body().custom((value: { query?: unknown; location?: unknown; type?: unknown }) => {
    if (value?.query || (value?.location && value?.type)) {
      return true;
    }
    throw new Error('Query or location+type are required');
  })
];

export const staticMapValidation: ValidationChain[] = [
  body('center').isString().bail().trim().notEmpty().withMessage('Center location is required'),
  body('zoom').optional().isInt({ min: 0, max: 21 }).withMessage('Zoom must be between 0 and 21').toInt(),
  body('size').optional().matches(/^\d{1,4}x\d{1,4}$/).withMessage('Size must look like 600x400'),
  body('markers').optional().isArray({ max: 50 }).withMessage('Markers must be an array'),
  body('markers.*').isString()
];

export const currencyValidation: ValidationChain[] = [
  param('destination').trim().notEmpty().withMessage('Destination is required'),
  param('base').optional().matches(/^[A-Za-z]{3}$/).withMessage('Base currency must be a 3-letter code').toUpperCase()
];

/** Turns express-validator results into a ValidationError for the error handler. */
export const validateRequest = (req: Request, res: Response, next: NextFunction): void => {
  const result = validationResult(req);
  if (result.isEmpty()) {
    next();
    return;
  }

  const errors = result.array().map((error) => ({
    field: error.type === 'field' ? error.path : error.type,
    message: String(error.msg)
  }));
  next(new ValidationError(errors));
};
