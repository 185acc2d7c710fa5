import { Router, Request, Response, NextFunction } from 'express';
import { currencyValidation, validateRequest } from '../middleware/validation.middleware';
import { unwrap } from '../middleware/error.middleware';
import { CurrencyService, DEFAULT_CURRENCY, countryFromDestination } from '../services/currency.service';

export const createCurrencyRoutes = (currency: CurrencyService): Router => {
  const router = Router();

  /**
   * GET /api/currency/:destination/:base?
   * Local currency of the destination's country and its rate against `base`.
   */
  router.get('/:destination/:base?', currencyValidation, validateRequest, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { destination } = req.params;
      const base = req.params.base ?? DEFAULT_CURRENCY;
      const country = countryFromDestination(destination);

      const info = unwrap(await currency.getCurrencyInfo(country, base));

      res.json({ success: true, destination, ...info });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
