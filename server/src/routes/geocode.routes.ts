import express, { type NextFunction, type Request, type Response } from 'express';
import { getGeocodeController } from '../controllers/geocode.controller';
import { requestIdOf } from '../lib/requestId';

const router = express.Router();

router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await getGeocodeController(req.query, requestIdOf(req));
    return res.status(result.statusCode).json(result.body);
  } catch (error) {
    return next(error);
  }
});

export default router;
