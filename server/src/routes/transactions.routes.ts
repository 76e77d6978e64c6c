import express, { type NextFunction, type Request, type Response } from 'express';
import { getTransactionsController } from '../controllers/transactions.controller';
import { requestIdOf } from '../lib/requestId';

const router = express.Router();

router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await getTransactionsController(req.query, requestIdOf(req));
    return res.status(result.statusCode).json(result.body);
  } catch (error) {
    return next(error);
  }
});

export default router;
