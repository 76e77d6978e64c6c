import express, { type NextFunction, type Request, type Response } from 'express';
import { SESSION_HEADER, getLookupController } from '../controllers/lookup.controller';
import { requestIdOf } from '../lib/requestId';

const router = express.Router();

router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const params: { sessionId?: string; requestId?: string } = {};
    const sessionId = req.get(SESSION_HEADER);
    const requestId = requestIdOf(req);
    if (sessionId) params.sessionId = sessionId;
    if (requestId) params.requestId = requestId;

    const result = await getLookupController(req.query, params);
    if (result.headers) res.set(result.headers);
    return res.status(result.statusCode).json(result.body);
  } catch (error) {
    return next(error);
  }
});

export default router;
