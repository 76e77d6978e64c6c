import express, { type Request, type Response } from 'express';
import { healthCheckController } from '../controllers/health.controller';
import { requestIdOf } from '../lib/requestId';

const router = express.Router();

router.get('/', async (req: Request, res: Response) => {
  try {
    const result = await healthCheckController(requestIdOf(req));
    return res.status(result.statusCode).json(result.body);
  } catch (error) {
    return res
      .status(500)
      .json({ ok: false, error: 'internal_error', message: error instanceof Error ? error.message : String(error) });
  }
});

export default router;
