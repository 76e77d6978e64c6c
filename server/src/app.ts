/**
 * Express 앱 설정
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './lib/logger';
import { rateLimiter } from './lib/rateLimit';
import { requestIdMiddleware } from './lib/requestId';
import geocodeRoutes from './routes/geocode.routes';
import transactionsRoutes from './routes/transactions.routes';
import lookupRoutes from './routes/lookup.routes';
import healthRoutes from './routes/health.routes';

const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    logger.info(
      {
        reqId: req.requestId,
        method: req.method,
        url: req.originalUrl ?? req.url,
        status: res.statusCode,
        duration: Date.now() - start,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
      },
      'Request completed'
    );
  });

  next();
};

const app = express();

// 보안 미들웨어
app.use(helmet({
  contentSecurityPolicy: false, // API 서버이므로 CSP 비활성화
  crossOriginEmbedderPolicy: false,
}));

// CORS 설정
const corsOrigins = process.env['CORS_ORIGINS']?.split(',') || ['http://localhost:3000'];
app.use(cors({
  origin: corsOrigins,
  credentials: true,
  methods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID', 'X-Session-ID'],
  exposedHeaders: ['X-Request-ID', 'X-Session-ID'],
}));

// Request ID 미들웨어
app.use(requestIdMiddleware);

// 로깅 미들웨어
app.use(requestLogger);
app.use(rateLimiter);

// API 라우트
app.use('/api/v1/geocode', geocodeRoutes);
app.use('/api/v1/transactions', transactionsRoutes);
app.use('/api/v1/lookup', lookupRoutes);
app.use('/api/v1/healthz', healthRoutes);
app.use('/health', healthRoutes);

// 루트 경로
app.get('/', (_req: Request, res: Response) => {
  res.json({
    service: 'Trade Price Lookup API',
    version: '1.0.0',
    status: 'running',
    timestamp: new Date().toISOString(),
    endpoints: {
      geocode: '/api/v1/geocode',
      transactions: '/api/v1/transactions',
      lookup: '/api/v1/lookup',
      health: '/api/v1/healthz',
    },
  });
});

// 404 핸들러
app.use('*', (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Not Found',
    message: `Route ${req.originalUrl} not found`,
    timestamp: new Date().toISOString(),
  });
});

// 전역 에러 핸들러
app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const reqId = req.requestId;

  logger.error({
    reqId,
    err: error,
    url: req.url,
    method: req.method,
  }, 'Unhandled error');

  const detail = error instanceof Error ? error.message : String(error);
  res.status(500).json({
    error: 'Internal Server Error',
    message: process.env['NODE_ENV'] === 'development' ? detail : 'Something went wrong',
    timestamp: new Date().toISOString(),
    ...(reqId ? { requestId: reqId } : {}),
  });
});

export default app;
