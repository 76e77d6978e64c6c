/**
 * 서버 시작점
 */

import 'dotenv/config';
import app from './app';
import { logger } from './lib/logger';
import { ENV } from './lib/env';
import { keyFingerprint, looksUrlEncoded } from './lib/serviceKey';

const PORT = Number(process.env['PORT'] ?? 8787);
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const shouldStart = !process.env['JEST_WORKER_ID'];

type CredentialConfig = {
  source: 'rtms' | 'kakao' | 'vworld';
  envVars: string[];
  value: string;
};

const credentials: CredentialConfig[] = [
  { source: 'rtms', envVars: ['SERVICE_KEY', 'DATA_GO_KR_API_KEY'], value: ENV.SERVICE_KEY },
  { source: 'kakao', envVars: ['KAKAO_REST_API_KEY', 'KAKAO_API_KEY'], value: ENV.KAKAO_REST_API_KEY },
  { source: 'vworld', envVars: ['VWORLD_API_KEY', 'VWORLD_KEY'], value: ENV.VWORLD_API_KEY },
];

if (shouldStart) {
  logger.info({ geocodePolicy: ENV.GEOCODE_POLICY }, `Booting server with GEOCODE_POLICY=${ENV.GEOCODE_POLICY}`);

  credentials.forEach(({ source, envVars, value }) => {
    const label = source.toUpperCase();

    if (!value) {
      logger.warn({ source, envVars }, `${label} credential missing; calls will report missing_api_key.`);
      return;
    }

    logger.info(
      { source, key: keyFingerprint(value), encoded: looksUrlEncoded(value) },
      `${label} credential configured.`
    );
  });
}

let server: ReturnType<typeof app.listen> | undefined;

if (shouldStart) {
  server = app.listen(PORT, () => {
    logger.info(
      {
        port: PORT,
        environment: NODE_ENV,
        nodeVersion: process.version,
        pid: process.pid,
      },
      'Server started successfully'
    );
  });
}

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info({ signal }, 'Received shutdown signal');

  server?.close(() => {
    logger.info('Server closed successfully');
    process.exit(0);
  });

  // 강제 종료 타임아웃
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

if (shouldStart) {
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  // 처리되지 않은 예외 처리
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });
}

export default server;
