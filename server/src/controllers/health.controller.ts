/**
 * Health 컨트롤러: 기본 헬스체크 + 자격 증명 설정 여부.
 */

import { logger } from '../lib/logger';
import { ENV } from '../lib/env';
import { ControllerResult } from './types';

export function credentialStatus() {
  return {
    rtms: ENV.SERVICE_KEY.length > 0,
    kakao: ENV.KAKAO_REST_API_KEY.length > 0,
    vworld: ENV.VWORLD_API_KEY.length > 0,
  };
}

export async function healthCheckController(requestId?: string): Promise<ControllerResult> {
  try {
    const healthData = {
      ok: true,
      time: new Date().toISOString(),
      uptime: process.uptime(),
      memory: process.memoryUsage(),
      version: process.env['npm_package_version'] || '1.0.0',
      environment: process.env['NODE_ENV'] || 'development',
      geocodePolicy: ENV.GEOCODE_POLICY,
      credentials: credentialStatus(),
    };

    logger.debug({ reqId: requestId, uptime: healthData.uptime }, 'Health check completed');

    return { statusCode: 200, body: healthData };
  } catch (error) {
    logger.error({
      reqId: requestId,
      error: error instanceof Error ? error.message : 'Unknown error',
    }, 'Health check failed');

    return {
      statusCode: 500,
      body: {
        ok: false,
        time: new Date().toISOString(),
        error: 'Health check failed',
      },
    };
  }
}
