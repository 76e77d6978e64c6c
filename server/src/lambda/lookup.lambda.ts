/**
 * Lambda 엔트리포인트: GET /api/v1/lookup
 * 세션 상태는 컨테이너 메모리에 있으므로 같은 컨테이너로 들어온 요청끼리만 이어진다.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { SESSION_HEADER, getLookupController } from '../controllers/lookup.controller';
import { logger } from '../lib/logger';
import { headerOf, isOptions, queryOf, toErrorResponse, toLambdaResponse, withCors } from './http';

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (isOptions(event)) {
    return { statusCode: 200, headers: withCors(), body: '' };
  }

  try {
    const params: { sessionId?: string; requestId?: string } = {};
    const sessionId = headerOf(event, SESSION_HEADER);
    const requestId = headerOf(event, 'X-Request-ID');
    if (sessionId) params.sessionId = sessionId;
    if (requestId) params.requestId = requestId;

    const result = await getLookupController(queryOf(event), params);
    return toLambdaResponse(result);
  } catch (error) {
    logger.error({ err: error, path: event.rawPath }, 'Error in lookup Lambda');
    return toErrorResponse();
  }
}
