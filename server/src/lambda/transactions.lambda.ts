/**
 * Lambda 엔트리포인트: GET /api/v1/transactions
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { getTransactionsController } from '../controllers/transactions.controller';
import { logger } from '../lib/logger';
import { headerOf, isOptions, queryOf, toErrorResponse, toLambdaResponse, withCors } from './http';

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (isOptions(event)) {
    return { statusCode: 200, headers: withCors(), body: '' };
  }

  try {
    const result = await getTransactionsController(queryOf(event), headerOf(event, 'X-Request-ID'));
    return toLambdaResponse(result);
  } catch (error) {
    logger.error({ err: error, path: event.rawPath }, 'Error in transactions Lambda');
    return toErrorResponse();
  }
}
