/**
 * Lambda 공통 HTTP 헬퍼: CORS 헤더 + 컨트롤러 응답 변환.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import type { ControllerResult } from '../controllers/types';

const defaultHeaders = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Request-ID,X-Session-ID',
  'Access-Control-Expose-Headers': 'X-Request-ID,X-Session-ID',
  'Access-Control-Allow-Methods': 'GET,OPTIONS',
};

export function withCors(headers?: Record<string, string>): Record<string, string> {
  return { ...defaultHeaders, ...(headers ?? {}) };
}

export function toLambdaResponse(result: ControllerResult): APIGatewayProxyResultV2 {
  return {
    statusCode: result.statusCode,
    headers: withCors(result.headers),
    body: JSON.stringify(result.body),
  };
}

export function toErrorResponse(
  statusCode = 500,
  body: Record<string, unknown> = {
    error: 'internal_error',
    message: 'Unexpected error in Lambda handler',
  }
): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: withCors(),
    body: JSON.stringify(body),
  };
}

export function isOptions(event: APIGatewayProxyEventV2): boolean {
  return event.requestContext?.http?.method?.toUpperCase() === 'OPTIONS';
}

/** API Gateway v2 는 헤더 이름을 소문자로 넘기지만 직접 호출한 이벤트는 아닐 수 있다. */
export function headerOf(event: APIGatewayProxyEventV2, name: string): string | undefined {
  const headers = event.headers ?? {};
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value) return value;
  }
  return undefined;
}

export function queryOf(event: APIGatewayProxyEventV2): Record<string, string | undefined> {
  return event.queryStringParameters ?? {};
}
