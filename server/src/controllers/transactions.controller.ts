/**
 * Transactions 컨트롤러: 시군구코드 직접 입력 -> 기간 실거래 조회.
 */

import { logger } from '../lib/logger';
import { transactionService } from '../services/transaction.service';
import type { RangeResult } from '../types';
import { ControllerResult } from './types';
import { TransactionsQuerySchema, invalidRequest, productsFor, resolveEndYm, type QueryInput } from './query';

/** 레코드는 limit 개까지만 싣고 전체 건수는 meta 에 남긴다. */
export function toRangeBody(range: RangeResult, limit: number) {
  const records = range.records.slice(0, limit);
  return {
    data: {
      lawdCd: range.lawdCd,
      endYm: range.endYm,
      months: range.months,
      products: range.products,
      records,
      outcomes: range.outcomes,
    },
    meta: {
      source_status: range.source_status,
      summary: range.summary,
      attempted: range.attempted,
      succeeded: range.succeeded,
      withData: range.withData,
      total: range.records.length,
      returned: records.length,
      truncated: records.length < range.records.length,
      ...(range.lastFailure ? { lastFailure: range.lastFailure } : {}),
      ...(range.expandedFrom != null ? { expandedFrom: range.expandedFrom } : {}),
    },
  };
}

/** 범위 결과의 HTTP 상태. 성공한 호출이 하나도 없으면 오류로 본다. */
export function rangeErrorResult(range: RangeResult): ControllerResult | undefined {
  if (range.source_status === 'missing_api_key') {
    return {
      statusCode: 503,
      body: { error: 'missing_api_key', message: range.summary },
    };
  }
  if (range.attempted > 0 && range.succeeded === 0) {
    return {
      statusCode: 502,
      body: { error: 'upstream_error', message: range.summary, details: range.outcomes },
    };
  }
  return undefined;
}

export async function getTransactionsController(query: QueryInput, requestId?: string): Promise<ControllerResult> {
  const parsed = TransactionsQuerySchema.safeParse(query);
  if (!parsed.success) {
    logger.warn({ reqId: requestId, errors: parsed.error.errors }, 'Invalid transactions query');
    return invalidRequest(parsed.error.errors, 'Provide lawdCd=<5|10 digits>, optional endYm=YYYYMM and months=1..60.');
  }

  const { lawdCd, endYm, months, product, autoExpand, limit } = parsed.data;
  const request = {
    lawdCd,
    endYm: resolveEndYm(endYm),
    monthsBack: months,
    products: productsFor(product),
  };

  logger.info({ reqId: requestId, ...request, autoExpand }, 'Transactions request received');

  const range = autoExpand
    ? await transactionService.fetchRangeWithExpansion(request)
    : await transactionService.fetchRange(request);

  return rangeErrorResult(range) ?? { statusCode: 200, body: toRangeBody(range, limit) };
}
