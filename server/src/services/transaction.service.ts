/**
 * 실거래 범위 조회: (종료 계약년월, 개월 수, 상품) -> 월별 호출을 워커 풀로 돌려 병합한다.
 * 한 달 실패는 범위 전체를 멈추지 않는다.
 */

import { rtmsAdapter, type RtmsAdapter } from '../adapters/rtms.adapter';
import { ENV } from '../lib/env';
import { logger } from '../lib/logger';
import { describeFailure, failureToStatus, type Failure, type SourceStatus } from '../lib/errors';
import { sortByDealDateDesc } from '../lib/rtms.util';
import { mapWithConcurrency, yearMonthsBack } from '../lib/util';
import type { CallOutcome, ProductType, RangeRequest, RangeResult, TransactionRecord } from '../types';

/** 결과가 비었을 때 한 번씩만 넓혀보는 개월 수 단계 */
export const EXPANSION_LADDER: readonly number[] = [24, 36, 48, 60];

export const MAX_MONTHS_BACK = 60;

export type TransactionServiceOptions = {
  fetcher?: Pick<RtmsAdapter, 'fetchProductMonth' | 'hasServiceKey'>;
  concurrency?: number;
};

type Call = { product: ProductType; ym: string };

export function summarize(succeeded: number, attempted: number, lastFailure?: Failure): string {
  const base = `${succeeded}/${attempted} calls succeeded`;
  return lastFailure ? `${base} (last failure: ${describeFailure(lastFailure)})` : base;
}

function rangeStatus(attempted: number, succeeded: number, lastFailure?: Failure): SourceStatus {
  if (attempted > 0 && succeeded === attempted) return 'ok';
  if (succeeded > 0) return 'degraded';
  return lastFailure ? failureToStatus(lastFailure.kind) : 'error';
}

const allFailed = (result: RangeResult): boolean => result.attempted > 0 && result.succeeded === 0;

export class TransactionService {
  private readonly fetcher: Pick<RtmsAdapter, 'fetchProductMonth' | 'hasServiceKey'>;
  private readonly concurrency: number;

  constructor(options: TransactionServiceOptions = {}) {
    this.fetcher = options.fetcher ?? rtmsAdapter;
    this.concurrency = options.concurrency ?? ENV.RANGE_CONCURRENCY;
  }

  async fetchRange(request: RangeRequest): Promise<RangeResult> {
    const lawdCd = request.lawdCd.slice(0, 5);
    const months = yearMonthsBack(request.endYm, Math.min(request.monthsBack, MAX_MONTHS_BACK));
    const base = {
      lawdCd,
      endYm: request.endYm,
      monthsBack: months.length,
      months,
      products: request.products,
    };

    if (!this.fetcher.hasServiceKey()) {
      const failure: Failure = { kind: 'config_error', message: 'SERVICE_KEY is not configured' };
      logger.warn({ op: 'fetchRange', lawdCd }, 'RTMS service key missing; range skipped');
      return {
        ...base,
        records: [],
        outcomes: [],
        attempted: 0,
        succeeded: 0,
        withData: 0,
        source_status: 'missing_api_key',
        summary: failure.message,
        lastFailure: failure,
      };
    }

    const calls: Call[] = request.products.flatMap((product) => months.map((ym) => ({ product, ym })));
    const started = Date.now();

    const outcomes = await mapWithConcurrency(calls, this.concurrency, async ({ product, ym }) => {
      const outcome = await this.fetcher.fetchProductMonth(product, lawdCd, ym);
      return { call: { product, ym }, outcome };
    });

    const records: TransactionRecord[] = [];
    const callOutcomes: CallOutcome[] = [];
    let lastFailure: Failure | undefined;

    for (const { call, outcome } of outcomes) {
      const entry: CallOutcome = {
        product: call.product,
        ym: call.ym,
        ok: outcome.ok,
        count: outcome.records.length,
        totalCount: outcome.totalCount,
        resultCode: outcome.resultCode,
        resultMessage: outcome.resultMessage,
      };
      if (outcome.ok) {
        records.push(...outcome.records);
      } else {
        entry.failure = outcome.failure;
        lastFailure = outcome.failure;
      }
      callOutcomes.push(entry);
    }

    const attempted = callOutcomes.length;
    const succeeded = callOutcomes.filter((entry) => entry.ok).length;
    const withData = callOutcomes.filter((entry) => entry.ok && entry.count > 0).length;

    const result: RangeResult = {
      ...base,
      records: sortByDealDateDesc(records),
      outcomes: callOutcomes,
      attempted,
      succeeded,
      withData,
      source_status: rangeStatus(attempted, succeeded, lastFailure),
      summary: summarize(succeeded, attempted, lastFailure),
    };
    if (lastFailure) {
      result.lastFailure = lastFailure;
    }

    logger.info(
      {
        op: 'fetchRange',
        lawdCd,
        endYm: request.endYm,
        months: months.length,
        attempted,
        succeeded,
        withData,
        records: records.length,
        durationMs: Date.now() - started,
      },
      'RTMS range fetched'
    );
    return result;
  }

  /**
   * 결과가 비어 있으면 요청 창보다 큰 단계만 골라 한 번씩 다시 조회한다. 재귀 없음.
   * 성공한 호출이 하나도 없으면 빈 구역이 아니라 실패이므로 넓히지 않는다.
   */
  async fetchRangeWithExpansion(request: RangeRequest): Promise<RangeResult> {
    const first = await this.fetchRange(request);
    if (first.records.length > 0 || first.source_status === 'missing_api_key' || allFailed(first)) {
      return first;
    }

    let latest = first;
    for (const monthsBack of EXPANSION_LADDER) {
      if (monthsBack <= latest.monthsBack) continue;

      logger.info(
        { op: 'fetchRange', lawdCd: first.lawdCd, from: first.monthsBack, to: monthsBack },
        'Empty range; expanding window'
      );
      latest = await this.fetchRange({ ...request, monthsBack });
      latest.expandedFrom = first.monthsBack;
      if (latest.records.length > 0 || allFailed(latest)) break;
    }
    return latest;
  }
}

export const transactionService = new TransactionService();
