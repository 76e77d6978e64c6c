/**
 * 좌표 -> 법정동코드 -> 실거래 범위 조회.
 * 상태는 호출자가 넘긴 AppState 에만 읽고 쓴다.
 */

import { logger } from '../lib/logger';
import { geocodeService, type GeocodeService } from './geocode.service';
import { transactionService, type TransactionService } from './transaction.service';
import type { AppState, Coordinates, GeocodePolicy, ProductType, RangeResult, ResolvedGeocode } from '../types';

export const SERVED_PREVIOUS_RESULT = 'served_previous_result';

const MAX_DIAGNOSTICS = 20;

export type LookupInput = {
  coordinate?: Coordinates;
  policy?: GeocodePolicy;
  endYm: string;
  monthsBack: number;
  products: ProductType[];
  autoExpand: boolean;
};

export type LookupOutcome =
  | { status: 'missing_coordinate'; warnings: string[] }
  | { status: 'geocode_failed'; geocode: ResolvedGeocode; warnings: string[] }
  | { status: 'ok'; geocode: ResolvedGeocode; range: RangeResult; servedPrevious: boolean; warnings: string[] };

export type LookupServiceOptions = {
  geocoder?: Pick<GeocodeService, 'resolve'>;
  transactions?: Pick<TransactionService, 'fetchRange' | 'fetchRangeWithExpansion'>;
};

function pushDiagnostic(state: AppState, line: string) {
  state.diagnostics.push(line);
  if (state.diagnostics.length > MAX_DIAGNOSTICS) {
    state.diagnostics.splice(0, state.diagnostics.length - MAX_DIAGNOSTICS);
  }
}

export class LookupService {
  private readonly geocoder: Pick<GeocodeService, 'resolve'>;
  private readonly transactions: Pick<TransactionService, 'fetchRange' | 'fetchRangeWithExpansion'>;

  constructor(options: LookupServiceOptions = {}) {
    this.geocoder = options.geocoder ?? geocodeService;
    this.transactions = options.transactions ?? transactionService;
  }

  async lookup(state: AppState, input: LookupInput): Promise<LookupOutcome> {
    const warnings: string[] = [];

    // 요청에 좌표가 없으면 세션에 고정된 좌표로 다시 조회
    const coordinate = input.coordinate ?? state.coordinate;
    if (!coordinate) {
      return { status: 'missing_coordinate', warnings };
    }
    if (!input.coordinate) {
      warnings.push('used_pinned_coordinate');
    }

    const geocode = await this.geocoder.resolve(coordinate, input.policy);
    state.lastGeocode = geocode;
    pushDiagnostic(state, geocode.diagnostic);

    // 코드가 나온 좌표만 고정한다. 실패하면 이전 좌표/코드/결과 묶음을 그대로 둔다
    if (!geocode.code) {
      return { status: 'geocode_failed', geocode, warnings };
    }

    state.coordinate = coordinate;
    state.adminCode = geocode.code;
    if (geocode.label) {
      state.label = geocode.label;
    } else {
      delete state.label;
    }

    const request = {
      lawdCd: geocode.code,
      endYm: input.endYm,
      monthsBack: input.monthsBack,
      products: input.products,
    };
    const range = input.autoExpand
      ? await this.transactions.fetchRangeWithExpansion(request)
      : await this.transactions.fetchRange(request);
    pushDiagnostic(state, range.summary);

    const previous = state.lastRange;
    const totalFailure = range.attempted > 0 && range.succeeded === 0;
    if (totalFailure && previous && previous.lawdCd === range.lawdCd) {
      logger.warn(
        { op: 'lookup', lawdCd: range.lawdCd, summary: range.summary },
        'Every call failed; serving previous range for this district'
      );
      warnings.push(SERVED_PREVIOUS_RESULT);
      return { status: 'ok', geocode, range: previous, servedPrevious: true, warnings };
    }

    state.lastRange = range;
    return { status: 'ok', geocode, range, servedPrevious: false, warnings };
  }
}

export const lookupService = new LookupService();
