import axios, { type AxiosInstance } from 'axios';
import { ENV } from '../lib/env';
import { http as sharedHttp, toFailure } from '../lib/http';
import { ResultCache } from '../lib/cache';
import { logger } from '../lib/logger';
import { describeFailure, UpstreamError, type Failure } from '../lib/errors';
import { isYearMonth } from '../lib/util';
import { keyFingerprint, looksUrlEncoded, serviceKeyVariants } from '../lib/serviceKey';
import {
  extractHeader,
  isKeyRejection,
  isSuccessCode,
  parseRtmsBody,
  parseRtmsPage,
  toTransactionRecord,
  type RtmsPage,
} from '../lib/rtms.util';
import {
  ADMIN_CODE_PATTERN,
  type FetchFailure,
  type FetchOutcome,
  type ProductType,
  type TransactionRecord,
} from '../types';

export type RtmsAdapterOptions = {
  serviceKey?: string;
  endpoints?: Partial<Record<ProductType, string>>;
  pageSize?: number;
  maxPages?: number;
  successCodes?: readonly string[];
  timeoutMs?: number;
  cacheTtlSec?: number;
  http?: AxiosInstance;
  cache?: ResultCache<FetchOutcome>;
};

type PageResult = { ok: true; page: RtmsPage } | FetchFailure;

const KEY_REJECTION_STATUSES = [401, 403];

export const failureOutcome = (failure: Failure): FetchFailure => ({
  ok: false,
  failure,
  records: [],
  resultCode: failure.code ?? '',
  resultMessage: failure.message,
  totalCount: 0,
});

/** 다음 serviceKey 형태로 넘어갈 실패인지 (이중 인코딩/미인코딩 불일치 신호) */
export function shouldTryNextKey(failure: Failure): boolean {
  if (failure.kind === 'http_error' && failure.status != null && KEY_REJECTION_STATUSES.includes(failure.status)) {
    return true;
  }
  return (
    (failure.kind === 'upstream_error' || failure.kind === 'http_error') &&
    isKeyRejection(failure.code ?? '', failure.message)
  );
}

/**
 * 국토교통부 실거래가(RTMS) 조회. 한 번의 fetchMonth 는 (엔드포인트, 시군구, 계약년월) 하나를 담당한다.
 */
export class RtmsAdapter {
  private readonly serviceKey: string;
  private readonly endpoints: Record<ProductType, string>;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly successCodes: readonly string[];
  private readonly timeoutMs: number;
  private readonly cacheTtlSec: number;
  private readonly http: AxiosInstance;
  private readonly cache: ResultCache<FetchOutcome>;

  constructor(options: RtmsAdapterOptions = {}) {
    this.serviceKey = options.serviceKey ?? ENV.SERVICE_KEY;
    this.endpoints = {
      apt: options.endpoints?.apt ?? ENV.RTMS_APT_URL,
      offi: options.endpoints?.offi ?? ENV.RTMS_OFFI_URL,
    };
    this.pageSize = Math.max(1, options.pageSize ?? ENV.RTMS_PAGE_SIZE);
    this.maxPages = Math.max(1, options.maxPages ?? ENV.RTMS_MAX_PAGES);
    this.successCodes = options.successCodes ?? ENV.RTMS_SUCCESS_CODES;
    this.timeoutMs = options.timeoutMs ?? ENV.RTMS_TIMEOUT_MS;
    this.cacheTtlSec = options.cacheTtlSec ?? ENV.CACHE_TTL_SEC;
    this.http = options.http ?? sharedHttp;
    this.cache = options.cache ?? new ResultCache<FetchOutcome>(this.cacheTtlSec);
  }

  hasServiceKey(): boolean {
    return serviceKeyVariants(this.serviceKey).length > 0;
  }

  endpointFor(product: ProductType): string {
    return this.endpoints[product];
  }

  async fetchProductMonth(product: ProductType, lawdCd: string, ym: string): Promise<FetchOutcome> {
    return this.fetchMonth(this.endpointFor(product), lawdCd, ym, this.serviceKey, product);
  }

  async fetchMonth(
    endpoint: string,
    lawdCd: string,
    ym: string,
    serviceKey: string = this.serviceKey,
    product: ProductType = this.productFor(endpoint)
  ): Promise<FetchOutcome> {
    if (!ADMIN_CODE_PATTERN.test(lawdCd)) {
      return failureOutcome({ kind: 'config_error', message: `LAWD_CD "${lawdCd}" must be 5 or 10 digits` });
    }
    if (!isYearMonth(ym)) {
      return failureOutcome({ kind: 'config_error', message: `DEAL_YMD "${ym}" must be YYYYMM` });
    }

    const variants = serviceKeyVariants(serviceKey);
    if (!variants.length) {
      return failureOutcome({ kind: 'config_error', message: 'SERVICE_KEY is not configured' });
    }

    const lawd5 = lawdCd.slice(0, 5);
    const cacheKey = `rtms:${endpoint}:${lawd5}:${ym}:${keyFingerprint(serviceKey)}`;

    return this.cache.getOrFetch(
      cacheKey,
      () => this.fetchWithKeyVariants(endpoint, product, lawd5, ym, variants, serviceKey),
      { ttlSec: this.cacheTtlSec, shouldCache: (outcome) => outcome.ok }
    );
  }

  private productFor(endpoint: string): ProductType {
    return endpoint === this.endpoints.offi ? 'offi' : 'apt';
  }

  private async fetchWithKeyVariants(
    endpoint: string,
    product: ProductType,
    lawd5: string,
    ym: string,
    variants: string[],
    serviceKey: string
  ): Promise<FetchOutcome> {
    const logContext = {
      adapter: 'rtms',
      product,
      lawdCd: lawd5,
      ym,
      key: keyFingerprint(serviceKey),
      encodedInput: looksUrlEncoded(serviceKey),
    };

    let outcome = await this.fetchAllPages(endpoint, product, lawd5, ym, variants[0] ?? '', 0);
    for (let index = 1; index < variants.length && !outcome.ok && shouldTryNextKey(outcome.failure); index += 1) {
      logger.warn(
        { ...logContext, variant: index, previous: describeFailure(outcome.failure) },
        'RTMS rejected serviceKey form; trying next variant'
      );
      outcome = await this.fetchAllPages(endpoint, product, lawd5, ym, variants[index] ?? '', index);
    }

    if (outcome.ok) {
      logger.debug(
        { ...logContext, variant: outcome.keyVariant, count: outcome.records.length, totalCount: outcome.totalCount },
        'RTMS month fetched'
      );
    } else {
      logger.warn({ ...logContext, failure: describeFailure(outcome.failure) }, 'RTMS month failed');
    }
    return outcome;
  }

  private async fetchAllPages(
    endpoint: string,
    product: ProductType,
    lawd5: string,
    ym: string,
    key: string,
    keyVariant: number
  ): Promise<FetchOutcome> {
    const records: TransactionRecord[] = [];
    let resultCode = '';
    let resultMessage = '';
    let totalCount = 0;
    let pageNo = 1;

    for (;;) {
      const result = await this.fetchPage(endpoint, lawd5, ym, key, pageNo);
      if (!result.ok) return result;

      const { page } = result;
      resultCode = page.resultCode;
      resultMessage = page.resultMessage;
      totalCount = page.totalCount;
      records.push(...page.items.map((item) => toTransactionRecord(item, { product, lawdCd: lawd5, ym })));

      if (records.length >= totalCount || page.items.length === 0 || pageNo >= this.maxPages) break;
      pageNo += 1;
    }

    return { ok: true, records, resultCode, resultMessage, totalCount, keyVariant, pages: pageNo };
  }

  private async fetchPage(endpoint: string, lawd5: string, ym: string, key: string, pageNo: number): Promise<PageResult> {
    // serviceKey goes into the URL as-is; params would percent-encode it a second time
    const url = `${endpoint}${endpoint.includes('?') ? '&' : '?'}serviceKey=${key}`;

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        params: { LAWD_CD: lawd5, DEAL_YMD: ym, numOfRows: this.pageSize, pageNo },
        timeout: this.timeoutMs,
        responseType: 'text',
      });
      data = response.data;
    } catch (error) {
      return failureOutcome(this.withEmbeddedHeader(toFailure(error), error));
    }

    let page: RtmsPage | undefined;
    try {
      page = parseRtmsPage(parseRtmsBody(data));
    } catch (error) {
      const message = error instanceof UpstreamError || error instanceof Error ? error.message : String(error);
      return failureOutcome({ kind: 'parse_error', message });
    }

    if (!page) {
      return failureOutcome({ kind: 'parse_error', message: 'RTMS payload has neither header nor body' });
    }

    if (!isSuccessCode(page.resultCode, this.successCodes)) {
      return failureOutcome({
        kind: 'upstream_error',
        code: page.resultCode,
        message: page.resultMessage || `resultCode ${page.resultCode}`,
      });
    }

    return { ok: true, page };
  }

  /** HTTP 오류 응답에도 XML header 가 들어있는 경우가 있어 코드/메시지를 살린다. */
  private withEmbeddedHeader(failure: Failure, error: unknown): Failure {
    if (failure.kind !== 'http_error' || !axios.isAxiosError(error) || error.response == null) {
      return failure;
    }
    try {
      const header = extractHeader(parseRtmsBody(error.response.data));
      if (header && header.resultCode) {
        return { ...failure, code: header.resultCode, message: header.resultMessage || failure.message };
      }
    } catch {
      // body was not a structured payload; keep the snippet
    }
    return failure;
  }
}

export const rtmsAdapter = new RtmsAdapter();
