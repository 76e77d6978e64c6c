import type { AxiosInstance } from 'axios';
import { ENV } from '../lib/env';
import { http as sharedHttp, joinUrl, toFailure } from '../lib/http';
import { ResultCache } from '../lib/cache';
import { logger } from '../lib/logger';
import { roundedCoordinateKey } from '../lib/util';
import {
  VWORLD_ADDRESS_TYPES,
  extractVworldCode,
  failedResult,
  failureFromError,
  okResult,
  parseJsonPayload,
  vworldStatus,
  type VworldAddressType,
} from '../lib/geocode.util';
import type { Failure } from '../lib/errors';
import type { Coordinates, GeocodeProvider, GeocodeResult } from '../types';

const GET_ADDRESS_PATH = '/req/address';

export type VworldAdapterOptions = {
  apiKey?: string;
  baseUrl?: string;
  domain?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  cache?: ResultCache<GeocodeResult>;
  addressTypes?: readonly VworldAddressType[];
};

type AttemptResult =
  | { done: true; result: GeocodeResult }
  | { done: false; note: string; failure: Failure };

/**
 * 국토부 VWorld 주소 API (역지오코딩). 주소 유형별로 응답이 비는 좌표가 있어
 * PARCEL -> BOTH -> ROAD 순서로 코드를 찾을 때까지 재요청한다.
 */
export class VworldAdapter implements GeocodeProvider {
  readonly name = 'vworld' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly domain: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly cache: ResultCache<GeocodeResult>;
  private readonly addressTypes: readonly VworldAddressType[];

  constructor(options: VworldAdapterOptions = {}) {
    this.apiKey = options.apiKey ?? ENV.VWORLD_API_KEY;
    this.baseUrl = options.baseUrl ?? ENV.VWORLD_BASE_URL;
    this.domain = options.domain ?? ENV.VWORLD_DOMAIN;
    this.timeoutMs = options.timeoutMs ?? ENV.GEOCODE_TIMEOUT_MS;
    this.http = options.http ?? sharedHttp;
    this.cache = options.cache ?? new ResultCache<GeocodeResult>(ENV.GEOCODE_CACHE_TTL_SEC);
    this.addressTypes = options.addressTypes ?? VWORLD_ADDRESS_TYPES;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async reverseLookup(coord: Coordinates): Promise<GeocodeResult> {
    if (!this.isConfigured()) {
      logger.warn({ adapter: 'vworld', op: 'reverseLookup' }, 'VWorld API key missing');
      return failedResult(this.name, { kind: 'config_error', message: 'VWORLD_API_KEY is not configured' });
    }

    return this.cache.getOrFetch(
      `vworld:${roundedCoordinateKey(coord)}`,
      () => this.lookupLive(coord),
      { shouldCache: (result) => result.code != null }
    );
  }

  private async lookupLive(coord: Coordinates): Promise<GeocodeResult> {
    const notes: string[] = [];
    let lastFailure: Failure = { kind: 'parse_error', message: 'no address type attempted' };

    for (const type of this.addressTypes) {
      const attempt = await this.tryAddressType(coord, type);
      if (attempt.done) {
        if (notes.length === 0) return attempt.result;
        return { ...attempt.result, diagnostic: `${notes.join('; ')}; ${attempt.result.diagnostic}` };
      }

      notes.push(`vworld[${type}]: ${attempt.note}`);
      lastFailure = attempt.failure;
      // transport failures are not type specific; the HTTP layer already retried
      if (attempt.failure.kind === 'network_error' || attempt.failure.kind === 'http_error') break;
    }

    const failed = failedResult(this.name, lastFailure);
    return { ...failed, diagnostic: notes.length ? notes.join('; ') : failed.diagnostic };
  }

  private async tryAddressType(coord: Coordinates, type: VworldAddressType): Promise<AttemptResult> {
    const params: Record<string, string> = {
      service: 'address',
      request: 'getAddress',
      version: '2.0',
      crs: 'epsg:4326',
      point: `${coord.lon},${coord.lat}`,
      format: 'json',
      type,
      zipcode: 'false',
      simple: 'false',
      key: this.apiKey,
    };
    if (this.domain) {
      params['domain'] = this.domain;
    }

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(joinUrl(this.baseUrl, GET_ADDRESS_PATH), {
        params,
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      const failure = toFailure(error);
      logger.warn(
        { adapter: 'vworld', op: 'reverseLookup', type, kind: failure.kind, status: failure.status, coord },
        'VWorld getAddress request failed'
      );
      return { done: false, note: `${failure.kind}${failure.status ? ` ${failure.status}` : ''}: ${failure.message}`, failure };
    }

    try {
      const payload = parseJsonPayload(data, this.name);
      const { status, message } = vworldStatus(payload);
      if (status !== 'OK') {
        const failure: Failure = { kind: 'upstream_error', code: status, message: message ?? `status ${status}` };
        return { done: false, note: `status ${status || '(empty)'}${message ? ` (${message})` : ''}`, failure };
      }

      const match = extractVworldCode(payload);
      if (!match) {
        return {
          done: false,
          note: 'no district code in payload',
          failure: { kind: 'parse_error', message: 'no district code in payload' },
        };
      }

      if (match.via !== 'structure') {
        logger.info({ adapter: 'vworld', type, via: match.via, code: match.code }, 'VWorld code recovered by digit scan');
      }
      return { done: true, result: okResult(this.name, match.code, match.label, `${type} via ${match.via}`) };
    } catch (error) {
      const failure = failureFromError(error);
      return { done: false, note: `${failure.kind}: ${failure.message}`, failure };
    }
  }
}

export const vworldAdapter = new VworldAdapter();
