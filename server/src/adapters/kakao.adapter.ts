import type { AxiosInstance } from 'axios';
import { ENV } from '../lib/env';
import { http as sharedHttp, joinUrl, toFailure } from '../lib/http';
import { ResultCache } from '../lib/cache';
import { logger } from '../lib/logger';
import { roundedCoordinateKey } from '../lib/util';
import { failedResult, failureFromError, mapKakaoRegion, okResult, parseJsonPayload } from '../lib/geocode.util';
import type { Coordinates, GeocodeProvider, GeocodeResult } from '../types';

const COORD2REGION_PATH = '/v2/local/geo/coord2regioncode.json';

export type KakaoAdapterOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  cache?: ResultCache<GeocodeResult>;
};

/**
 * 카카오 로컬 API: 좌표 -> 법정동코드(10자리) + "시도 시군구 읍면동" 라벨
 */
export class KakaoAdapter implements GeocodeProvider {
  readonly name = 'kakao' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly cache: ResultCache<GeocodeResult>;

  constructor(options: KakaoAdapterOptions = {}) {
    this.apiKey = options.apiKey ?? ENV.KAKAO_REST_API_KEY;
    this.baseUrl = options.baseUrl ?? ENV.KAKAO_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? ENV.GEOCODE_TIMEOUT_MS;
    this.http = options.http ?? sharedHttp;
    this.cache = options.cache ?? new ResultCache<GeocodeResult>(ENV.GEOCODE_CACHE_TTL_SEC);
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async reverseLookup(coord: Coordinates): Promise<GeocodeResult> {
    if (!this.isConfigured()) {
      logger.warn({ adapter: 'kakao', op: 'reverseLookup' }, 'Kakao REST API key missing');
      return failedResult(this.name, { kind: 'config_error', message: 'KAKAO_REST_API_KEY is not configured' });
    }

    return this.cache.getOrFetch(
      `kakao:${roundedCoordinateKey(coord)}`,
      () => this.lookupLive(coord),
      { shouldCache: (result) => result.code != null }
    );
  }

  private async lookupLive(coord: Coordinates): Promise<GeocodeResult> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(joinUrl(this.baseUrl, COORD2REGION_PATH), {
        headers: { Authorization: `KakaoAK ${this.apiKey}` },
        params: { x: coord.lon, y: coord.lat },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      const failure = toFailure(error);
      logger.warn(
        { adapter: 'kakao', op: 'reverseLookup', kind: failure.kind, status: failure.status, coord },
        'Kakao coord2regioncode request failed'
      );
      return failedResult(this.name, failure);
    }

    try {
      const region = mapKakaoRegion(parseJsonPayload(data, this.name));
      logger.debug({ adapter: 'kakao', code: region.code, regionType: region.regionType }, 'Kakao region resolved');
      return okResult(this.name, region.code, region.label, `region_type ${region.regionType}`);
    } catch (error) {
      const failure = failureFromError(error);
      logger.warn({ adapter: 'kakao', op: 'reverseLookup', error: failure.message, coord }, 'Kakao payload rejected');
      return failedResult(this.name, failure);
    }
  }
}

export const kakaoAdapter = new KakaoAdapter();
