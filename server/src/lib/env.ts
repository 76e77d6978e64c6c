// server/src/lib/env.ts
import type { GeocodePolicy } from '../types';

export type Env = {
  SERVICE_KEY: string;            // normalized (alias of DATA_GO_KR_API_KEY)
  KAKAO_REST_API_KEY: string;     // normalized (alias of KAKAO_API_KEY)
  VWORLD_API_KEY: string;         // normalized (alias of VWORLD_KEY)
  VWORLD_DOMAIN: string;
  KAKAO_BASE_URL: string;
  VWORLD_BASE_URL: string;
  RTMS_APT_URL: string;
  RTMS_OFFI_URL: string;
  RTMS_PAGE_SIZE: number;
  RTMS_MAX_PAGES: number;
  RTMS_SUCCESS_CODES: string[];
  GEOCODE_POLICY: GeocodePolicy;
  GEOCODE_TIMEOUT_MS: number;
  RTMS_TIMEOUT_MS: number;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  RETRY_MAX_DELAY_MS: number;
  CACHE_TTL_SEC: number;
  GEOCODE_CACHE_TTL_SEC: number;
  SESSION_TTL_SEC: number;
  RANGE_CONCURRENCY: number;
  USER_AGENT: string;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
};

function pick(...candidates: Array<string | undefined | null>): string {
  for (const c of candidates) if (c && c.trim().length > 0) return c.trim();
  return '';
}

function pickNumber(value: string | undefined | null, fallback: number): number {
  if (value == null) return fallback;
  const trimmed = value.trim();
  if (!trimmed) return fallback;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function pickPolicy(value: string | undefined | null): GeocodePolicy {
  const trimmed = (value || '').trim().toLowerCase();
  if (trimmed === 'kakao' || trimmed === 'vworld') {
    return trimmed;
  }
  return 'auto';
}

// "00,000,0," keeps the trailing empty entry: a missing resultCode counts as success.
function pickCodeList(value: string | undefined | null, fallback: string[]): string[] {
  if (value == null || value.trim() === '') return fallback;
  return value.split(',').map((code) => code.trim());
}

export const DEFAULT_SUCCESS_CODES = ['00', '000', '0', ''];

export const ENV: Env = {
  SERVICE_KEY: pick(process.env['SERVICE_KEY'], process.env['DATA_GO_KR_API_KEY']),
  KAKAO_REST_API_KEY: pick(process.env['KAKAO_REST_API_KEY'], process.env['KAKAO_API_KEY']),
  VWORLD_API_KEY: pick(process.env['VWORLD_API_KEY'], process.env['VWORLD_KEY']),
  VWORLD_DOMAIN: pick(process.env['VWORLD_DOMAIN']),
  KAKAO_BASE_URL: pick(process.env['KAKAO_BASE_URL'], 'https://dapi.kakao.com'),
  VWORLD_BASE_URL: pick(process.env['VWORLD_BASE_URL'], 'https://api.vworld.kr'),
  RTMS_APT_URL: pick(
    process.env['RTMS_APT_URL'],
    'https://apis.data.go.kr/1613000/RTMSDataSvcAptTrade/getRTMSDataSvcAptTrade'
  ),
  RTMS_OFFI_URL: pick(
    process.env['RTMS_OFFI_URL'],
    'https://apis.data.go.kr/1613000/RTMSDataSvcOffiTrade/getRTMSDataSvcOffiTrade'
  ),
  RTMS_PAGE_SIZE: pickNumber(process.env['RTMS_PAGE_SIZE'], 1000),
  RTMS_MAX_PAGES: pickNumber(process.env['RTMS_MAX_PAGES'], 10),
  RTMS_SUCCESS_CODES: pickCodeList(process.env['RTMS_SUCCESS_CODES'], DEFAULT_SUCCESS_CODES),
  GEOCODE_POLICY: pickPolicy(process.env['GEOCODE_POLICY']),
  GEOCODE_TIMEOUT_MS: pickNumber(process.env['GEOCODE_TIMEOUT_MS'], 10000),
  RTMS_TIMEOUT_MS: pickNumber(process.env['RTMS_TIMEOUT_MS'], 20000),
  RETRY_MAX_ATTEMPTS: pickNumber(process.env['RETRY_MAX_ATTEMPTS'], 3),
  RETRY_BASE_DELAY_MS: pickNumber(process.env['RETRY_BASE_DELAY_MS'], 300),
  RETRY_MAX_DELAY_MS: pickNumber(process.env['RETRY_MAX_DELAY_MS'], 1000),
  CACHE_TTL_SEC: pickNumber(process.env['CACHE_TTL_SEC'], 600),
  GEOCODE_CACHE_TTL_SEC: pickNumber(process.env['GEOCODE_CACHE_TTL_SEC'], 600),
  SESSION_TTL_SEC: pickNumber(process.env['SESSION_TTL_SEC'], 3600),
  RANGE_CONCURRENCY: pickNumber(process.env['RANGE_CONCURRENCY'], 4),
  USER_AGENT: pick(process.env['USER_AGENT'], 'trade-price-lookup/1.0'),
  RATE_LIMIT_WINDOW_MS: pickNumber(process.env['RATE_LIMIT_WINDOW_MS'], 60000),
  RATE_LIMIT_MAX: pickNumber(process.env['RATE_LIMIT_MAX'], 120),
};
