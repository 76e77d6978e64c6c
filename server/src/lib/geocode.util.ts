import { UpstreamError, describeFailure, failureToStatus, type Failure } from './errors';
import { toText } from './rtms.util';
import { ADMIN_CODE_PATTERN, type GeocodeProviderName, type GeocodeResult } from '../types';

type Payload = Record<string, unknown>;

const isRecord = (value: unknown): value is Payload =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const joinNonEmpty = (parts: Array<string | null | undefined>): string =>
  parts
    .map((part) => (part ?? '').trim())
    .filter((part) => part.length > 0)
    .join(' ');

export function isAdminCode(value: unknown): value is string {
  return typeof value === 'string' && ADMIN_CODE_PATTERN.test(value);
}

export function parseJsonPayload(data: unknown, provider: GeocodeProviderName): Payload {
  if (isRecord(data)) return data;
  if (typeof data === 'string') {
    try {
      const parsed: unknown = JSON.parse(data);
      if (isRecord(parsed)) return parsed;
    } catch {
      throw new UpstreamError(`${provider} response is not valid JSON`, 'bad_response');
    }
  }
  throw new UpstreamError(`${provider} response is not a JSON object`, 'bad_response');
}

export function okResult(
  provider: GeocodeProviderName,
  code: string,
  label: string | undefined,
  detail: string
): GeocodeResult {
  const result: GeocodeResult = {
    provider,
    source_status: 'ok',
    code,
    diagnostic: `${provider}: ok ${code} (${detail})`,
  };
  if (label) {
    result.label = label;
  }
  return result;
}

export function failedResult(provider: GeocodeProviderName, failure: Failure): GeocodeResult {
  return {
    provider,
    source_status: failureToStatus(failure.kind),
    failure: failure.kind,
    diagnostic: `${provider}: ${describeFailure(failure)}`,
  };
}

export function failureFromError(error: unknown): Failure {
  if (error instanceof UpstreamError) {
    return { kind: error.code === 'bad_response' ? 'parse_error' : 'upstream_error', message: error.message };
  }
  return { kind: 'parse_error', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Kakao coord2regioncode
 */
export type KakaoRegion = {
  regionType: string;
  code: string;
  label: string;
};

export function mapKakaoRegion(payload: Payload): KakaoRegion {
  const documents = Array.isArray(payload['documents']) ? payload['documents'].filter(isRecord) : [];
  if (!documents.length) {
    throw new UpstreamError('kakao documents empty', 'bad_response');
  }

  // region_type B = 법정동, H = 행정동
  const doc = documents.find((entry) => toText(entry['region_type']) === 'B') ?? documents[0];
  if (!doc) {
    throw new UpstreamError('kakao documents empty', 'bad_response');
  }

  const code = toText(doc['code']);
  if (!isAdminCode(code)) {
    throw new UpstreamError(`kakao code "${code ?? ''}" is not a district code`, 'bad_response');
  }

  return {
    regionType: toText(doc['region_type']) ?? '?',
    code,
    label: joinNonEmpty([
      toText(doc['region_1depth_name']),
      toText(doc['region_2depth_name']),
      toText(doc['region_3depth_name']),
    ]),
  };
}

/**
 * VWorld getAddress
 */
export type VworldAddressType = 'PARCEL' | 'BOTH' | 'ROAD';

export const VWORLD_ADDRESS_TYPES: readonly VworldAddressType[] = ['PARCEL', 'BOTH', 'ROAD'];

export type VworldMatch = {
  code: string;
  label?: string;
  via: 'structure' | 'pnu-scan' | 'digits-scan';
};

const PNU_PATTERN = /(?<!\d)(\d{19})(?!\d)/;
const BARE_CODE_PATTERN = /(?<!\d)(\d{10})(?!\d)/;

export function vworldStatus(payload: Payload): { status: string; message?: string } {
  const response = payload['response'];
  if (!isRecord(response)) {
    throw new UpstreamError('vworld response envelope missing', 'bad_response');
  }
  const status = toText(response['status']) ?? '';
  const error = response['error'];
  const message = isRecord(error) ? toText(error['text']) ?? undefined : undefined;
  return message ? { status, message } : { status };
}

const vworldResults = (payload: Payload): Payload[] => {
  const response = payload['response'];
  const result = isRecord(response) ? response['result'] : undefined;
  if (Array.isArray(result)) return result.filter(isRecord);
  return isRecord(result) ? [result] : [];
};

/**
 * 구조화 필드(level4LC) 우선. 없으면 직렬화된 응답에서 19자리 PNU(앞 10자리) → 10자리 숫자 순으로 찾는다.
 * 숫자 스캔은 관계없는 필드와 겹칠 수 있는 마지막 수단이다.
 */
export function extractVworldCode(payload: Payload): VworldMatch | undefined {
  const results = vworldResults(payload);

  for (const result of results) {
    const structure = result['structure'];
    if (!isRecord(structure)) continue;
    const code = toText(structure['level4LC']);
    if (isAdminCode(code) && code.length === 10) {
      const label = joinNonEmpty([
        toText(structure['level1']),
        toText(structure['level2']),
        toText(structure['level3']),
        toText(structure['level4L']),
      ]);
      return label ? { code, label, via: 'structure' } : { code, via: 'structure' };
    }
  }

  const firstText = results.map((result) => toText(result['text'])).find((text) => text != null);
  const withLabel = (match: VworldMatch): VworldMatch => (firstText ? { ...match, label: firstText } : match);

  const serialized = JSON.stringify(payload);
  const pnu = PNU_PATTERN.exec(serialized)?.[1];
  if (pnu) {
    return withLabel({ code: pnu.slice(0, 10), via: 'pnu-scan' });
  }

  const bare = BARE_CODE_PATTERN.exec(serialized)?.[1];
  if (bare) {
    return withLabel({ code: bare, via: 'digits-scan' });
  }

  return undefined;
}
