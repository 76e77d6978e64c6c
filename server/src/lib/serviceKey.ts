/**
 * 공공데이터포털 serviceKey 정규화.
 *
 * 발급 키는 "인코딩 키"(%2B 등 포함)와 "디코딩 키" 두 형태로 저장될 수 있고,
 * API 는 쿼리 문자열 인코딩에 엄격하다. 호출 측은 아래 순서대로 시도한다:
 * 1) 입력 그대로, 2) 퍼센트 디코딩 결과, 3) 퍼센트 인코딩 결과.
 */

import { createHash } from 'crypto';

const attempt = (fn: () => string): string | undefined => {
  try {
    return fn();
  } catch {
    return undefined;
  }
};

export function looksUrlEncoded(raw: string): boolean {
  return /%[0-9A-Fa-f]{2}/.test(raw);
}

export function serviceKeyVariants(raw: string): string[] {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return [];

  const variants = [trimmed];
  const push = (candidate: string | undefined) => {
    if (candidate && !variants.includes(candidate)) variants.push(candidate);
  };

  push(attempt(() => decodeURIComponent(trimmed)));
  push(attempt(() => encodeURIComponent(trimmed)));

  return variants;
}

export function keyFingerprint(raw: string): string {
  return createHash('sha256').update((raw ?? '').trim(), 'utf8').digest('hex').slice(0, 12);
}
