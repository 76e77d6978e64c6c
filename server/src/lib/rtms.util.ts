import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { UpstreamError } from './errors';
import { snippet } from './http';
import { parseYearMonth } from './util';
import type { ProductType, TransactionRecord } from '../types';

type Payload = Record<string, unknown>;

const isRecord = (value: unknown): value is Payload =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// parseTagValue=false: "00" / "000" must stay strings, numbers are parsed per field below
const xmlParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
});

/**
 * 필드별 후보 키. 앞에서부터 처음으로 값이 있는 키를 쓴다.
 * 신규 API 는 영문 키, 구 API(RTMSOBJSvc) 는 한글 키를 쓴다.
 */
export const FIELD_SYNONYMS = {
  name: ['aptNm', 'offiNm', '단지명', '아파트', '단지'],
  areaM2: ['excluUseAr', '전용면적'],
  amountManwon: ['dealAmount', '거래금액'],
  dealYear: ['dealYear', '년'],
  dealMonth: ['dealMonth', '월'],
  dealDay: ['dealDay', '일'],
  floor: ['floor', '층'],
  legalDong: ['umdNm', '법정동'],
  jibun: ['jibun', '지번'],
  roadName: ['roadNm', '도로명'],
  buildYear: ['buildYear', '건축년도'],
} as const satisfies Record<string, readonly string[]>;

/** serviceKey 미등록: 다른 키 형태로 재시도할 신호 */
export const KEY_REJECTION_CODES = ['30'];

export type RtmsHeader = {
  resultCode: string;
  resultMessage: string;
};

export type RtmsPage = RtmsHeader & {
  items: Payload[];
  totalCount: number;
};

const dig = (value: unknown, path: readonly string[]): unknown => {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
};

export const toText = (value: unknown): string | null => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
};

export const toNumber = (value: unknown): number | null => {
  const text = toText(value);
  if (text == null) return null;
  const parsed = Number(text.replace(/[,\s]/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
};

const firstValue = (item: Payload, keys: readonly string[]): unknown => {
  for (const key of keys) {
    const value = item[key];
    if (toText(value) != null) return value;
  }
  return undefined;
};

export function parseRtmsBody(data: unknown): Payload {
  if (isRecord(data)) return data;
  if (typeof data !== 'string') {
    throw new UpstreamError('RTMS response body is empty', 'bad_response');
  }

  const text = data.replace(/^\uFEFF/, '').trim();
  if (!text) {
    throw new UpstreamError('RTMS response body is empty', 'bad_response');
  }

  if (text.startsWith('<')) {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      throw new UpstreamError(`RTMS XML is malformed: ${validation.err.msg}`, 'bad_response');
    }
    const parsed: unknown = xmlParser.parse(text);
    if (!isRecord(parsed)) {
      throw new UpstreamError('RTMS XML has no root element', 'bad_response');
    }
    return parsed;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) return parsed;
  } catch {
    // fall through to the error below
  }
  throw new UpstreamError(`RTMS response is neither XML nor JSON: ${snippet(text) ?? ''}`, 'bad_response');
}

/**
 * 응답 내 header 의 resultCode/resultMsg. 인증 오류는 OpenAPI_ServiceResponse 형식으로 온다.
 */
export function extractHeader(payload: Payload): RtmsHeader | undefined {
  const standard = dig(payload, ['response', 'header']) ?? dig(payload, ['header']);
  if (isRecord(standard)) {
    return {
      resultCode: toText(standard['resultCode']) ?? '',
      resultMessage: toText(standard['resultMsg']) ?? toText(standard['resultMessage']) ?? '',
    };
  }

  const gateway = dig(payload, ['OpenAPI_ServiceResponse', 'cmmMsgHeader']);
  if (isRecord(gateway)) {
    return {
      resultCode: toText(gateway['returnReasonCode']) ?? '',
      resultMessage: toText(gateway['returnAuthMsg']) ?? toText(gateway['errMsg']) ?? '',
    };
  }

  return undefined;
}

/**
 * body.items.item 은 없거나, 객체 하나거나, 배열이다. 모두 배열로 맞춘다.
 */
export function extractItems(payload: Payload): Payload[] {
  const body = dig(payload, ['response', 'body']) ?? dig(payload, ['body']);
  const items = dig(body, ['items']);
  const raw = Array.isArray(items) ? items : dig(items, ['item']);

  const list: unknown[] = Array.isArray(raw) ? raw : raw == null || raw === '' ? [] : [raw];
  // rows that are not objects are kept as empty rows so the count matches upstream
  return list.map((entry) => (isRecord(entry) ? entry : {}));
}

export function parseRtmsPage(payload: Payload): RtmsPage | undefined {
  const header = extractHeader(payload);
  const hasBody = dig(payload, ['response', 'body']) != null || dig(payload, ['body']) != null;
  if (!header && !hasBody) return undefined;

  const items = extractItems(payload);
  const body = dig(payload, ['response', 'body']) ?? dig(payload, ['body']);
  const totalCount = toNumber(dig(body, ['totalCount'])) ?? items.length;

  return {
    resultCode: header?.resultCode ?? '',
    resultMessage: header?.resultMessage ?? '',
    items,
    totalCount,
  };
}

export function isSuccessCode(code: string, successCodes: readonly string[]): boolean {
  return successCodes.includes(code.trim());
}

export function isKeyRejection(code: string, message: string): boolean {
  return KEY_REJECTION_CODES.includes(code.trim()) || /SERVICE_KEY_IS_NOT_REGISTERED/i.test(message);
}

type RecordContext = {
  product: ProductType;
  lawdCd: string;
  ym: string;
};

const inRange = (value: number | null, min: number, max: number): value is number =>
  value != null && Number.isInteger(value) && value >= min && value <= max;

export function toTransactionRecord(item: Payload, context: RecordContext): TransactionRecord {
  const requested = parseYearMonth(context.ym);

  const dealYear = toNumber(firstValue(item, FIELD_SYNONYMS.dealYear));
  const dealMonth = toNumber(firstValue(item, FIELD_SYNONYMS.dealMonth));
  const dealDay = toNumber(firstValue(item, FIELD_SYNONYMS.dealDay));

  const year = inRange(dealYear, 1900, 2999) ? dealYear : requested.year;
  const month = inRange(dealMonth, 1, 12) ? dealMonth : requested.month;
  const day = inRange(dealDay, 1, 31) ? dealDay : 1;

  return {
    product: context.product,
    lawdCd: context.lawdCd,
    dealYm: context.ym,
    dealDate: `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`,
    name: toText(firstValue(item, FIELD_SYNONYMS.name)),
    areaM2: toNumber(firstValue(item, FIELD_SYNONYMS.areaM2)),
    amountManwon: toNumber(firstValue(item, FIELD_SYNONYMS.amountManwon)),
    dealYear,
    dealMonth,
    dealDay,
    floor: toNumber(firstValue(item, FIELD_SYNONYMS.floor)),
    legalDong: toText(firstValue(item, FIELD_SYNONYMS.legalDong)),
    jibun: toText(firstValue(item, FIELD_SYNONYMS.jibun)),
    roadName: toText(firstValue(item, FIELD_SYNONYMS.roadName)),
    buildYear: toNumber(firstValue(item, FIELD_SYNONYMS.buildYear)),
  };
}

export function sortByDealDateDesc(records: readonly TransactionRecord[]): TransactionRecord[] {
  return [...records].sort((a, b) => b.dealDate.localeCompare(a.dealDate));
}
