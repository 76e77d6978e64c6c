/**
 * 유틸리티 함수들 (좌표 키, 계약년월, 동시 실행)
 */

import type { Coordinates, YearMonth } from '../types';

const KST_OFFSET_MS = 9 * 60 * 60 * 1000;

/** 같은 클릭을 같은 캐시 키로 묶기 위한 반올림 (소수점 6자리) */
export function roundedCoordinateKey(coord: Coordinates, digits = 6): string {
  return `${coord.lat.toFixed(digits)},${coord.lon.toFixed(digits)}`;
}

/**
 * 계약년월
 */
export const YEAR_MONTH_REGEX = /^(\d{4})(\d{2})$/;

export function parseYearMonth(value: string): YearMonth {
  const match = YEAR_MONTH_REGEX.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid year-month: ${value} (expected YYYYMM)`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new Error(`Invalid month in ${value}`);
  }
  return { year, month };
}

export function isYearMonth(value: string): boolean {
  try {
    parseYearMonth(value);
    return true;
  } catch {
    return false;
  }
}

export function formatYearMonth({ year, month }: YearMonth): string {
  return `${year.toString().padStart(4, '0')}${month.toString().padStart(2, '0')}`;
}

export function shiftYearMonth({ year, month }: YearMonth, deltaMonths: number): YearMonth {
  const index = year * 12 + (month - 1) + deltaMonths;
  return { year: Math.floor(index / 12), month: (((index % 12) + 12) % 12) + 1 };
}

/**
 * end 를 포함해 n 개월을 거꾸로 나열한다. 202501, 3 -> 202501, 202412, 202411
 */
export function yearMonthsBack(end: string, count: number): string[] {
  const start = parseYearMonth(end);
  const total = Math.max(0, Math.floor(count));
  const months: string[] = [];
  for (let i = 0; i < total; i += 1) {
    months.push(formatYearMonth(shiftYearMonth(start, -i)));
  }
  return months;
}

export function currentYearMonth(now: Date = new Date()): string {
  const kst = new Date(now.getTime() + KST_OFFSET_MS);
  return formatYearMonth({ year: kst.getUTCFullYear(), month: kst.getUTCMonth() + 1 });
}

/**
 * 작업 큐 기반 동시 실행. 결과 순서는 입력 순서를 따른다.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const size = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  const queue = items.map((item, index) => ({ item, index }));

  const runNext = async (): Promise<void> => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      results[next.index] = await worker(next.item, next.index);
    }
  };

  await Promise.all(Array.from({ length: size }, () => runNext()));
  return results;
}
