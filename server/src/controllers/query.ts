/**
 * 쿼리 스키마 (Express/Lambda 공용). 쿼리 값은 문자열로 들어오므로 coerce 한다.
 */

import { z } from 'zod';
import { MAX_MONTHS_BACK } from '../services/transaction.service';
import { currentYearMonth, isYearMonth } from '../lib/util';
import { ADMIN_CODE_PATTERN, type ProductSelection, type ProductType } from '../types';

export const DEFAULT_MONTHS_BACK = 6;
export const DEFAULT_PREVIEW_LIMIT = 300;
const MAX_PREVIEW_LIMIT = 5000;

const booleanParam = z
  .union([z.boolean(), z.enum(['1', '0', 'true', 'false', 'yes', 'no'])])
  .transform((value) => value === true || value === '1' || value === 'true' || value === 'yes');

export const PolicySchema = z.enum(['kakao', 'vworld', 'auto']);

export const CoordinateSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
});

export const RangeQuerySchema = z.object({
  endYm: z
    .string()
    .trim()
    .refine(isYearMonth, { message: 'endYm must be YYYYMM' })
    .optional(),
  months: z.coerce.number().int().min(1).max(MAX_MONTHS_BACK).default(DEFAULT_MONTHS_BACK),
  product: z.enum(['apt', 'offi', 'both']).default('apt'),
  autoExpand: booleanParam.default(false),
  limit: z.coerce.number().int().min(1).max(MAX_PREVIEW_LIMIT).default(DEFAULT_PREVIEW_LIMIT),
});

export const GeocodeQuerySchema = CoordinateSchema.extend({
  provider: PolicySchema.optional(),
});

export const TransactionsQuerySchema = RangeQuerySchema.extend({
  lawdCd: z.string().trim().regex(ADMIN_CODE_PATTERN, 'lawdCd must be a 5 or 10 digit district code'),
});

export const LookupQuerySchema = RangeQuerySchema.extend({
  lat: z.coerce.number().min(-90).max(90).optional(),
  lon: z.coerce.number().min(-180).max(180).optional(),
  provider: PolicySchema.optional(),
}).refine((query) => (query.lat == null) === (query.lon == null), {
  message: 'lat and lon must be given together',
  path: ['lat'],
});

export type QueryInput = Record<string, unknown>;

export function productsFor(selection: ProductSelection): ProductType[] {
  return selection === 'both' ? ['apt', 'offi'] : [selection];
}

export function resolveEndYm(endYm: string | undefined, now: Date = new Date()): string {
  return endYm ?? currentYearMonth(now);
}

export function invalidRequest(issues: z.ZodIssue[], message: string) {
  return {
    statusCode: 400,
    body: { error: 'invalid_request', message, details: issues },
  };
}
