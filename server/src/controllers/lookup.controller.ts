/**
 * Lookup 컨트롤러: 좌표 -> 법정동코드 -> 실거래. X-Session-ID 로 고정 좌표와 직전 결과를 이어간다.
 */

import { logger } from '../lib/logger';
import { lookupService } from '../services/lookup.service';
import { sessionService } from '../services/session.service';
import { ControllerResult } from './types';
import { LookupQuerySchema, invalidRequest, productsFor, resolveEndYm, type QueryInput } from './query';
import { geocodeErrorResult } from './geocode.controller';
import { rangeErrorResult, toRangeBody } from './transactions.controller';

export const SESSION_HEADER = 'X-Session-ID';

export async function getLookupController(
  query: QueryInput,
  options: { sessionId?: string; requestId?: string } = {}
): Promise<ControllerResult> {
  const reqId = options.requestId;
  const parsed = LookupQuerySchema.safeParse(query);
  if (!parsed.success) {
    logger.warn({ reqId, errors: parsed.error.errors }, 'Invalid lookup query');
    return invalidRequest(parsed.error.errors, 'Provide lat & lon (or a session with a pinned coordinate).');
  }

  const { lat, lon, provider, endYm, months, product, autoExpand, limit } = parsed.data;
  const session = sessionService.acquire(options.sessionId);
  const headers = { [SESSION_HEADER]: session.id };

  const outcome = await lookupService.lookup(session.state, {
    ...(lat != null && lon != null ? { coordinate: { lat, lon } } : {}),
    ...(provider ? { policy: provider } : {}),
    endYm: resolveEndYm(endYm),
    monthsBack: months,
    products: productsFor(product),
    autoExpand,
  });

  logger.info({ reqId, session: session.id, status: outcome.status, warnings: outcome.warnings }, 'Lookup finished');

  if (outcome.status === 'missing_coordinate') {
    return {
      statusCode: 400,
      headers,
      body: { error: 'missing_location', message: 'lat & lon are required when the session has no pinned coordinate.' },
    };
  }

  if (outcome.status === 'geocode_failed') {
    return { ...geocodeErrorResult(outcome.geocode, outcome.geocode.policy), headers };
  }

  const { geocode, range, warnings } = outcome;
  const failed = outcome.servedPrevious ? undefined : rangeErrorResult(range);
  if (failed) {
    return { ...failed, headers };
  }

  const body = toRangeBody(range, limit);
  return {
    statusCode: 200,
    headers,
    body: {
      data: {
        ...body.data,
        code: geocode.code ?? null,
        label: geocode.label ?? null,
        provider: geocode.provider,
      },
      meta: {
        ...body.meta,
        geocode: { policy: geocode.policy, diagnostic: geocode.diagnostic },
        warnings,
        session: { id: session.id, created: session.created },
      },
    },
  };
}
