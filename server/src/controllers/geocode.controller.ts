/**
 * Geocode 컨트롤러: 좌표 -> 법정동코드/라벨.
 */

import { logger } from '../lib/logger';
import { geocodeService } from '../services/geocode.service';
import type { GeocodePolicy, ResolvedGeocode } from '../types';
import { ControllerResult } from './types';
import { GeocodeQuerySchema, invalidRequest, type QueryInput } from './query';

export function geocodeErrorResult(geocode: ResolvedGeocode, policy: GeocodePolicy): ControllerResult {
  if (!geocodeService.hasAnyProvider(policy)) {
    return {
      statusCode: 503,
      body: { error: 'missing_api_key', message: geocode.diagnostic, details: geocode.attempts },
    };
  }
  return {
    statusCode: 502,
    body: { error: 'geocode_failed', message: geocode.diagnostic, details: geocode.attempts },
  };
}

export async function getGeocodeController(query: QueryInput, requestId?: string): Promise<ControllerResult> {
  const parsed = GeocodeQuerySchema.safeParse(query);
  if (!parsed.success) {
    logger.warn({ reqId: requestId, errors: parsed.error.errors }, 'Invalid geocode query');
    return invalidRequest(parsed.error.errors, 'Provide lat (±90) and lon (±180).');
  }

  const { lat, lon, provider } = parsed.data;
  const policy = provider ?? geocodeService.defaultPolicy;
  const geocode = await geocodeService.resolve({ lat, lon }, policy);

  if (!geocode.code) {
    return geocodeErrorResult(geocode, policy);
  }

  return {
    statusCode: 200,
    body: {
      data: {
        code: geocode.code,
        lawdCd: geocode.code.slice(0, 5),
        label: geocode.label ?? null,
        provider: geocode.provider,
      },
      meta: {
        policy: geocode.policy,
        diagnostic: geocode.diagnostic,
        attempts: geocode.attempts.map(({ provider: name, source_status, diagnostic }) => ({
          provider: name,
          source_status,
          diagnostic,
        })),
      },
    },
  };
}
