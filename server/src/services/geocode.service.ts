/**
 * 지오코딩 서비스: 좌표 -> 법정동코드. 정책에 따라 Kakao / VWorld / 자동(Kakao 다음 VWorld).
 */

import { kakaoAdapter } from '../adapters/kakao.adapter';
import { vworldAdapter } from '../adapters/vworld.adapter';
import { ENV } from '../lib/env';
import { logger } from '../lib/logger';
import type {
  Coordinates,
  GeocodePolicy,
  GeocodeProvider,
  GeocodeProviderName,
  GeocodeResult,
  ResolvedGeocode,
} from '../types';

export type GeocodeServiceOptions = {
  providers?: Partial<Record<GeocodeProviderName, GeocodeProvider>>;
  defaultPolicy?: GeocodePolicy;
};

const AUTO_ORDER: readonly GeocodeProviderName[] = ['kakao', 'vworld'];

export class GeocodeService {
  private readonly providers: Record<GeocodeProviderName, GeocodeProvider>;
  readonly defaultPolicy: GeocodePolicy;

  constructor(options: GeocodeServiceOptions = {}) {
    this.providers = {
      kakao: options.providers?.kakao ?? kakaoAdapter,
      vworld: options.providers?.vworld ?? vworldAdapter,
    };
    this.defaultPolicy = options.defaultPolicy ?? ENV.GEOCODE_POLICY;
  }

  /** 키가 하나라도 설정된 provider 가 있는지 */
  hasAnyProvider(policy: GeocodePolicy = this.defaultPolicy): boolean {
    return this.orderFor(policy).some((name) => this.providers[name].isConfigured());
  }

  async resolve(coord: Coordinates, policy: GeocodePolicy = this.defaultPolicy): Promise<ResolvedGeocode> {
    const attempts: GeocodeResult[] = [];

    for (const name of this.orderFor(policy)) {
      const result = await this.providers[name].reverseLookup(coord);
      attempts.push(result);

      if (result.code) {
        const diagnostic =
          attempts.length > 1 ? attempts.map((attempt) => attempt.diagnostic).join(' -> ') : result.diagnostic;
        logger.info({ op: 'geocode', policy, provider: name, code: result.code, tried: attempts.length }, 'Geocode resolved');
        return { ...result, diagnostic, policy, attempts };
      }
    }

    const last = attempts[attempts.length - 1];
    const provider = last?.provider ?? 'kakao';
    const diagnostic = attempts.map((attempt) => attempt.diagnostic).join(' | ');
    logger.warn({ op: 'geocode', policy, coord, diagnostic }, 'Geocode failed for every provider');

    const failed: ResolvedGeocode = {
      provider,
      source_status: last?.source_status ?? 'error',
      diagnostic,
      policy,
      attempts,
    };
    if (last?.failure) {
      failed.failure = last.failure;
    }
    return failed;
  }

  private orderFor(policy: GeocodePolicy): readonly GeocodeProviderName[] {
    return policy === 'auto' ? AUTO_ORDER : [policy];
  }
}

export const geocodeService = new GeocodeService();
