import type { Coordinates } from './index';
import type { FailureKind, SourceStatus } from '../lib/errors';

export type GeocodeProviderName = 'kakao' | 'vworld';

export type GeocodePolicy = GeocodeProviderName | 'auto';

/** 10자리 법정동코드 또는 앞 5자리 시군구코드 */
export const ADMIN_CODE_PATTERN = /^\d{5}(\d{5})?$/;

export type GeocodeResult = {
  provider: GeocodeProviderName;
  source_status: SourceStatus;
  /** always set; success or the stage that failed */
  diagnostic: string;
  code?: string;
  label?: string;
  failure?: FailureKind;
};

export interface GeocodeProvider {
  readonly name: GeocodeProviderName;
  isConfigured(): boolean;
  reverseLookup(coord: Coordinates): Promise<GeocodeResult>;
}

export type ResolvedGeocode = GeocodeResult & {
  policy: GeocodePolicy;
  attempts: GeocodeResult[];
};
