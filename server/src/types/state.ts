import type { Coordinates } from './index';
import type { ResolvedGeocode } from './geocode';
import type { RangeResult } from './transaction';

/**
 * 화면 한 세션의 상태. UI 쪽이 소유하고 core 함수에는 참조로 넘긴다.
 */
export type AppState = {
  coordinate?: Coordinates;
  adminCode?: string;
  label?: string;
  lastGeocode?: ResolvedGeocode;
  lastRange?: RangeResult;
  diagnostics: string[];
};

export const createAppState = (): AppState => ({ diagnostics: [] });
