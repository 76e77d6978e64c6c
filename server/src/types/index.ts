/**
 * 기본 좌표 타입 (WGS84)
 */
export type Coordinates = {
  lat: number;
  lon: number;
};

export * from './geocode';
export * from './transaction';
export * from './state';
