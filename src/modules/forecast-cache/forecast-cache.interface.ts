export const FORECAST_CACHE = Symbol('FORECAST_CACHE');

export const DEFAULT_CELL_SIZE_DEGREES = 0.5;
export const DEFAULT_TTL_MS = 3 * 60 * 60 * 1000; // 3 hours

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface GridCellKey {
  cellLatitude: number;
  cellLongitude: number;
}

export interface CacheEntry<TPayload> {
  key: GridCellKey;
  payload: TPayload;
  storedAt: number; // epoch ms
}

/**
 * Grid cell as reported by the forecast provider inside its own response
 */
export interface GridDescriptor {
  latitude: number | null;
  longitude: number | null;
}

export interface GridLocatedPayload {
  grid_location?: GridDescriptor | null;
}

export interface ForecastCacheOptions {
  cellSizeDegrees?: number;
  ttlMs?: number;
  now?: () => number;
}

export interface StatsSummary {
  hits: number;
  misses: number;
  totalCalls: number;
}

export interface ForecastCacheStats extends StatsSummary {
  hitRate: number;
  entries: number;
  liveEntries: number;
}
