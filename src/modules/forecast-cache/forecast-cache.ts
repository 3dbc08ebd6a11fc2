import { Logger } from '@nestjs/common';
import { CacheStore } from './cache-store';
import {
  KeyComputationError,
  MalformedPayloadError,
} from './forecast-cache.errors';
import {
  Coordinate,
  DEFAULT_CELL_SIZE_DEGREES,
  DEFAULT_TTL_MS,
  ForecastCacheOptions,
  ForecastCacheStats,
  GridCellKey,
  GridLocatedPayload,
} from './forecast-cache.interface';
import { cellKeyFor, serializeCellKey } from './grid-keyer';
import { StatsCollector } from './stats-collector';

/**
 * In-memory forecast cache bucketed by provider grid cell.
 *
 * Lookups are keyed by the cell the query coordinate falls into; stores are
 * keyed by the cell the provider reports in its response, since the
 * provider's grid is the authority on where a boundary lies.
 * The cache never fetches: a `null` from `get` tells the caller to fetch
 * and hand the response to `put`.
 */
export class ForecastCache<TPayload extends GridLocatedPayload> {
  private readonly logger = new Logger(ForecastCache.name);
  private readonly store = new CacheStore<TPayload>();
  private readonly now: () => number;
  private collector = new StatsCollector();

  readonly cellSizeDegrees: number;
  readonly ttlMs: number;

  constructor(options: ForecastCacheOptions = {}) {
    this.cellSizeDegrees = options.cellSizeDegrees ?? DEFAULT_CELL_SIZE_DEGREES;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;

    if (!Number.isFinite(this.cellSizeDegrees) || this.cellSizeDegrees <= 0) {
      throw new Error(
        `Invalid forecast cache cell size: ${this.cellSizeDegrees}`,
      );
    }
    if (!Number.isFinite(this.ttlMs) || this.ttlMs <= 0) {
      throw new Error(`Invalid forecast cache TTL: ${this.ttlMs}ms`);
    }
  }

  get stats(): StatsCollector {
    return this.collector;
  }

  /**
   * Start counting hits and misses from zero
   */
  resetStats(): void {
    this.collector = new StatsCollector();
  }

  keyFor(coord: Coordinate): GridCellKey {
    return cellKeyFor(coord, this.cellSizeDegrees);
  }

  /**
   * Return the live payload for the cell containing `coord`, or null
   */
  get(coord: Coordinate): TPayload | null {
    const key = this.keyFor(coord);
    const payload = this.store.lookup(key, this.now(), this.ttlMs);

    if (payload === null) {
      this.collector.recordMiss();
      this.logger.debug(`Forecast cache miss for cell ${serializeCellKey(key)}`);
      return null;
    }

    this.collector.recordHit();
    this.logger.debug(`Forecast cache hit for cell ${serializeCellKey(key)}`);
    return payload;
  }

  /**
   * Store a fetched payload under the grid cell it reports.
   * Replaces whatever the cell held before.
   */
  put(payload: TPayload): GridCellKey {
    const key = this.authoritativeKey(payload);
    this.store.insert(key, payload, this.now());
    this.logger.debug(`Cached forecast for cell ${serializeCellKey(key)}`);
    return key;
  }

  getStats(): ForecastCacheStats {
    const summary = this.collector.summary();
    return {
      ...summary,
      hitRate: summary.totalCalls > 0 ? summary.hits / summary.totalCalls : 0,
      entries: this.store.size(),
      liveEntries: this.store.liveSize(this.now(), this.ttlMs),
    };
  }

  private authoritativeKey(payload: TPayload): GridCellKey {
    const grid: unknown = payload.grid_location;
    if (typeof grid !== 'object' || grid === null) {
      throw new MalformedPayloadError(
        'Forecast payload has no grid_location descriptor',
      );
    }

    const latitude: unknown = Reflect.get(grid, 'latitude');
    const longitude: unknown = Reflect.get(grid, 'longitude');
    if (typeof latitude !== 'number' || typeof longitude !== 'number') {
      throw new MalformedPayloadError(
        `Forecast payload grid_location is not numeric: ${JSON.stringify(grid)}`,
      );
    }

    try {
      return this.keyFor({ latitude, longitude });
    } catch (error) {
      if (error instanceof KeyComputationError) {
        throw new MalformedPayloadError(
          `Forecast payload grid_location is unusable: ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }
  }
}
