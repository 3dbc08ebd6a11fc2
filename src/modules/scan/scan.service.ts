import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ForecastCache } from '../forecast-cache/forecast-cache';
import { FORECAST_CACHE } from '../forecast-cache/forecast-cache.interface';
import { bestEvent, summarizeEvent } from '../forecast/forecast-events';
import { ForecastService } from '../forecast/forecast.service';
import { ForecastPayload, SunEventType } from '../forecast/sunsethue.dto';
import {
  readNonNegativeNumber,
  readPositiveNumber,
} from '../utils/config-number';
import { RequestQueue } from '../utils/request-queue';
import { HIKING_SPOTS, HikingSpot, ScanReport, ScanResult } from './scan.dto';

@Injectable()
export class ScanService {
  private readonly logger = new Logger(ScanService.name);
  private readonly maxConcurrentRequests: number;
  private readonly requestDelayMs: number;
  private isRunning = false;

  constructor(
    private readonly forecastService: ForecastService,
    @Inject(FORECAST_CACHE)
    private readonly cache: ForecastCache<ForecastPayload>,
    @Inject(HIKING_SPOTS)
    private readonly spots: HikingSpot[],
    private readonly configService: ConfigService,
  ) {
    this.maxConcurrentRequests = Math.floor(
      readPositiveNumber(this.configService, 'SCAN_MAX_CONCURRENCY', 3),
    );
    this.requestDelayMs = readNonNegativeNumber(
      this.configService,
      'SCAN_REQUEST_DELAY_MS',
      150,
    );
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Look up every spot and rank them by their best upcoming event.
   * Nearby spots share a grid cell, so most lookups are answered by the
   * cache and only one provider call is made per cell.
   */
  async scan(type?: SunEventType): Promise<ScanReport> {
    if (this.isRunning) {
      throw new ConflictException('A scan is already running');
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      this.cache.resetStats();
      this.logger.log(
        `Scanning ${this.spots.length} spots${type ? ` for ${type}` : ''}...`,
      );

      const queue = new RequestQueue(this.maxConcurrentRequests);
      let apiCalls = 0;
      let failedSpots = 0;

      const outcomes = await Promise.all(
        this.spots.map((spot) =>
          queue.add(async (): Promise<ScanResult | null> => {
            try {
              const { fromCache, result } = await this.scanSpot(spot, type);
              if (!fromCache) {
                apiCalls++;
                await this.pause();
              }
              return result;
            } catch (error) {
              failedSpots++;
              this.logger.warn(
                `Skipping ${spot.name}: ${error instanceof Error ? error.message : String(error)}`,
              );
              return null;
            }
          }),
        ),
      );

      const results = outcomes
        .filter((result): result is ScanResult => result !== null)
        .sort((a, b) => b.best.quality - a.best.quality);

      const { hits, misses } = this.cache.stats.summary();
      const durationMs = Date.now() - startTime;

      this.logger.log(
        `Scan finished in ${durationMs}ms: ${results.length} spots ranked, ${apiCalls} API calls, ${hits} cache hits, ${failedSpots} failed`,
      );

      return {
        results,
        totalSpots: this.spots.length,
        failedSpots,
        apiCalls,
        cacheHits: hits,
        cacheMisses: misses,
        durationMs,
      };
    } finally {
      this.isRunning = false;
    }
  }

  private async scanSpot(
    spot: HikingSpot,
    type?: SunEventType,
  ): Promise<{ fromCache: boolean; result: ScanResult | null }> {
    const coord = { latitude: spot.latitude, longitude: spot.longitude };
    const { data, fromCache } = await this.forecastService.getForecast(coord);

    const event = bestEvent(data.data ?? [], type);
    if (!event) {
      this.logger.debug(`No model data for ${spot.name}`);
      return { fromCache, result: null };
    }

    return {
      fromCache,
      result: {
        name: spot.name,
        description: spot.description,
        driveMinutes: spot.driveMinutes,
        latitude: spot.latitude,
        longitude: spot.longitude,
        cell: this.forecastService.cellFor(coord),
        fromCache,
        best: summarizeEvent(event),
      },
    };
  }

  private async pause(): Promise<void> {
    if (this.requestDelayMs <= 0) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, this.requestDelayMs));
  }
}
