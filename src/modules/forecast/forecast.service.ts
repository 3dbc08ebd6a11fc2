import { Inject, Injectable, Logger } from '@nestjs/common';
import { ForecastCache } from '../forecast-cache/forecast-cache';
import { MalformedPayloadError } from '../forecast-cache/forecast-cache.errors';
import {
  Coordinate,
  FORECAST_CACHE,
  GridCellKey,
} from '../forecast-cache/forecast-cache.interface';
import { SunsetHueClientService } from './sunsethue-client.service';
import { ForecastPayload } from './sunsethue.dto';

export interface ForecastLookup {
  data: ForecastPayload;
  fromCache: boolean;
}

@Injectable()
export class ForecastService {
  private readonly logger = new Logger(ForecastService.name);

  constructor(
    @Inject(FORECAST_CACHE)
    private readonly cache: ForecastCache<ForecastPayload>,
    private readonly client: SunsetHueClientService,
  ) {}

  /**
   * Get the forecast for a coordinate, going to the provider only when no
   * live forecast exists for its grid cell
   */
  async getForecast(
    coord: Coordinate,
    options: { useCache?: boolean } = {},
  ): Promise<ForecastLookup> {
    const useCache = options.useCache ?? true;

    if (useCache) {
      const cached = this.cache.get(coord);
      if (cached) {
        return { data: cached, fromCache: true };
      }
    }

    const data = await this.client.fetchForecast(coord);

    if (useCache) {
      this.store(coord, data);
    }

    return { data, fromCache: false };
  }

  cellFor(coord: Coordinate): GridCellKey {
    return this.cache.keyFor(coord);
  }

  private store(coord: Coordinate, data: ForecastPayload): void {
    try {
      this.cache.put(data);
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        this.logger.warn(
          `Forecast for (${coord.latitude}, ${coord.longitude}) not cached: ${error.message}`,
        );
        return;
      }
      throw error;
    }
  }
}
