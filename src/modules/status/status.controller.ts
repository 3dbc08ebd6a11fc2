import { Controller, Get, Inject } from '@nestjs/common';
import { ApiStatus, StatusService } from './status.service';
import { ForecastCache } from '../forecast-cache/forecast-cache';
import {
  FORECAST_CACHE,
  ForecastCacheStats,
} from '../forecast-cache/forecast-cache.interface';
import { ForecastPayload } from '../forecast/sunsethue.dto';

@Controller('status')
export class StatusController {
  constructor(
    private readonly statusService: StatusService,
    @Inject(FORECAST_CACHE)
    private readonly forecastCache: ForecastCache<ForecastPayload>,
  ) {}

  @Get()
  getStatus(): ApiStatus {
    return this.statusService.getStatus();
  }

  @Get('cache')
  getCacheStats(): ForecastCacheStats {
    return this.forecastCache.getStats();
  }
}
