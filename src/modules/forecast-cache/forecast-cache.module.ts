import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ForecastCache } from './forecast-cache';
import {
  DEFAULT_CELL_SIZE_DEGREES,
  FORECAST_CACHE,
} from './forecast-cache.interface';
import { ForecastPayload } from '../forecast/sunsethue.dto';
import { readPositiveNumber } from '../utils/config-number';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: FORECAST_CACHE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        new ForecastCache<ForecastPayload>({
          cellSizeDegrees: readPositiveNumber(
            configService,
            'FORECAST_CELL_SIZE_DEGREES',
            DEFAULT_CELL_SIZE_DEGREES,
          ),
          ttlMs:
            readPositiveNumber(configService, 'FORECAST_CACHE_TTL_HOURS', 3) *
            60 *
            60 *
            1000,
        }),
    },
  ],
  exports: [FORECAST_CACHE],
})
export class ForecastCacheModule {}
