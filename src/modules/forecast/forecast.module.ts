import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ForecastCacheModule } from '../forecast-cache/forecast-cache.module';
import { ForecastController } from './forecast.controller';
import { ForecastService } from './forecast.service';
import { SunsetHueClientService } from './sunsethue-client.service';

@Module({
  imports: [ConfigModule, ForecastCacheModule],
  controllers: [ForecastController],
  providers: [ForecastService, SunsetHueClientService],
  exports: [ForecastService, ForecastCacheModule],
})
export class ForecastModule {}
