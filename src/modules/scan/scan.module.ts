import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ForecastModule } from '../forecast/forecast.module';
import { ScanController } from './scan.controller';
import { ScanService } from './scan.service';
import { HIKING_SPOTS, HikingSpot } from './scan.dto';
import hikingSpots from './hiking-spots.json';

const spots: HikingSpot[] = hikingSpots;

@Module({
  imports: [ConfigModule, ForecastModule],
  controllers: [ScanController],
  providers: [ScanService, { provide: HIKING_SPOTS, useValue: spots }],
})
export class ScanModule {}
