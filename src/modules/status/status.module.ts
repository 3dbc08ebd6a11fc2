import { Module } from '@nestjs/common';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';
import { ForecastCacheModule } from '../forecast-cache/forecast-cache.module';

@Module({
  imports: [ForecastCacheModule],
  controllers: [StatusController],
  providers: [StatusService],
})
export class StatusModule {}
