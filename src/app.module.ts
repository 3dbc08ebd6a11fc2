import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StatusModule } from './modules/status/status.module';
import { ForecastCacheModule } from './modules/forecast-cache/forecast-cache.module';
import { ForecastModule } from './modules/forecast/forecast.module';
import { ScanModule } from './modules/scan/scan.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ForecastCacheModule,
    ForecastModule,
    ScanModule,
    StatusModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
