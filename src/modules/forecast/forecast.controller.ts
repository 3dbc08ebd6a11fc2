import {
  BadGatewayException,
  BadRequestException,
  Controller,
  Get,
  NotFoundException,
  Query,
} from '@nestjs/common';
import { KeyComputationError } from '../forecast-cache/forecast-cache.errors';
import { ForecastQueryDto, ForecastResponseDto } from './forecast.dto';
import {
  bestEvent,
  pairEventsByDay,
  summarizeEvent,
  utcOffsetFromLongitude,
} from './forecast-events';
import { ForecastFetchError } from './forecast-fetch.error';
import { ForecastLookup, ForecastService } from './forecast.service';

@Controller('forecast')
export class ForecastController {
  constructor(private readonly forecastService: ForecastService) {}

  @Get()
  async getForecast(
    @Query() query: ForecastQueryDto,
  ): Promise<ForecastResponseDto> {
    const location = { latitude: query.latitude, longitude: query.longitude };

    let lookup: ForecastLookup;
    try {
      lookup = await this.forecastService.getForecast(location, {
        useCache: query.useCache ?? true,
      });
    } catch (error) {
      if (error instanceof KeyComputationError) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof ForecastFetchError) {
        throw new BadGatewayException(error.message);
      }
      throw error;
    }

    // The provider answers unknown places with null coordinates. Such payloads
    // also carry a null grid_location, so the cache has already refused them.
    const resolved = lookup.data.location;
    if (!resolved || resolved.latitude === null || resolved.longitude === null) {
      throw new NotFoundException(
        'The forecast provider could not resolve that location',
      );
    }

    const events = lookup.data.data ?? [];
    const utcOffsetHours = utcOffsetFromLongitude(location.longitude);
    const best = bestEvent(events);

    return {
      location,
      cell: this.forecastService.cellFor(location),
      fromCache: lookup.fromCache,
      utcOffsetHours,
      best: best ? summarizeEvent(best) : null,
      days: pairEventsByDay(events, utcOffsetHours),
    };
  }
}
