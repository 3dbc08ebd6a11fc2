import { Test } from '@nestjs/testing';
import { ForecastService } from './forecast.service';
import { SunsetHueClientService } from './sunsethue-client.service';
import { ForecastFetchError } from './forecast-fetch.error';
import { ForecastPayload } from './sunsethue.dto';
import { ForecastCache } from '../forecast-cache/forecast-cache';
import {
  Coordinate,
  FORECAST_CACHE,
} from '../forecast-cache/forecast-cache.interface';

function payloadForCell(latitude: number, longitude: number): ForecastPayload {
  return {
    location: { latitude, longitude },
    grid_location: { latitude, longitude },
    data: [
      {
        type: 'sunset',
        model_data: true,
        quality: 0.6,
        quality_text: 'Good',
        cloud_cover: 0.3,
        time: '2026-10-20T01:30:00Z',
        direction: 250,
      },
    ],
  };
}

describe('ForecastService', () => {
  let service: ForecastService;
  let cache: ForecastCache<ForecastPayload>;
  let fetchForecast: jest.Mock<Promise<ForecastPayload>, [Coordinate]>;

  beforeEach(async () => {
    cache = new ForecastCache<ForecastPayload>();
    fetchForecast = jest.fn<Promise<ForecastPayload>, [Coordinate]>();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ForecastService,
        { provide: FORECAST_CACHE, useValue: cache },
        { provide: SunsetHueClientService, useValue: { fetchForecast } },
      ],
    }).compile();

    service = moduleRef.get(ForecastService);
  });

  it('fetches on a miss and answers nearby spots from the cache', async () => {
    const payload = payloadForCell(37.5, -122.5);
    fetchForecast.mockResolvedValue(payload);

    const first = await service.getForecast({ latitude: 37.827, longitude: -122.499 });
    const second = await service.getForecast({ latitude: 37.618, longitude: -122.493 });

    expect(first).toEqual({ data: payload, fromCache: false });
    expect(second).toEqual({ data: payload, fromCache: true });
    expect(fetchForecast).toHaveBeenCalledTimes(1);
    expect(fetchForecast).toHaveBeenCalledWith({ latitude: 37.827, longitude: -122.499 });
    expect(cache.stats.summary()).toEqual({ hits: 1, misses: 1, totalCalls: 2 });
  });

  it('bypasses the cache entirely when asked to', async () => {
    fetchForecast.mockResolvedValue(payloadForCell(37.5, -122.5));
    const spot = { latitude: 37.827, longitude: -122.499 };

    await service.getForecast(spot, { useCache: false });
    const again = await service.getForecast(spot, { useCache: false });

    expect(again.fromCache).toBe(false);
    expect(fetchForecast).toHaveBeenCalledTimes(2);
    expect(cache.getStats()).toMatchObject({ totalCalls: 0, entries: 0 });
  });

  it('returns a payload without a grid cell but does not cache it', async () => {
    const unresolved: ForecastPayload = {
      location: { latitude: null, longitude: null },
      grid_location: null,
      data: [],
    };
    fetchForecast.mockResolvedValue(unresolved);
    const spot = { latitude: 12.5, longitude: 45.5 };

    const first = await service.getForecast(spot);
    const second = await service.getForecast(spot);

    expect(first).toEqual({ data: unresolved, fromCache: false });
    expect(second.fromCache).toBe(false);
    expect(fetchForecast).toHaveBeenCalledTimes(2);
    expect(cache.getStats().entries).toBe(0);
  });

  it('propagates fetch failures and leaves the cell empty', async () => {
    fetchForecast.mockRejectedValueOnce(
      new ForecastFetchError('SunsetHue API error (429): Too many requests', 429),
    );
    const spot = { latitude: 37.827, longitude: -122.499 };

    await expect(service.getForecast(spot)).rejects.toBeInstanceOf(
      ForecastFetchError,
    );
    expect(cache.getStats().entries).toBe(0);

    fetchForecast.mockResolvedValueOnce(payloadForCell(37.5, -122.5));
    await expect(service.getForecast(spot)).resolves.toMatchObject({
      fromCache: false,
    });
  });

  it('exposes the query cell of a coordinate', () => {
    expect(service.cellFor({ latitude: 37.4529, longitude: -122.1817 })).toEqual({
      cellLatitude: 37,
      cellLongitude: -122.5,
    });
  });
});
