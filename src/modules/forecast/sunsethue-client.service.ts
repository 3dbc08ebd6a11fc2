import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Coordinate } from '../forecast-cache/forecast-cache.interface';
import { ForecastFetchError } from './forecast-fetch.error';
import { ForecastPayload } from './sunsethue.dto';

export const DEFAULT_SUNSETHUE_BASE_URL = 'https://api.sunsethue.com';
const USER_AGENT = 'golden-hour-scout/1.0';

function roundCoordinate(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function providerMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) {
    return null;
  }
  const message: unknown = Reflect.get(body, 'message');
  return typeof message === 'string' && message.length > 0 ? message : null;
}

/**
 * Thin client for the SunsetHue forecast API. No caching and no retries.
 */
@Injectable()
export class SunsetHueClientService {
  private readonly logger = new Logger(SunsetHueClientService.name);
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs = 15000;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService
      .get<string>('SUNSETHUE_BASE_URL', DEFAULT_SUNSETHUE_BASE_URL)
      .replace(/\/+$/, '');
    this.apiKey = this.configService.get<string>('SUNSETHUE_API_KEY');
  }

  async fetchForecast(coord: Coordinate): Promise<ForecastPayload> {
    if (!this.apiKey) {
      throw new ForecastFetchError('SUNSETHUE_API_KEY is not configured');
    }

    // The provider answers abbreviated names (lat/lng) with all fields null
    const params = {
      latitude: roundCoordinate(coord.latitude),
      longitude: roundCoordinate(coord.longitude),
    };

    try {
      const response = await axios.get<ForecastPayload>(
        `${this.baseUrl}/forecast`,
        {
          params,
          headers: { 'x-api-key': this.apiKey, 'User-Agent': USER_AGENT },
          timeout: this.timeoutMs,
        },
      );

      this.logger.debug(
        `Forecast retrieved for coordinates (${params.latitude}, ${params.longitude}): ${response.data.data?.length ?? 0} events`,
      );
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = providerMessage(error.response?.data) ?? error.message;

        if (error.code === 'ECONNABORTED') {
          this.logger.warn(
            `SunsetHue API timeout for coordinates (${params.latitude}, ${params.longitude})`,
          );
        } else {
          this.logger.error(
            `SunsetHue API error (${status ?? 'unknown'}) for coordinates (${params.latitude}, ${params.longitude}): ${message}`,
          );
        }

        throw new ForecastFetchError(
          `SunsetHue API error (${status ?? 'network'}): ${message}`,
          status,
          { cause: error },
        );
      }
      throw error;
    }
  }
}
