import { GridDescriptor } from '../forecast-cache/forecast-cache.interface';

export type SunEventType = 'sunrise' | 'sunset';

export type QualityText = 'Poor' | 'Fair' | 'Good' | 'Great' | 'Excellent';

/**
 * Start/end pair of ISO-8601 UTC times, e.g. golden_hour or blue_hour
 */
export type TimeWindow = [string | null, string | null];

export interface ForecastEvent {
  type: SunEventType | string;
  model_data: boolean; // false when the provider has no model run for this event yet
  quality: number | null; // 0-1
  quality_text: QualityText | string | null;
  cloud_cover: number | null; // 0-1
  time: string | null; // ISO-8601 UTC
  direction: number | null; // compass bearing of the sun in degrees
  magics?: Record<string, TimeWindow>;
}

/**
 * Response of GET https://api.sunsethue.com/forecast
 */
export interface ForecastPayload {
  time?: string;
  location?: GridDescriptor;
  grid_location?: GridDescriptor | null;
  data: ForecastEvent[];
}
