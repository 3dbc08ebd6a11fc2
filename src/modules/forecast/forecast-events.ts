import { ForecastEvent, SunEventType } from './sunsethue.dto';

const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
];

export interface DayEvents {
  date: string; // YYYY-MM-DD in the local offset, or 'unknown'
  sunrise: ForecastEvent | null;
  sunset: ForecastEvent | null;
}

/**
 * Highest-quality event that has model data, optionally of one type only.
 * Earlier events win ties.
 */
export function bestEvent(
  events: ForecastEvent[],
  type?: SunEventType,
): ForecastEvent | null {
  let best: ForecastEvent | null = null;
  let bestQuality = -1;

  for (const event of events) {
    if (!event.model_data) continue;
    if (type && event.type.toLowerCase() !== type) continue;

    const quality = event.quality ?? 0;
    if (quality > bestQuality) {
      bestQuality = quality;
      best = event;
    }
  }

  return best;
}

/**
 * Rough UTC offset in whole hours, 15° of longitude per hour.
 * Ignores political time zones.
 */
export function utcOffsetFromLongitude(longitude: number): number {
  return Math.round(longitude / 15);
}

export function degreesToCompass(degrees: number | null): string | null {
  if (degrees === null || !Number.isFinite(degrees)) {
    return null;
  }
  const index = ((Math.round(degrees / 22.5) % 16) + 16) % 16;
  return COMPASS_POINTS[index];
}

function localDate(time: string | null, utcOffsetHours: number): string {
  if (!time) return 'unknown';
  const timestamp = Date.parse(time);
  if (Number.isNaN(timestamp)) return 'unknown';

  return new Date(timestamp + utcOffsetHours * 60 * 60 * 1000)
    .toISOString()
    .slice(0, 10);
}

/**
 * Group the provider's flat sunrise/sunset list into local calendar days.
 * Events are shifted to the local offset first so an evening sunset is not
 * filed under the next UTC day.
 */
export function pairEventsByDay(
  events: ForecastEvent[],
  utcOffsetHours: number,
): DayEvents[] {
  const days = new Map<string, DayEvents>();

  for (const event of events) {
    if (!event.model_data) continue;

    const date = localDate(event.time, utcOffsetHours);
    let day = days.get(date);
    if (!day) {
      day = { date, sunrise: null, sunset: null };
      days.set(date, day);
    }

    const type = event.type.toLowerCase();
    if (type === 'sunrise') {
      day.sunrise = event;
    } else if (type === 'sunset') {
      day.sunset = event;
    }
  }

  return Array.from(days.values());
}

export interface EventSummary {
  type: string;
  quality: number;
  qualityText: string;
  time: string | null;
  cloudCover: number | null;
  direction: number | null;
  compass: string | null;
  magics: Record<string, [string | null, string | null]>;
}

export function summarizeEvent(event: ForecastEvent): EventSummary {
  return {
    type: event.type,
    quality: event.quality ?? 0,
    qualityText: event.quality_text ?? '',
    time: event.time,
    cloudCover: event.cloud_cover,
    direction: event.direction,
    compass: degreesToCompass(event.direction),
    magics: event.magics ?? {},
  };
}
