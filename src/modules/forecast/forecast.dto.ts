import { IsBoolean, IsNumber, IsOptional, Max, Min } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { DayEvents, EventSummary } from './forecast-events';
import {
  Coordinate,
  GridCellKey,
} from '../forecast-cache/forecast-cache.interface';

export function parseBooleanFlag(value: unknown): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
  }
  return Boolean(value);
}

// Number('') is 0, so a blank query value must be dropped before validation
function blankAsMissing({
  key,
  obj,
  value,
}: {
  key: string;
  obj: Record<string, unknown>;
  value: unknown;
}): unknown {
  const raw = obj[key];
  return typeof raw === 'string' && raw.trim() === '' ? undefined : value;
}

export class ForecastQueryDto {
  @Type(() => Number)
  @Transform(blankAsMissing)
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @Type(() => Number)
  @Transform(blankAsMissing)
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;

  @IsOptional()
  // Read the raw query value: implicit conversion has already turned "false" into true
  @Transform(({ obj }: { obj: Record<string, unknown> }) =>
    parseBooleanFlag(obj.useCache),
  )
  @IsBoolean()
  useCache?: boolean; // Bypass the grid cache when false (default: true)
}

export interface ForecastResponseDto {
  location: Coordinate;
  cell: GridCellKey;
  fromCache: boolean;
  utcOffsetHours: number;
  best: EventSummary | null;
  days: DayEvents[];
}
