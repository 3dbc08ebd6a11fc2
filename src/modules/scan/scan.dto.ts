import { IsIn, IsOptional } from 'class-validator';
import { EventSummary } from '../forecast/forecast-events';
import { SunEventType } from '../forecast/sunsethue.dto';
import { GridCellKey } from '../forecast-cache/forecast-cache.interface';

export const HIKING_SPOTS = Symbol('HIKING_SPOTS');

export interface HikingSpot {
  name: string;
  latitude: number;
  longitude: number;
  driveMinutes: number;
  description: string;
}

export class ScanQueryDto {
  @IsOptional()
  @IsIn(['sunrise', 'sunset'])
  type?: SunEventType; // Only consider this event type (default: both)
}

export interface ScanResult {
  name: string;
  description: string;
  driveMinutes: number;
  latitude: number;
  longitude: number;
  cell: GridCellKey;
  fromCache: boolean;
  best: EventSummary;
}

export interface ScanReport {
  results: ScanResult[];
  totalSpots: number;
  failedSpots: number;
  apiCalls: number;
  cacheHits: number;
  cacheMisses: number;
  durationMs: number;
}
