import { KeyComputationError } from './forecast-cache.errors';
import {
  Coordinate,
  DEFAULT_CELL_SIZE_DEGREES,
  GridCellKey,
} from './forecast-cache.interface';

const MAX_DECIMALS = 10;

/**
 * Number of decimal places needed to represent a cell size exactly
 */
function decimalsOf(cellSizeDegrees: number): number {
  const text = cellSizeDegrees.toString();
  if (text.includes('e')) {
    return MAX_DECIMALS;
  }
  const [, fraction = ''] = text.split('.');
  return Math.min(fraction.length, MAX_DECIMALS);
}

function quantize(value: number, cellSizeDegrees: number): number {
  const floored = Math.floor(value / cellSizeDegrees) * cellSizeDegrees;
  // toFixed strips float noise such as 3 * 0.1 = 0.30000000000000004
  return Number(floored.toFixed(decimalsOf(cellSizeDegrees)));
}

export function assertValidCoordinate(coord: Coordinate): void {
  const { latitude, longitude } = coord;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new KeyComputationError(
      `Coordinate must be finite: latitude=${latitude}, longitude=${longitude}`,
    );
  }
  if (latitude < -90 || latitude > 90) {
    throw new KeyComputationError(
      `Latitude ${latitude} is outside [-90, 90]`,
    );
  }
  if (longitude < -180 || longitude > 180) {
    throw new KeyComputationError(
      `Longitude ${longitude} is outside [-180, 180]`,
    );
  }
}

/**
 * Map a coordinate onto the grid cell that contains it.
 *
 * Each component is floored (towards negative infinity) to a multiple of
 * the cell size, so -122.1817 lands in the -122.5 cell, not -122.0.
 */
export function cellKeyFor(
  coord: Coordinate,
  cellSizeDegrees: number = DEFAULT_CELL_SIZE_DEGREES,
): GridCellKey {
  if (!Number.isFinite(cellSizeDegrees) || cellSizeDegrees <= 0) {
    throw new KeyComputationError(
      `Cell size must be a positive number of degrees, got ${cellSizeDegrees}`,
    );
  }
  assertValidCoordinate(coord);

  return {
    cellLatitude: quantize(coord.latitude, cellSizeDegrees),
    cellLongitude: quantize(coord.longitude, cellSizeDegrees),
  };
}

export function serializeCellKey(key: GridCellKey): string {
  return `${key.cellLatitude},${key.cellLongitude}`;
}
