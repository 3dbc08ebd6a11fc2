import { ConfigService } from '@nestjs/config';

/**
 * Read a numeric setting. Values from .env arrive as strings, so the raw
 * value is converted here and rejected if it is not a positive number.
 */
export function readPositiveNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Configuration ${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

/**
 * Like readPositiveNumber, but zero is allowed.
 */
export function readNonNegativeNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Configuration ${key} must be zero or more, got "${raw}"`);
  }
  return value;
}
