/**
 * Raised when a coordinate cannot be mapped onto the forecast grid.
 */
export class KeyComputationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyComputationError';
  }
}

/**
 * Raised by ForecastCache.put when a payload carries no usable grid cell.
 * Nothing is stored when this is thrown.
 */
export class MalformedPayloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedPayloadError';
  }
}
