/**
 * The forecast provider could not be reached or answered with an error.
 */
export class ForecastFetchError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ForecastFetchError';
  }
}
