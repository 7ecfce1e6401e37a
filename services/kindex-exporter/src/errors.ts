import { ZodError } from 'zod';

import { CalibrationError } from '@geomag/kindex';

export class StationNotFoundError extends Error {
  readonly code = 'STATION_NOT_FOUND';

  constructor(station: string) {
    super(`Station ${station} is not configured`);
    this.name = 'StationNotFoundError';
  }
}

export class KIndexUnavailableError extends Error {
  readonly code = 'KINDEX_UNAVAILABLE';

  constructor(station: string) {
    super(`No K-index has been computed for station ${station} yet`);
    this.name = 'KIndexUnavailableError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof StationNotFoundError || error instanceof KIndexUnavailableError) {
    return {
      statusCode: 404,
      message: error.message
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (error instanceof CalibrationError) {
    return {
      statusCode: 500,
      message: error.message
    };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};
