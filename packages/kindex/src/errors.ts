export class KIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KIndexError';
  }
}

export class FormatError extends KIndexError {
  readonly code = 'FORMAT_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export class CalibrationError extends KIndexError {
  readonly code = 'CALIBRATION_INVALID';
  readonly k9Limit: number;

  constructor(k9Limit: number) {
    super(`K9 limit must be a finite positive number, received ${k9Limit}`);
    this.name = 'CalibrationError';
    this.k9Limit = k9Limit;
  }
}
