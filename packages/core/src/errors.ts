/**
 * Error types raised by the core. Out-of-range list indexes are not errors:
 * list updates at a missing index return the list unchanged.
 */

/** The line handed to the parser was empty */
export class NoDataError extends Error {
  constructor(message = 'Line contains no data') {
    super(message);
    this.name = 'NoDataError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidPriorityError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid priority "${value}": expected a single letter A-Z`);
    this.name = 'InvalidPriorityError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidDateError extends Error {
  constructor(
    public readonly value: string,
    message = `Invalid date "${value}": expected a calendar date as yyyy-MM-dd`,
  ) {
    super(message);
    this.name = 'InvalidDateError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** A line source or sink failed; the underlying error is kept as `cause` */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly path: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IoError';
    Error.captureStackTrace(this, this.constructor);
  }
}
