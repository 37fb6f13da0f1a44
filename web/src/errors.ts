/**
 * Error classes for the extension's backend client
 */

export class APIError extends Error {
  statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'APIError';
    this.statusCode = statusCode;
  }

  toString(): string {
    return this.statusCode ? `${this.message} (status: ${this.statusCode})` : this.message;
  }
}

/** Backend could not be reached */
export class NetworkError extends APIError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends APIError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** The job stream ended without a terminal result */
export class ChannelClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChannelClosedError';
  }
}
