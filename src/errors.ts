// src/errors.ts

/**
 * Base class for all errors raised by this library
 */
export class CobotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CobotError';
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for an argument that cannot be put on the wire as given
 */
export class CobotInvalidParameterError extends CobotError {
  readonly parameter: string;

  constructor(parameter: string, value: unknown, expected: string) {
    super(`Invalid ${parameter}: ${String(value)}, expected ${expected}`);
    this.name = 'CobotInvalidParameterError';
    this.parameter = parameter;
  }
}

/**
 * Error class for invalid transport configuration
 */
export class CobotConfigError extends CobotError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'CobotConfigError';
  }
}

// --- Errors for Transports ---

/**
 * Base class for all Transport errors. These are the only failures an operator call rejects with
 * once its arguments have been accepted.
 */
export class TransportError extends CobotError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Error class for serial transport errors
 */
export class SerialTransportError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialTransportError';
  }
}

/**
 * Error class for serial port open/close errors
 */
export class SerialConnectionError extends SerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialConnectionError';
  }
}

/**
 * Error class for serial read errors
 */
export class SerialReadError extends SerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialReadError';
  }
}

/**
 * Error class for serial write errors
 */
export class SerialWriteError extends SerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialWriteError';
  }
}
