/**
 * Error taxonomy for lamp control.
 * Validation errors are raised before anything is written to the lamp.
 */

export class LampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class OutOfRangeError extends LampError {
  constructor(
    readonly field: string,
    readonly value: number,
    readonly min: number,
    readonly max: number
  ) {
    super(`${field} must be an integer in the range ${min}..${max} (got ${value})`);
  }
}

export class ShapeMismatchError extends LampError {
  constructor(
    readonly theme: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Theme ${theme} requires ${expected} color(s), but got ${actual}`);
  }
}

export class MissingParameterError extends LampError {
  constructor(readonly theme: string) {
    super(`${theme} requires 1 numeric parameter`);
  }
}

export class UnexpectedParameterError extends LampError {
  constructor(readonly theme: string) {
    super(`${theme} does not accept a numeric parameter`);
  }
}

export class LengthMismatchError extends LampError {
  constructor(
    readonly startLength: number,
    readonly endLength: number
  ) {
    super(`Start and end color lists differ in length (${startLength} vs ${endLength})`);
  }
}

export class DeviceNotFoundError extends LampError {
  constructor(readonly deviceName: string) {
    super(`Device '${deviceName}' not found during scan`);
  }
}

export class CharacteristicNotFoundError extends LampError {
  constructor(
    readonly deviceName: string,
    readonly characteristic: string
  ) {
    super(`Unable to find characteristic '${characteristic}' on ${deviceName}`);
  }
}

export class ReconnectExhaustedError extends LampError {
  constructor(
    readonly deviceName: string,
    readonly attempts: number
  ) {
    super(`Failed to reconnect to lamp '${deviceName}' after ${attempts} attempt(s)`);
  }
}

export class NotConnectedError extends LampError {
  constructor(readonly deviceName: string) {
    super(`Not connected to lamp '${deviceName}'`);
  }
}

export class InvalidCommandError extends LampError {}

export class ConfigError extends LampError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
