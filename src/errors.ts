/**
 * Raised when an argument is missing or malformed
 */
export class InvalidInputError extends Error {
  readonly argument: string;

  constructor(argument: string, reason: string) {
    super(`Invalid ${argument}: ${reason}`);
    this.name = 'InvalidInputError';
    this.argument = argument;
  }
}

/**
 * Raised for geometry the scalar lattice model cannot represent
 * (lateral offsets on a cell with gamma != 90)
 */
export class GeometryUnsupportedError extends Error {
  readonly argument: string;

  constructor(argument: string, reason: string) {
    super(`Unsupported geometry in ${argument}: ${reason}`);
    this.name = 'GeometryUnsupportedError';
    this.argument = argument;
  }
}
