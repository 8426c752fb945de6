/**
 * Raised when the designated CAPEX column is not part of the input table.
 */
export class MissingColumnError extends Error {
  public readonly column: string;

  constructor(column: string) {
    super(`CAPEX column '${column}' not found in input`);
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

export class InputNotFoundError extends Error {
  public readonly path: string;

  constructor(path: string) {
    super(`Input file not found: ${path}`);
    this.name = 'InputNotFoundError';
    this.path = path;
  }
}

/**
 * The input exists but could not be read as a table.
 */
export class InputParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Exit status the CLI uses for a given error. Missing input and a missing
 * CAPEX column exit with 2; everything else with 1.
 */
export function exitCodeFor(error: unknown): number {
  if (
    error instanceof MissingColumnError ||
    error instanceof InputNotFoundError
  ) {
    return 2;
  }
  return 1;
}
