/**
 * Base error class for extsniff errors
 */
export class ExtsniffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtsniffError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a file cannot be opened or its prefix cannot be read.
 * Detection stops for that file; it is never reported as `bin`.
 */
export class ReadError extends ExtsniffError {
  public readonly path: string;
  public override readonly cause: unknown;

  constructor(path: string, cause: unknown) {
    super(`Cannot read ${path}: ${describeCause(cause)}`);
    this.name = 'ReadError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown when a built-in table contradicts itself, e.g. a signature whose
 * extension has no family. This is a programming error, not bad input.
 */
export class InvariantError extends ExtsniffError {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantError';
  }
}

/**
 * Thrown when moving a file to its proposed path fails
 */
export class RenameError extends ExtsniffError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, cause: unknown) {
    super(`Cannot rename ${from} to ${to}: ${describeCause(cause)}`);
    this.name = 'RenameError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Thrown when the parameter file is unreadable or fails validation
 */
export class ConfigError extends ExtsniffError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Thrown for invalid command-line arguments
 */
export class UsageError extends ExtsniffError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Render an unknown thrown value as `Name: message` for report rows
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
