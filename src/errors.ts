/**
 * Error classes shared by every tool.
 *
 * Each error carries the process exit code the CLI should use when it
 * reaches the top-level handler. Tools with their own exit-code tables
 * (RACI, OKR) override the code through the constructor.
 */

/**
 * Base error class for all insight-kit errors
 */
export class ToolkitError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ToolkitError";
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, ToolkitError.prototype);
  }
}

/**
 * Error thrown when an input file or directory does not exist
 */
export class InputNotFoundError extends ToolkitError {
  public readonly path: string;

  constructor(path: string, what = "Input file", exitCode = 1) {
    super(`${what} not found: ${path}`, exitCode);
    this.name = "InputNotFoundError";
    this.path = path;
    Object.setPrototypeOf(this, InputNotFoundError.prototype);
  }
}

/**
 * Error thrown when an input file cannot be parsed
 */
export class InputParseError extends ToolkitError {
  public readonly path: string;

  constructor(path: string, detail: string, exitCode = 1) {
    super(`Failed to parse ${path}: ${detail}`, exitCode);
    this.name = "InputParseError";
    this.path = path;
    Object.setPrototypeOf(this, InputParseError.prototype);
  }
}

/**
 * Error thrown when parsed input does not satisfy a tool's rules
 */
export class ValidationError extends ToolkitError {
  constructor(message: string, exitCode = 1) {
    super(message, exitCode);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when a report cannot be written to disk
 */
export class OutputWriteError extends ToolkitError {
  public readonly path: string;

  constructor(path: string, detail: string, exitCode = 1) {
    super(`Error writing output file ${path}: ${detail}`, exitCode);
    this.name = "OutputWriteError";
    this.path = path;
    Object.setPrototypeOf(this, OutputWriteError.prototype);
  }
}

/**
 * Error thrown when a tool is asked for an output or input format it does not support
 */
export class UnsupportedFormatError extends ToolkitError {
  public readonly format: string;

  constructor(format: string, supported: readonly string[], exitCode = 1) {
    super(`Unsupported format "${format}". Expected one of: ${supported.join(", ")}`, exitCode);
    this.name = "UnsupportedFormatError";
    this.format = format;
    Object.setPrototypeOf(this, UnsupportedFormatError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
