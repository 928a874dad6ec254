/**
 * This module defines custom error classes and the top-level error handler
 * for prompt-path.
 */

/**
 * Base error class for prompt-path errors.
 * @extends Error
 */
export class PromptPathError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PromptPathError";
  }
}

/**
 * Raised when a configuration file cannot be read or does not validate.
 * @extends PromptPathError
 */
export class ConfigError extends PromptPathError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`${path}: ${message}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

/**
 * Writes an error to stderr. Project errors print as `name: message`,
 * anything else also prints its stack.
 */
export function handleError(
  error: unknown,
  write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
): void {
  if (error instanceof PromptPathError) {
    write(`${error.name}: ${error.message}`);
  } else if (error instanceof Error) {
    write(`Unexpected error: ${error.message}`);
    if (error.stack) {
      write(error.stack);
    }
  } else {
    write(`Unexpected error: ${String(error)}`);
  }
}
