/**
 * Thrown when a file or an external tool the check depends on doesn't exist.
 */
export class MissingResourceError extends Error {
  resource: string;

  constructor(resource: string, cause?: Error) {
    super(`${resource} not found`, { cause });
    this.resource = resource;
  }
}

/**
 * Thrown when a signature or key doesn't match what the repository expects.
 */
export class VerificationError extends Error {
  output: string;

  constructor(message: string, output: string = "") {
    super(message);
    this.output = output;
  }
}

export class ExpirationError extends Error {}

/**
 * Thrown for setups that work today but are likely to cause verification
 * problems. Reported as a warning rather than a failure.
 */
export class ConfigurationWarning extends Error {}

export class NetworkError extends Error {
  url: string;

  constructor(url: string, cause?: Error) {
    super(
      `Request to ${url} failed${cause?.message ? `: ${cause.message}` : ""}`,
      { cause },
    );
    this.url = url;
  }
}

/**
 * Thrown while reading configuration. Fatal: nothing runs after it.
 */
export class ConfigurationError extends Error {}
