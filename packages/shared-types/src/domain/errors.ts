/**
 * Raised when a field or form is declared, bound or called in a way that cannot work.
 * The only error `process` and `validate` let escape.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown by coercion functions, data hooks and filters. The field lifecycle records
 * the message in `processErrors` instead of letting it escape.
 */
export class ValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValueError";
  }
}
