/**
 * Raised for a type spec, rc file or environment value that cannot be turned into
 * a registry. Never subject to the continue-on-error policy.
 */
export class ConfigError extends Error {
  readonly entry?: string;

  constructor(message: string, entry?: string) {
    super(entry === undefined ? message : `${message} in entry "${entry}"`);
    this.name = 'ConfigError';
    this.entry = entry;
  }
}

/**
 * Raised when no `type(scope): description` header can be found in a message.
 */
export class FormatError extends Error {
  readonly header: string;
  readonly reason: string;

  constructor(reason: string, header: string) {
    super(`${reason}: "${header}"`);
    this.name = 'FormatError';
    this.header = header;
    this.reason = reason;
  }
}
