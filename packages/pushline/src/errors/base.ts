/**
 * Base error classes shared by the APNS and GCM clients.
 */

/**
 * Base class for every error raised by pushline.
 */
export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when configuration overrides fail validation.
 */
export class ConfigurationError extends NotificationError {
  /** One entry per offending field, formatted as `path: message` */
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}: ${issues.join(', ')}`);
    this.issues = issues;
  }
}

/**
 * A failure the vendor reported for one specific notification.
 *
 * `I` is the correlation key: the sequence identifier for APNS, the
 * registration id for GCM.
 */
export class ServerError<K extends string, C, I> extends NotificationError {
  readonly kind: K;
  readonly code: C | null;
  readonly description: string;
  readonly identifier: I;
  readonly fatal: boolean;

  constructor(kind: K, code: C | null, description: string, identifier: I, fatal: boolean) {
    super(`${description} (code=${String(code)}) for identifier ${String(identifier)}`);
    this.kind = kind;
    this.code = code;
    this.description = description;
    this.identifier = identifier;
    this.fatal = fatal;
  }
}
