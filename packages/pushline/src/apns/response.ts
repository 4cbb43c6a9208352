import type { APNSServerError } from '../errors/index.js';

/**
 * Result of one APNS bulk send.
 *
 * Errors are correlated to tokens by identifier (the token's index in
 * `tokens`), so a token that appears twice can fail once and succeed once.
 * `successes` and `failures` both keep the order of `tokens`.
 */
export class APNSResponse {
  readonly tokens: readonly string[];
  readonly payload: Buffer;
  /** Every error in the order it was recorded, including synthetic ones */
  readonly errors: readonly APNSServerError[];
  readonly successes: string[];
  readonly failures: string[];
  /** First error recorded for each failed token */
  readonly tokenErrors: ReadonlyMap<string, APNSServerError>;

  constructor(tokens: readonly string[], payload: Buffer, errors: readonly APNSServerError[]) {
    this.tokens = tokens;
    this.payload = payload;
    this.errors = errors;

    const failed = new Map<number, APNSServerError>();
    for (const error of errors) {
      const index = error.identifier;
      if (Number.isInteger(index) && index >= 0 && index < tokens.length && !failed.has(index)) {
        failed.set(index, error);
      }
    }

    this.successes = [];
    this.failures = [];
    const tokenErrors = new Map<string, APNSServerError>();

    tokens.forEach((token, index) => {
      const error = failed.get(index);
      if (!error) {
        this.successes.push(token);
        return;
      }
      this.failures.push(token);
      if (!tokenErrors.has(token)) {
        tokenErrors.set(token, error);
      }
    });

    this.tokenErrors = tokenErrors;
  }

  /** True when no notification failed */
  get ok(): boolean {
    return this.failures.length === 0;
  }
}
