/**
 * Error types surfaced by the transpiler.
 *
 * Recoverable input anomalies (malformed tables, missing placeholder metadata,
 * unparseable citation keys) never throw; only these do.
 */

/** Base class for hard transpilation failures. */
export class TranspileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A list pass emitted unbalanced \begin/\end commands. */
export class ListBalanceError extends TranspileError {
  readonly environment: string;
  readonly opened: number;
  readonly closed: number;

  constructor(environment: string, opened: number, closed: number) {
    super(`Unbalanced ${environment} environment: ${opened} begin, ${closed} end`);
    this.environment = environment;
    this.opened = opened;
    this.closed = closed;
  }
}

/** Input bytes are not valid UTF-8. */
export class EncodingError extends TranspileError {}
