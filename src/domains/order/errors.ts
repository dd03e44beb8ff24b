/**
 * Order command error kinds.
 *
 * ValidationError covers every precondition the caller can fix by correcting input
 * (including an unreachable or rejecting metadata check). SubmissionError covers any
 * failure of the order placement call itself.
 */

export class ValidationError extends Error {
  public override readonly name = "ValidationError";

  constructor(
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class SubmissionError extends Error {
  public override readonly name = "SubmissionError";

  constructor(
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}
