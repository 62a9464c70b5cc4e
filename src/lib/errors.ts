/**
 * Error raised by a check when it cannot run.
 * `reason` uses the same upper-snake codes as check outcomes.
 */
export class CheckError extends Error {
  readonly reason: string;

  constructor(message: string, reason: string) {
    super(message);
    this.name = "CheckError";
    this.reason = reason;
  }
}
