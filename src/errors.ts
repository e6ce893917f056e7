export class IdError extends Error {
  public constructor(
    public readonly candidate: string,
    reason: string
  ) {
    super(`Invalid DOT id ${JSON.stringify(candidate)}: ${reason}`);
    this.name = "IdError";
  }
}

/**
 * Raised when the output sink rejects a write. The render is abandoned at that
 * point; whatever the sink already accepted stays there. The sink's own error
 * is kept as `cause`.
 */
export class WriteFailure extends Error {
  public constructor(cause: unknown) {
    super(`Failed to write DOT output: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "WriteFailure";
  }
}
