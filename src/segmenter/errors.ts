export class SegmentationError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Missing, empty, oversized or undecodable image. Reported to the caller as a client fault. */
export class InvalidInputError extends SegmentationError {
  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options?.statusCode ?? 400, options);
  }
}

/** The model call failed or produced output that cannot be used. */
export class ModelInferenceError extends SegmentationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
