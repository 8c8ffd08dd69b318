/**
 * Error taxonomy for the curation pipeline.
 *
 * Per-commit errors are caught at the controller boundary and recorded;
 * they never stop the batch.
 */

/**
 * The unified diff does not follow the unified-diff grammar.
 */
export class MalformedDiffError extends Error {
  constructor(
    message: string,
    /** 1-based line of the diff where parsing failed */
    public readonly diffLine: number
  ) {
    super(message);
    this.name = 'MalformedDiffError';
  }
}

/**
 * No structurally valid mask satisfies the request.
 */
export class UnresolvableMaskError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'UnresolvableMaskError';
  }
}

/**
 * The description agent produced no usable output within its attempts.
 */
export class DescriptionGenerationError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError?: string
  ) {
    super(message);
    this.name = 'DescriptionGenerationError';
  }
}

/**
 * The verification agent produced no usable output within its attempts.
 */
export class VerificationOutputError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError?: string
  ) {
    super(message);
    this.name = 'VerificationOutputError';
  }
}

/**
 * The LLM capability could not be reached or failed to run.
 */
export class CapabilityUnavailableError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CapabilityUnavailableError';
  }
}

/**
 * A capability call exceeded its per-call timeout.
 */
export class CapabilityTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Capability call timed out after ${timeoutMs}ms`);
    this.name = 'CapabilityTimeoutError';
  }
}

/**
 * Processing was aborted through an AbortSignal.
 */
export class InterruptedError extends Error {
  constructor(message: string = 'Operation interrupted by signal') {
    super(message);
    this.name = 'InterruptedError';
  }
}

/**
 * Assembly found a required field missing.
 */
export class TaskAssemblyError extends Error {
  constructor(public readonly field: string) {
    super(`Cannot assemble task record: missing ${field}`);
    this.name = 'TaskAssemblyError';
  }
}

/**
 * Type guard for InterruptedError.
 */
export function isInterruptedError(error: unknown): error is InterruptedError {
  return error instanceof InterruptedError ||
    (error instanceof Error && error.name === 'InterruptedError');
}

/**
 * Errors that consume one iteration and allow a retry.
 */
export function isTransientError(error: unknown): boolean {
  return (
    error instanceof DescriptionGenerationError ||
    error instanceof VerificationOutputError ||
    error instanceof CapabilityUnavailableError ||
    error instanceof CapabilityTimeoutError
  );
}
