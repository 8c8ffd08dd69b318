/**
 * Interface of the external LLM capability.
 *
 * The capability is opaque: given a prompt and context files it returns
 * free-form text. Implementations may throw CapabilityUnavailableError,
 * CapabilityTimeoutError or InterruptedError.
 */

/**
 * Per-call options.
 */
export interface InvokeOptions {
  /** Per-call timeout in milliseconds (0 disables) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * An LLM capability.
 */
export interface LlmCapability {
  invoke(
    prompt: string,
    contextFiles: Record<string, string>,
    options?: InvokeOptions
  ): Promise<string>;
}
