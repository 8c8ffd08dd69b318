/**
 * Seccurate type definitions.
 */

export type { LineRange, LineRef, CommitMetadata, CommitRecord, FileStatus, Hunk } from './commit.js';
export { rangeLength, rangeContains, instanceIdFor } from './commit.js';

export type { MaskSpan, RemovedContent, MaskedArtifact } from './mask.js';
export { spanKey, spanLength, compareSpans, sameSpans } from './mask.js';

export type { Requirement, TaskDescription, DescriptionOutput } from './description.js';
export type { VerdictStatus, VerificationVerdict, VerificationOutput } from './verdict.js';

export { CurationPhase } from './state.js';
export type {
  IterationFailure,
  IterationEntry,
  PhaseTransition,
  IterationState,
} from './state.js';

export type { TaskProvenance, TaskRecord, RejectionReason, RejectionRecord } from './task.js';

export type { InvokeOptions, LlmCapability } from './capability.js';

export type {
  DatasetConfig,
  FlagResolution,
  LoopConfig,
  MaskConfig,
  CapabilityConfig,
  DescriptionConfig,
  VerificationConfig,
  RenderConfig,
  CurateConfig,
} from './config.js';

export {
  MalformedDiffError,
  UnresolvableMaskError,
  DescriptionGenerationError,
  VerificationOutputError,
  CapabilityUnavailableError,
  CapabilityTimeoutError,
  InterruptedError,
  TaskAssemblyError,
  isInterruptedError,
  isTransientError,
} from './errors.js';
