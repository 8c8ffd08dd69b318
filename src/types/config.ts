/**
 * TypeScript interfaces for seccurate.config.json.
 */

/**
 * Dataset file locations.
 */
export interface DatasetConfig {
  /** JSONL file of commit records */
  commits_path: string;
  /** JSONL task dataset (append-only) */
  tasks_path: string;
  /** JSONL rejection log (append-only) */
  rejections_path: string;
  /** Directory for per-task companion renderings */
  render_dir: string;
  /** Output path of dataset statistics */
  stats_path: string;
}

/**
 * How a verdict carrying both under and over flags is resolved.
 */
export type FlagResolution = 'grow_first' | 'combined';

/**
 * Adaptive loop settings.
 */
export interface LoopConfig {
  /** Maximum iterations per commit */
  max_iters: number;
  /** Consecutive transient failures tolerated before abandoning */
  max_transient_failures: number;
  flag_resolution: FlagResolution;
  /** Commits processed in parallel */
  concurrency: number;
}

/**
 * Mask engine settings.
 */
export interface MaskConfig {
  /** Initial mask is grown until it is at least this many times the changed lines */
  min_ratio: number;
  /** Upper bound on masked lines across all spans */
  max_lines: number;
  /** Paths never masked (test files) */
  exclude_globs: string[];
  /** Extensions analysed by indentation rather than brackets */
  indent_extensions: string[];
}

/**
 * Claude Code CLI capability settings.
 */
export interface CapabilityConfig {
  /** Command to invoke */
  command: string;
  /** Model alias or full name */
  model: string;
  /** Maximum agentic turns per call */
  max_turns: number;
  /** Per-call timeout */
  timeout_seconds: number;
  /** Calls attempted when the capability is unavailable */
  max_attempts: number;
  /** Per-file cap when inlining context files into a prompt */
  context_file_max_chars: number;
}

/**
 * Description agent settings.
 */
export interface DescriptionConfig {
  /** Prompt template path (relative to the package asset dir when not absolute) */
  prompt_file: string;
  schema_file: string;
  /** Attempts before DescriptionGenerationError */
  max_attempts: number;
  /** Reject problem statements mentioning tests */
  forbid_test_mentions: boolean;
}

/**
 * Verification agent settings.
 */
export interface VerificationConfig {
  prompt_file: string;
  schema_file: string;
  /** Below this reported confidence the verdict is AMBIGUOUS */
  min_confidence: number;
  /** Attempts before VerificationOutputError */
  max_attempts: number;
}

/**
 * Companion rendering settings.
 */
export interface RenderConfig {
  enabled: boolean;
}

/**
 * Root configuration object.
 */
export interface CurateConfig {
  version: string;
  dataset: DatasetConfig;
  loop: LoopConfig;
  mask: MaskConfig;
  capability: CapabilityConfig;
  description: DescriptionConfig;
  verification: VerificationConfig;
  render: RenderConfig;
}
