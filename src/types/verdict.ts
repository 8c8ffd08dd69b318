/**
 * Verification verdict types.
 */

import type { LineRef } from './commit.js';

/**
 * Outcome of comparing a description against the removed implementation.
 */
export type VerdictStatus = 'MATCH' | 'UNDER_SPECIFIED' | 'OVER_SPECIFIED' | 'AMBIGUOUS';

/**
 * Structured comparison result.
 */
export interface VerificationVerdict {
  status: VerdictStatus;
  /** Every flagged line, under and over, deduplicated and sorted */
  flagged_lines: LineRef[];
  rationale: string;
  /** Removed lines nobody claims, plus claimed lines outside the mask */
  under_specified: LineRef[];
  /** Unclaimed leading/trailing removed lines */
  over_specified: LineRef[];
  /** Requirement ids with no supporting removed line */
  unsupported_requirements: string[];
  /** Lines (inside or outside the mask) governed by some requirement */
  claimed_lines: LineRef[];
  /** Confidence reported by the capability, 0..1 */
  confidence: number;
}

/**
 * Raw shape returned by the capability for a verification request.
 */
export interface VerificationOutput {
  ambiguous: boolean;
  confidence: number;
  rationale: string;
  mappings: Array<{
    requirement_id: string;
    lines: Array<{ file_path: string; line: number }>;
  }>;
}
