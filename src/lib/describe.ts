/**
 * Description agent: asks the capability for a task description of the
 * masked region and parses it into a problem statement plus requirements.
 *
 * Stateless across calls. Malformed output is retried with the reason
 * appended to the prompt; capability errors propagate unchanged.
 */

import type { LlmCapability } from '../types/capability.js';
import type { DescriptionConfig } from '../types/config.js';
import type { DescriptionOutput, TaskDescription } from '../types/description.js';
import type { MaskedArtifact } from '../types/mask.js';
import type { LineRef } from '../types/commit.js';
import type { VerdictStatus } from '../types/verdict.js';
import { DescriptionGenerationError } from '../types/errors.js';
import { extractJson } from './json-extract.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { resolveAsset } from './paths.js';
import { interpolate, loadTemplate } from './template.js';
import { renderRemovalDiff } from './patch.js';
import { unmask } from './mask.js';

/**
 * Mentions of tests: "test" not preceded by a letter. Matches "tests" and
 * "unit_test", not "pytest" or "latest".
 */
const TEST_MENTION = /(?<![A-Za-z])test/;

/**
 * Verifier findings from the previous iteration, fed back to the writer.
 */
export interface DescriptionFeedback {
  status: VerdictStatus;
  rationale: string;
  /** Removed lines the previous description left unexplained */
  uncovered_lines: LineRef[];
  unsupported_requirements: string[];
}

export interface DescribeOptions {
  feedback?: DescriptionFeedback | null;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Renders verifier feedback as a prompt section.
 */
export function formatFeedback(feedback: DescriptionFeedback | null | undefined): string {
  if (!feedback) return '';
  const lines = [`PREVIOUS ATTEMPT (verifier status ${feedback.status}):`, feedback.rationale.trim() || '(no rationale)'];
  if (feedback.uncovered_lines.length > 0) {
    const refs = feedback.uncovered_lines.map((ref) => `${ref.file_path}:${ref.line}`).join(', ');
    lines.push(`Removed lines no requirement covered: ${refs}`);
  }
  if (feedback.unsupported_requirements.length > 0) {
    lines.push(`Requirements with no supporting code: ${feedback.unsupported_requirements.join(', ')}`);
  }
  lines.push('Write a new description that addresses these findings.');
  return lines.join('\n');
}

/**
 * Checks a schema-valid output for the rules the schema cannot express.
 *
 * @returns The reason the output is unusable, or null
 */
export function checkDescription(output: DescriptionOutput, forbidTestMentions: boolean): string | null {
  const ids = new Set<string>();
  for (const requirement of output.requirements) {
    if (ids.has(requirement.id)) {
      return `Duplicate requirement id "${requirement.id}"`;
    }
    ids.add(requirement.id);
  }
  if (forbidTestMentions) {
    if (TEST_MENTION.test(output.problem_statement)) {
      return 'The problem statement mentions tests';
    }
    const mention = output.requirements.find((requirement) => TEST_MENTION.test(requirement.text));
    if (mention) {
      return `Requirement ${mention.id} mentions tests`;
    }
  }
  return null;
}

/**
 * Parses raw capability text into a task description.
 *
 * @returns The description, or the reason it is unusable
 */
export function parseDescription(
  raw: string,
  schema: object,
  forbidTestMentions: boolean
): { ok: true; description: TaskDescription } | { ok: false; reason: string } {
  const extracted = extractJson(raw);
  if (!extracted.success) {
    return { ok: false, reason: extracted.error };
  }
  const validation = validateWithSchema<DescriptionOutput>(extracted.data, schema);
  if (!validation.valid || validation.data === null) {
    return { ok: false, reason: `Schema validation failed: ${validation.errors.join('; ')}` };
  }
  const problem = checkDescription(validation.data, forbidTestMentions);
  if (problem) {
    return { ok: false, reason: problem };
  }
  return {
    ok: true,
    description: {
      problem_statement: validation.data.problem_statement.trim(),
      requirements: validation.data.requirements.map((requirement) => ({
        id: requirement.id.trim(),
        text: requirement.text.trim(),
      })),
    },
  };
}

/**
 * Description agent.
 */
export class DescriptionAgent {
  constructor(
    private readonly capability: LlmCapability,
    private readonly config: DescriptionConfig
  ) {}

  /**
   * Produces a description of the masked region.
   *
   * @throws {DescriptionGenerationError} When every attempt returned
   *   unusable output
   */
  async describe(artifact: MaskedArtifact, diffContext: string, options: DescribeOptions = {}): Promise<TaskDescription> {
    const template = await loadTemplate(this.config.prompt_file);
    const schema = await loadSchema(resolveAsset(this.config.schema_file));
    const basePrompt = interpolate(template, {
      MASK_PATCH: renderRemovalDiff(unmask(artifact), artifact.removed_spans),
      DIFF_CONTEXT: diffContext,
      FEEDBACK: formatFeedback(options.feedback),
    });

    const attempts = Math.max(1, this.config.max_attempts);
    let retryReason: string | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const prompt = retryReason
        ? `${basePrompt}\n\n=== RETRY ===\nYour previous output was invalid: ${retryReason}\nPlease output ONLY valid JSON matching the format above.`
        : basePrompt;

      const raw = await this.capability.invoke(prompt, artifact.masked_files, {
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      });
      const parsed = parseDescription(raw, schema, this.config.forbid_test_mentions);
      if (parsed.ok) {
        return parsed.description;
      }
      retryReason = parsed.reason;
      console.warn(`[DESCRIBE] attempt ${attempt}/${attempts} unusable: ${parsed.reason}`);
    }

    throw new DescriptionGenerationError(
      `No usable description after ${attempts} attempt(s)`,
      attempts,
      retryReason ?? undefined
    );
  }
}
