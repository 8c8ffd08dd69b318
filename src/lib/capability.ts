/**
 * Claude Code CLI capability.
 *
 * Spawns the CLI in non-interactive prompt mode with context files inlined
 * into the prompt, and maps process failures onto the capability errors.
 * The prompt goes to the CLI on stdin; a single argv string is capped by
 * the OS well below the size of an inlined file set.
 */

import { spawn, ChildProcess } from 'node:child_process';
import type { CapabilityConfig } from '../types/config.js';
import type { InvokeOptions, LlmCapability } from '../types/capability.js';
import {
  CapabilityTimeoutError,
  CapabilityUnavailableError,
  InterruptedError,
  isInterruptedError,
} from '../types/errors.js';
import { renderContextFiles } from './prompt_budget.js';

/**
 * Grace period between SIGTERM and SIGKILL.
 */
const KILL_GRACE_MS = 1000;

/**
 * Builds CLI arguments for one call. The prompt itself is read from stdin.
 */
export function buildCliArgs(config: CapabilityConfig): string[] {
  return [
    '-p', // prompt mode (non-interactive)
    '--output-format',
    'json',
    '--max-turns',
    config.max_turns.toString(),
    '--no-session-persistence',
    '--permission-mode',
    'plan',
    '--model',
    config.model,
  ];
}

/**
 * Extracts the model text from the CLI's JSON wrapper `{ result: string }`.
 *
 * @throws {Error} If stdout is not JSON or carries no string result
 */
export function parseCliResponse(stdout: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new Error(`Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || !('result' in parsed)) {
    throw new Error('Response missing required "result" field');
  }
  const { result } = parsed;
  if (typeof result !== 'string') {
    throw new Error('Response "result" field is not a string');
  }
  return result;
}

/**
 * Runs the CLI once.
 *
 * @throws {CapabilityTimeoutError} When the call exceeds timeoutMs
 * @throws {InterruptedError} When the signal aborts
 * @throws {CapabilityUnavailableError} When the process cannot be spawned,
 *   exits non-zero, or prints unparseable output
 */
export function runCli(config: CapabilityConfig, prompt: string, options: InvokeOptions = {}): Promise<string> {
  if (options.signal?.aborted) {
    return Promise.reject(new InterruptedError('Capability call aborted by signal'));
  }

  const args = buildCliArgs(config);
  const timeoutMs = options.timeoutMs ?? config.timeout_seconds * 1000;

  return new Promise<string>((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    let exited = false;
    let timeoutId: NodeJS.Timeout | null = null;
    let killTimerId: NodeJS.Timeout | null = null;
    let abortHandler: (() => void) | null = null;

    let child: ChildProcess;
    try {
      child = spawn(config.command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      reject(new CapabilityUnavailableError(`Failed to spawn Claude Code CLI process: ${cause.message}`, null, '', cause));
      return;
    }

    const cleanup = () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      if (abortHandler && options.signal) {
        options.signal.removeEventListener('abort', abortHandler);
        abortHandler = null;
      }
    };

    const terminate = () => {
      child.kill('SIGTERM');
      killTimerId = setTimeout(() => {
        if (!exited) child.kill('SIGKILL');
      }, KILL_GRACE_MS);
    };

    const fail = (error: Error) => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(error);
    };

    child.on('exit', () => {
      exited = true;
      if (killTimerId) {
        clearTimeout(killTimerId);
        killTimerId = null;
      }
    });

    if (options.signal) {
      abortHandler = () => {
        fail(new InterruptedError('Capability call aborted by signal'));
        terminate();
      };
      options.signal.addEventListener('abort', abortHandler, { once: true });
    }

    if (timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        fail(new CapabilityTimeoutError(timeoutMs));
        terminate();
      }, timeoutMs);
    }

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      if (settled) return;
      if (code !== 0) {
        fail(new CapabilityUnavailableError(`Claude Code CLI exited with code ${code ?? 'null'}`, code, stderr));
        return;
      }
      try {
        const result = parseCliResponse(stdout);
        settled = true;
        cleanup();
        resolve(result);
      } catch (error) {
        fail(
          new CapabilityUnavailableError(
            `Failed to parse Claude Code CLI response: ${error instanceof Error ? error.message : String(error)}`,
            code,
            stderr,
            error instanceof Error ? error : undefined
          )
        );
      }
    });

    child.on('error', (error: Error) => {
      fail(new CapabilityUnavailableError(`Failed to spawn Claude Code CLI process: ${error.message}`, null, stderr, error));
    });

    child.stdin?.on('error', (error: Error) => {
      fail(new CapabilityUnavailableError(`Failed to write prompt to Claude Code CLI: ${error.message}`, null, stderr, error));
    });
    child.stdin?.end(prompt);
  });
}

/**
 * Function that performs one raw call; swappable in tests.
 */
export type CliRunner = (config: CapabilityConfig, prompt: string, options: InvokeOptions) => Promise<string>;

/**
 * LLM capability backed by the Claude Code CLI.
 *
 * CapabilityUnavailableError is retried up to `max_attempts` calls;
 * timeouts and interrupts surface immediately.
 */
export class ClaudeCliCapability implements LlmCapability {
  constructor(
    private readonly config: CapabilityConfig,
    private readonly runner: CliRunner = runCli
  ) {}

  async invoke(prompt: string, contextFiles: Record<string, string>, options: InvokeOptions = {}): Promise<string> {
    const fullPrompt = prompt + renderContextFiles(contextFiles, this.config.context_file_max_chars);
    const attempts = Math.max(1, this.config.max_attempts);
    let lastError: CapabilityUnavailableError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.runner(this.config, fullPrompt, options);
      } catch (error) {
        if (isInterruptedError(error) || !(error instanceof CapabilityUnavailableError)) {
          throw error;
        }
        lastError = error;
        console.warn(`[CAPABILITY] attempt ${attempt}/${attempts} failed: ${error.message}`);
      }
    }
    throw lastError ?? new CapabilityUnavailableError('Capability produced no result', null);
  }
}
