import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('node:child_process', async () => {
  const actual = await vi.importActual('node:child_process');
  return {
    ...actual,
    spawn: vi.fn(),
  };
});

import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { buildCliArgs, ClaudeCliCapability, parseCliResponse, runCli, type CliRunner } from '@/lib/capability.js';
import {
  CapabilityTimeoutError,
  CapabilityUnavailableError,
  InterruptedError,
} from '@/types/errors.js';
import { createMockConfig } from '../helpers/mocks.js';

const config = createMockConfig().capability;

describe('buildCliArgs', () => {
  it('runs a single non-interactive turn and leaves the prompt for stdin', () => {
    const args = buildCliArgs(config);
    expect(args[0]).toBe('-p');
    expect(args).toContain('--no-session-persistence');
    expect(args.slice(args.indexOf('--max-turns'), args.indexOf('--max-turns') + 2)).toEqual(['--max-turns', '1']);
    expect(args.slice(args.indexOf('--model'), args.indexOf('--model') + 2)).toEqual(['--model', 'sonnet']);
    expect(args[args.length - 1]).toBe('sonnet');
  });
});

describe('parseCliResponse', () => {
  it('returns the result text', () => {
    expect(parseCliResponse('{"type":"result","result":"hello"}')).toBe('hello');
  });

  it('rejects other shapes', () => {
    expect(() => parseCliResponse('not json')).toThrow(/^Failed to parse JSON response: /);
    expect(() => parseCliResponse('{}')).toThrow('Response missing required "result" field');
    expect(() => parseCliResponse('{"result": 3}')).toThrow('Response "result" field is not a string');
  });
});

const mockSpawn = vi.mocked(spawn);

class FakeStdin extends EventEmitter {
  readonly end = vi.fn((_chunk?: string) => this);
}

class FakeChild extends EventEmitter {
  readonly stdin = new FakeStdin();
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly kill = vi.fn((_signal?: string) => {
    queueMicrotask(() => this.emit('exit', null));
    return true;
  });
}

function spawnFake(): FakeChild {
  const child = new FakeChild();
  // Only the members runCli touches are faked
  mockSpawn.mockImplementation(() => child as unknown as ChildProcess);
  return child;
}

describe('runCli', () => {
  afterEach(() => {
    mockSpawn.mockReset();
  });

  it('returns the result of a successful run', async () => {
    const child = spawnFake();
    const pending = runCli(config, 'PROMPT');
    child.stdout.emit('data', Buffer.from('{"result":'));
    child.stdout.emit('data', Buffer.from('"done"}'));
    child.emit('close', 0);

    expect(await pending).toBe('done');
    expect(mockSpawn).toHaveBeenCalledWith('claude', buildCliArgs(config), { stdio: ['pipe', 'pipe', 'pipe'] });
    expect(child.stdin.end).toHaveBeenCalledWith('PROMPT');
  });

  it('maps a synchronous spawn failure to an unavailable error', async () => {
    mockSpawn.mockImplementation(() => {
      throw new Error('spawn E2BIG');
    });

    const error = await runCli(config, 'p').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(CapabilityUnavailableError);
    if (error instanceof CapabilityUnavailableError) {
      expect(error.message).toBe('Failed to spawn Claude Code CLI process: spawn E2BIG');
      expect(error.exitCode).toBeNull();
    }
  });

  it('maps a failed prompt write to an unavailable error', async () => {
    const child = spawnFake();
    const pending = runCli(config, 'p');
    child.stdin.emit('error', new Error('write EPIPE'));

    await expect(pending).rejects.toThrow('Failed to write prompt to Claude Code CLI: write EPIPE');
  });

  it('maps a non-zero exit to an unavailable error with stderr', async () => {
    const child = spawnFake();
    const pending = runCli(config, 'p');
    child.stderr.emit('data', Buffer.from('not logged in'));
    child.emit('close', 1);

    const error = await pending.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(CapabilityUnavailableError);
    if (error instanceof CapabilityUnavailableError) {
      expect(error.message).toBe('Claude Code CLI exited with code 1');
      expect(error.exitCode).toBe(1);
      expect(error.stderr).toBe('not logged in');
    }
  });

  it('maps unparseable stdout to an unavailable error', async () => {
    const child = spawnFake();
    const pending = runCli(config, 'p');
    child.stdout.emit('data', Buffer.from('plain text'));
    child.emit('close', 0);

    await expect(pending).rejects.toThrow(/^Failed to parse Claude Code CLI response: /);
  });

  it('times out and terminates the process', async () => {
    const child = spawnFake();

    await expect(runCli(config, 'p', { timeoutMs: 10 })).rejects.toBeInstanceOf(CapabilityTimeoutError);
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('rejects with InterruptedError when aborted mid-call', async () => {
    const child = spawnFake();
    const controller = new AbortController();
    const pending = runCli(config, 'p', { signal: controller.signal, timeoutMs: 0 });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(InterruptedError);
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('rejects at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runCli(config, 'p', { signal: controller.signal })).rejects.toBeInstanceOf(InterruptedError);
    expect(mockSpawn).not.toHaveBeenCalled();
  });
});

describe('ClaudeCliCapability', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    mockSpawn.mockReset();
  });

  it('inlines context files into the prompt', async () => {
    const prompts: string[] = [];
    const runner: CliRunner = async (_config, prompt) => {
      prompts.push(prompt);
      return 'answer';
    };
    const capability = new ClaudeCliCapability(config, runner);

    expect(await capability.invoke('Describe.', { 'a.c': 'int a;\n' })).toBe('answer');
    expect(prompts).toEqual(['Describe.\n\n## Context files\n\n=== FILE: a.c ===\nint a;\n=== END FILE ===\n']);
  });

  it('retries unavailable errors up to max_attempts', async () => {
    let calls = 0;
    const runner: CliRunner = async () => {
      calls++;
      if (calls < 3) throw new CapabilityUnavailableError('exit 1', 1);
      return 'third time';
    };
    expect(await new ClaudeCliCapability(config, runner).invoke('p', {})).toBe('third time');
    expect(calls).toBe(3);
  });

  it('throws the last unavailable error when every attempt fails', async () => {
    let calls = 0;
    const runner: CliRunner = async () => {
      calls++;
      throw new CapabilityUnavailableError(`exit ${calls}`, 1);
    };
    await expect(new ClaudeCliCapability(config, runner).invoke('p', {})).rejects.toThrow('exit 3');
  });

  it('sends large inlined context on stdin, not as an argument', async () => {
    const child = new FakeChild();
    mockSpawn.mockImplementation(() => {
      queueMicrotask(() => {
        child.stdout.emit('data', Buffer.from('{"result":"ok"}'));
        child.emit('close', 0);
      });
      return child as unknown as ChildProcess;
    });
    const big = 'x'.repeat(60000);
    const capability = new ClaudeCliCapability({ ...config, max_attempts: 1 });

    expect(await capability.invoke('describe this', { 'a.c': big, 'b.c': big, 'c.c': big })).toBe('ok');
    expect(mockSpawn.mock.calls[0][1]).toEqual(buildCliArgs(config));
    const written = child.stdin.end.mock.calls[0][0] ?? '';
    expect(written.startsWith('describe this\n\n## Context files')).toBe(true);
    expect(written.length).toBeGreaterThan(180000);
  });

  it('surfaces a spawn failure as an unavailable error', async () => {
    mockSpawn.mockImplementation(() => {
      throw new Error('spawn E2BIG');
    });
    const capability = new ClaudeCliCapability({ ...config, max_attempts: 1 });

    await expect(capability.invoke('p', {})).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });

  it('does not retry timeouts', async () => {
    let calls = 0;
    const runner: CliRunner = async () => {
      calls++;
      throw new CapabilityTimeoutError(50);
    };
    await expect(new ClaudeCliCapability(config, runner).invoke('p', {})).rejects.toBeInstanceOf(CapabilityTimeoutError);
    expect(calls).toBe(1);
  });
});
