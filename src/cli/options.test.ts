/**
 * Tests for command-line option parsing
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_RPC_URL } from '../config/rpc.js';
import { parseCliOptions } from './options.js';

function createWriters() {
  return { writeOut: vi.fn(), writeErr: vi.fn() };
}

function parseRun(argv: string[], env: NodeJS.ProcessEnv = {}) {
  const parsed = parseCliOptions(argv, env, createWriters());
  if (parsed.kind !== 'run') {
    throw new Error(`expected a run, got exit code ${parsed.exitCode}`);
  }
  return parsed.config;
}

describe('parseCliOptions', () => {
  it('should apply defaults', () => {
    const config = parseRun([]);

    expect(config.rpcUrl).toBe(DEFAULT_RPC_URL);
    expect(config.blockCount).toBe(10);
    expect(config.timeoutSeconds).toBe(30);
    expect(config.json).toBe(false);
  });

  it('should read all flags', () => {
    const config = parseRun([
      '--rpc',
      'http://localhost:8545',
      '--count',
      '25',
      '--json',
      '--timeout',
      '5',
    ]);

    expect(config.rpcUrl).toBe('http://localhost:8545');
    expect(config.blockCount).toBe(25);
    expect(config.timeoutSeconds).toBe(5);
    expect(config.json).toBe(true);
  });

  it('should default --rpc to RPC_URL', () => {
    const config = parseRun([], { RPC_URL: 'https://env.example.test' });

    expect(config.rpcUrl).toBe('https://env.example.test');
  });

  it('should prefer --rpc over RPC_URL', () => {
    const config = parseRun(['--rpc', 'https://flag.example.test'], {
      RPC_URL: 'https://env.example.test',
    });

    expect(config.rpcUrl).toBe('https://flag.example.test');
  });

  it('should reject an invalid RPC URL', () => {
    expect(() => parseRun(['--rpc', 'ftp://x'])).toThrow(ConfigurationError);
  });

  it('should reject an invalid RPC_URL from the environment', () => {
    expect(() => parseRun([], { RPC_URL: 'localhost:8545' })).toThrow(
      ConfigurationError
    );
  });

  it('should reject a non-numeric count', () => {
    expect(() => parseRun(['--count', 'ten'])).toThrow(
      'Invalid value for --count: "ten". Expected an integer.'
    );
  });

  it('should reject a zero count', () => {
    expect(() => parseRun(['--count', '0'])).toThrow(
      'Invalid block count: 0. Expected an integer >= 1.'
    );
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => parseRun(['--timeout', '2.5'])).toThrow(ConfigurationError);
  });

  it('should return exit code 0 for --help', () => {
    const writers = createWriters();

    const parsed = parseCliOptions(['--help'], {}, writers);

    expect(parsed).toEqual({ kind: 'exit', exitCode: 0 });
    expect(writers.writeOut).toHaveBeenCalledTimes(1);
    expect(writers.writeOut.mock.calls[0]?.[0]).toContain('--count <n>');
  });

  it('should return exit code 1 for an unknown option', () => {
    const writers = createWriters();

    const parsed = parseCliOptions(['--blocks', '5'], {}, writers);

    expect(parsed).toEqual({ kind: 'exit', exitCode: 1 });
    expect(writers.writeErr.mock.calls[0]?.[0]).toContain(
      "error: unknown option '--blocks'"
    );
  });
});
