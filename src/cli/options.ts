/**
 * Command-line option parsing
 */

import { Command, CommanderError } from 'commander';
import {
  DEFAULT_BLOCK_COUNT,
  DEFAULT_TIMEOUT_SECONDS,
  RpcConfig,
} from '../config/rpc.js';
import { ConfigurationError } from '../errors/index.js';

export const TOOL_NAME = 'gas-utilization-monitor';

interface RawCliOptions {
  rpc?: string;
  count: string;
  json?: boolean;
  timeout: string;
}

/**
 * Outcome of parsing argv: either a configuration to run with,
 * or an exit code when commander already handled the invocation (--help)
 */
export type ParsedCli =
  | { kind: 'run'; config: RpcConfig }
  | { kind: 'exit'; exitCode: number };

export interface CliOutputWriters {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

function parseInteger(value: string, flag: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(
      `Invalid value for ${flag}: "${value}". Expected an integer.`
    );
  }
  return Number.parseInt(value, 10);
}

function createProgram(writers: CliOutputWriters): Command {
  return new Command()
    .name(TOOL_NAME)
    .description(
      'Analyze recent block gas usage, base fee and utilization of an EVM chain.'
    )
    .option('--rpc <url>', 'RPC URL (default: env RPC_URL or Infura)')
    .option(
      '--count <n>',
      'Number of recent blocks to analyze',
      String(DEFAULT_BLOCK_COUNT)
    )
    .option('--json', 'Output JSON format')
    .option(
      '--timeout <seconds>',
      'RPC timeout seconds',
      String(DEFAULT_TIMEOUT_SECONDS)
    )
    .exitOverride()
    .configureOutput(writers);
}

/**
 * Parse user arguments (without the node and script entries)
 *
 * @throws ConfigurationError on an invalid URL, count or timeout
 */
export function parseCliOptions(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  writers: CliOutputWriters
): ParsedCli {
  const program = createProgram(writers);

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { kind: 'exit', exitCode: error.exitCode };
    }
    throw error;
  }

  const options = program.opts<RawCliOptions>();

  const config = RpcConfig.fromEnvironment(
    {
      rpcUrl: options.rpc,
      blockCount: parseInteger(options.count, '--count'),
      timeoutSeconds: parseInteger(options.timeout, '--timeout'),
      json: options.json ?? false,
    },
    env
  );

  return { kind: 'run', config };
}
