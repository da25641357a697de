/**
 * Gas monitor command
 *
 * One run: parse options, check the endpoint, analyze the block range,
 * print the report. Returns the process exit code instead of exiting so
 * the whole flow can be driven from tests.
 */

import { checkConnectivity, createRpcConnection } from '../clients/rpc/rpc-connection.js';
import type { RpcConnection } from '../clients/rpc/types.js';
import type { RpcConfig } from '../config/rpc.js';
import { createServiceLogger, log } from '../logging/index.js';
import { GasAnalysisService } from '../services/gas-analysis/gas-analysis-service.js';
import { roundTo } from '../utils/gas/gas-calculations.js';
import { ExitCode, exitCodeForError } from './exit-codes.js';
import { parseCliOptions } from './options.js';
import {
  buildJsonReport,
  formatHeader,
  formatProgressLine,
  formatSummary,
  serializeJsonReport,
} from './report.js';

const logger = createServiceLogger('GasMonitorCli');

export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

/**
 * Dependencies for runGasMonitor
 * All dependencies are optional and default to the process environment
 */
export interface GasMonitorDependencies {
  env?: NodeJS.ProcessEnv;
  output?: CliOutput;
  /** Builds the connection for a validated configuration */
  createConnection?: (config: RpcConfig) => RpcConnection;
  /** Wall clock, used for the report timestamps */
  now?: () => Date;
  /** Monotonic milliseconds, used for the elapsed time */
  clock?: () => number;
}

const consoleOutput: CliOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runGasMonitor(
  argv: readonly string[],
  dependencies: GasMonitorDependencies = {}
): Promise<number> {
  const env = dependencies.env ?? process.env;
  const output = dependencies.output ?? consoleOutput;
  const createConnection =
    dependencies.createConnection ??
    ((config: RpcConfig) => createRpcConnection(config.getPublicClient()));
  const now = dependencies.now ?? (() => new Date());
  const clock = dependencies.clock ?? (() => performance.now());

  try {
    const parsed = parseCliOptions(argv, env, {
      writeOut: (text) => output.stdout(text.trimEnd()),
      writeErr: (text) => output.stderr(text.trimEnd()),
    });
    if (parsed.kind === 'exit') {
      return parsed.exitCode;
    }
    const { config } = parsed;

    const connection = createConnection(config);
    const chainId = await checkConnectivity(connection, config.rpcUrl);

    formatHeader({
      rpcUrl: config.rpcUrl,
      chainId,
      blockCount: config.blockCount,
      startedAt: now(),
    }).forEach((line) => output.stdout(line));

    const service = new GasAnalysisService({
      connection,
      progressSink: {
        report: (processed, total, blockNumber) =>
          output.stdout(formatProgressLine(processed, total, blockNumber)),
      },
    });

    const startedMs = clock();
    const { blocks, summary } = await service.run(config.blockCount);
    const elapsedSeconds = roundTo((clock() - startedMs) / 1000, 2);

    formatSummary(summary, elapsedSeconds).forEach((line) =>
      output.stdout(line)
    );

    if (config.json) {
      const report = buildJsonReport({
        rpcUrl: config.rpcUrl,
        chainId,
        finishedAt: now(),
        blocks,
        summary,
        elapsedSeconds,
      });
      output.stdout(serializeJsonReport(report));
    }

    return ExitCode.SUCCESS;
  } catch (error) {
    log.methodError(logger, 'runGasMonitor', error);
    output.stderr(`❌ ${describeError(error)}`);
    return exitCodeForError(error);
  }
}
