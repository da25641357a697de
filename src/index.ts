/**
 * Gas Utilization Monitor
 *
 * Reads recent block headers from an EVM JSON-RPC endpoint and reports
 * gas utilization and base fee statistics.
 */

export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './clients/rpc/index.js';
export * from './utils/evm/index.js';
export * from './utils/gas/index.js';
export * from './services/gas-analysis/index.js';
export * from './services/types/block/index.js';
export * from './services/types/gas-analysis/index.js';

export { runGasMonitor } from './cli/run.js';
export type { CliOutput, GasMonitorDependencies } from './cli/run.js';
export { ExitCode, exitCodeForError } from './cli/exit-codes.js';

export const version = '0.1.0';
