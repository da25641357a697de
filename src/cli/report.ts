/**
 * Report formatting
 *
 * Text lines for the console and the JSON document emitted with --json.
 */

import type { BlockMetrics } from '../services/types/block/block-metrics.js';
import type { AnalysisSummary } from '../services/types/gas-analysis/analysis-summary.js';
import { formatProgressPercent } from '../services/gas-analysis/progress.js';
import { TOOL_NAME } from './options.js';

/**
 * Whole numbers keep one decimal place ("20.0"), others print as they are
 */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export interface ReportHeader {
  rpcUrl: string;
  chainId: number;
  blockCount: number;
  startedAt: Date;
}

/**
 * Block record as it appears in the JSON document
 */
export interface JsonBlockRecord {
  block_number: number | string;
  base_fee_wei: number | string;
  gas_limit: number | string;
  gas_used: number | string;
  utilization_percent: number;
  timestamp: string;
}

export type JsonSummary =
  | {
      avg_utilization_percent: number;
      max_utilization_percent: number;
      min_utilization_percent: number;
      avg_base_fee_gwei: number;
      total_blocks: number;
    }
  | { ok: false; msg: string };

export interface JsonReport {
  rpc: string;
  chain_id: number;
  timestamp_utc: string;
  blocks: JsonBlockRecord[];
  summary: JsonSummary;
  elapsed_seconds: number;
}

/**
 * JSON number when exactly representable, decimal string otherwise
 */
export function toJsonInteger(value: bigint): number | string {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) &&
    value >= BigInt(Number.MIN_SAFE_INTEGER)
    ? Number(value)
    : value.toString();
}

export function formatHeader(header: ReportHeader): string[] {
  return [
    `🔧 ${TOOL_NAME}`,
    `🔗 RPC: ${header.rpcUrl}`,
    `⛓️ Chain ID: ${header.chainId}`,
    `🧱 Blocks to analyze: ${header.blockCount}`,
    `🕒 Timestamp: ${header.startedAt.toISOString()}`,
  ];
}

export function formatProgressLine(
  processed: number,
  total: number,
  blockNumber: bigint
): string {
  const percent = formatProgressPercent(processed, total);
  return `🔍 Analyzing block ${blockNumber} (${processed}/${total}, ${percent}% complete)...`;
}

export function formatSummary(
  summary: AnalysisSummary,
  elapsedSeconds: number
): string[] {
  const lines = ['', '📊 Summary:'];

  if (summary.ok) {
    lines.push(
      `  • Avg Utilization: ${formatDecimal(summary.avgUtilizationPercent)}%`,
      `  • Max Utilization: ${formatDecimal(summary.maxUtilizationPercent)}%`,
      `  • Min Utilization: ${formatDecimal(summary.minUtilizationPercent)}%`,
      `  • Avg Base Fee: ${formatDecimal(summary.avgBaseFeeGwei)} Gwei`,
      `  • Blocks Analyzed: ${summary.totalBlocks}`
    );
  } else {
    lines.push(`  • ${summary.msg}`);
  }

  lines.push(`⏱️ Completed in ${formatDecimal(elapsedSeconds)}s`);
  return lines;
}

export function toJsonBlockRecord(block: BlockMetrics): JsonBlockRecord {
  return {
    block_number: toJsonInteger(block.blockNumber),
    base_fee_wei: toJsonInteger(block.baseFeeWei),
    gas_limit: toJsonInteger(block.gasLimit),
    gas_used: toJsonInteger(block.gasUsed),
    utilization_percent: block.utilizationPercent,
    timestamp: block.timestamp,
  };
}

export function toJsonSummary(summary: AnalysisSummary): JsonSummary {
  if (!summary.ok) {
    return { ok: false, msg: summary.msg };
  }
  return {
    avg_utilization_percent: summary.avgUtilizationPercent,
    max_utilization_percent: summary.maxUtilizationPercent,
    min_utilization_percent: summary.minUtilizationPercent,
    avg_base_fee_gwei: summary.avgBaseFeeGwei,
    total_blocks: summary.totalBlocks,
  };
}

export function buildJsonReport(input: {
  rpcUrl: string;
  chainId: number;
  finishedAt: Date;
  blocks: readonly BlockMetrics[];
  summary: AnalysisSummary;
  elapsedSeconds: number;
}): JsonReport {
  return {
    rpc: input.rpcUrl,
    chain_id: input.chainId,
    timestamp_utc: input.finishedAt.toISOString(),
    blocks: input.blocks.map(toJsonBlockRecord),
    summary: toJsonSummary(input.summary),
    elapsed_seconds: input.elapsedSeconds,
  };
}

export function serializeJsonReport(report: JsonReport): string {
  return JSON.stringify(report, null, 2);
}
