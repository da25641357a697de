/**
 * Block Range Summarizer
 *
 * Reduces a sequence of BlockMetrics to aggregate statistics.
 */

import type { BlockMetrics } from '../../services/types/block/block-metrics.js';
import type {
  AnalysisSummary,
  NoDataSummary,
} from '../../services/types/gas-analysis/analysis-summary.js';
import { roundTo, weiToGwei } from './gas-calculations.js';

export const NO_DATA_SUMMARY: NoDataSummary = { ok: false, msg: 'No data' };

/**
 * Summarize analyzed blocks
 *
 * Utilization figures are rounded to 2 decimals, the average base fee is
 * expressed in gwei and rounded to 3 decimals.
 *
 * @returns Aggregate statistics, or NO_DATA_SUMMARY for an empty input
 */
export function summarizeBlocks(
  blocks: readonly BlockMetrics[]
): AnalysisSummary {
  if (blocks.length === 0) {
    return NO_DATA_SUMMARY;
  }

  const utilizations = blocks.map((block) => block.utilizationPercent);
  const totalUtilization = utilizations.reduce((sum, value) => sum + value, 0);
  const totalBaseFeeWei = blocks.reduce(
    (sum, block) => sum + block.baseFeeWei,
    0n
  );
  const avgBaseFeeWei = Number(totalBaseFeeWei) / blocks.length;

  return {
    ok: true,
    avgUtilizationPercent: roundTo(totalUtilization / blocks.length, 2),
    maxUtilizationPercent: roundTo(
      utilizations.reduce((max, value) => Math.max(max, value), -Infinity),
      2
    ),
    minUtilizationPercent: roundTo(
      utilizations.reduce((min, value) => Math.min(min, value), Infinity),
      2
    ),
    avgBaseFeeGwei: roundTo(weiToGwei(avgBaseFeeWei), 3),
    totalBlocks: blocks.length,
  };
}
