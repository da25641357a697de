/**
 * Analysis Summary
 *
 * Aggregate statistics over an analyzed block range.
 * Callers must check `ok` before reading the statistical fields.
 */

export interface GasStatistics {
  readonly ok: true;
  readonly avgUtilizationPercent: number;
  readonly maxUtilizationPercent: number;
  readonly minUtilizationPercent: number;
  /** Mean base fee in gwei, rounded to 3 decimals */
  readonly avgBaseFeeGwei: number;
  readonly totalBlocks: number;
}

/**
 * Returned when there were no blocks to summarize
 */
export interface NoDataSummary {
  readonly ok: false;
  readonly msg: 'No data';
}

export type AnalysisSummary = GasStatistics | NoDataSummary;
