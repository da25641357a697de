/**
 * Progress reporting for block range analysis
 */

import { formatFixed } from '../../utils/gas/gas-calculations.js';

/**
 * Receives one notification after each block is fetched
 */
export interface ProgressSink {
  /**
   * @param processed - Blocks fetched so far (1-based)
   * @param total - Blocks requested
   * @param blockNumber - Block that was just fetched
   */
  report(processed: number, total: number, blockNumber: bigint): void;
}

/**
 * Percentage complete with one decimal place, e.g. "33.3"
 */
export function formatProgressPercent(processed: number, total: number): string {
  return formatFixed((processed / total) * 100, 1);
}
