/**
 * Block Range Analyzer
 *
 * Fetches the N most recent blocks, oldest first, one request at a time.
 */

import type { RpcConnection } from '../../clients/rpc/types.js';
import { ConfigurationError, InvalidRangeError } from '../../errors/index.js';
import {
  fetchBlockMetrics,
  getHeadBlockNumber,
} from '../../utils/evm/block-reader.js';
import type { BlockMetrics } from '../types/block/block-metrics.js';
import type { ProgressSink } from './progress.js';

function assertBlockCount(count: number): void {
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new ConfigurationError(
      `Invalid block count: ${count}. Expected an integer >= 1.`
    );
  }
}

/**
 * Inclusive ascending range [head - count + 1, head]
 *
 * @throws InvalidRangeError if the range would start below block 0
 */
export function computeBlockRange(head: bigint, count: number): bigint[] {
  assertBlockCount(count);

  const start = head - BigInt(count) + 1n;
  if (start < 0n) {
    throw new InvalidRangeError(head, count);
  }

  return Array.from({ length: count }, (_, offset) => start + BigInt(offset));
}

/**
 * Analyze the `count` most recent blocks
 *
 * Queries the head once, then fetches each block of the range in ascending
 * order, waiting for each response before the next request. The first
 * failure aborts the whole range; no partial result is returned.
 *
 * @returns Exactly `count` metrics, block numbers increasing by one, ending at the head
 * @throws RemoteFetchError on any RPC failure
 * @throws InvalidRangeError if the chain has fewer than `count` blocks
 */
export async function analyzeBlockRange(
  connection: RpcConnection,
  count: number,
  progressSink?: ProgressSink
): Promise<BlockMetrics[]> {
  assertBlockCount(count);

  const head = await getHeadBlockNumber(connection);
  const range = computeBlockRange(head, count);

  const blocks: BlockMetrics[] = [];
  for (const [index, blockNumber] of range.entries()) {
    const metrics = await fetchBlockMetrics(connection, blockNumber);
    blocks.push(metrics);
    progressSink?.report(index + 1, count, blockNumber);
  }

  return blocks;
}
