/**
 * EVM Block Reader Utilities
 *
 * Low-level functions for reading block headers through an RpcConnection.
 * These are pure functions that take explicit dependencies for testability.
 */

import type {
  RawBlockHeader,
  RpcConnection,
} from '../../clients/rpc/types.js';
import { RemoteFetchError } from '../../errors/index.js';
import type {
  BlockIdentifier,
  BlockMetrics,
} from '../../services/types/block/block-metrics.js';
import {
  calculateUtilizationPercent,
  formatBlockTimestamp,
} from '../gas/gas-calculations.js';

type RequiredHeaderField = 'timestamp' | 'gasLimit' | 'gasUsed';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function requireField(
  header: RawBlockHeader,
  field: RequiredHeaderField,
  label: string
): bigint {
  const value = header[field];
  if (typeof value !== 'bigint') {
    throw new RemoteFetchError(
      `Malformed response for block ${label}: missing ${field}`,
      label
    );
  }
  return value;
}

/**
 * Convert a raw block header into BlockMetrics
 *
 * @param label - Identifier used in error messages
 * @throws RemoteFetchError if number, timestamp, gasLimit or gasUsed is missing
 */
export function toBlockMetrics(
  header: RawBlockHeader,
  label: string
): BlockMetrics {
  if (typeof header.number !== 'bigint') {
    throw new RemoteFetchError(
      `Malformed response for block ${label}: missing number`,
      label
    );
  }

  const gasLimit = requireField(header, 'gasLimit', label);
  const gasUsed = requireField(header, 'gasUsed', label);
  const timestamp = requireField(header, 'timestamp', label);

  return {
    blockNumber: header.number,
    baseFeeWei: header.baseFeePerGas ?? 0n,
    gasLimit,
    gasUsed,
    utilizationPercent: calculateUtilizationPercent(gasUsed, gasLimit),
    timestamp: formatBlockTimestamp(timestamp),
  };
}

/**
 * Fetch one block header and derive its gas metrics
 *
 * Issues exactly one RPC request. Failures are not retried.
 *
 * @param identifier - 'latest' or a block number
 * @throws RemoteFetchError if the request fails, the block does not exist
 *   or the response lacks a required field
 */
export async function fetchBlockMetrics(
  connection: RpcConnection,
  identifier: BlockIdentifier
): Promise<BlockMetrics> {
  const label = identifier.toString();

  let header: RawBlockHeader;
  try {
    header = await connection.getBlockHeader(identifier);
  } catch (error) {
    throw new RemoteFetchError(
      `Failed to get block ${label}: ${describeError(error)}`,
      label,
      { cause: error }
    );
  }

  return toBlockMetrics(header, label);
}

/**
 * Get the current (head) block number
 *
 * @throws RemoteFetchError if the RPC call fails
 */
export async function getHeadBlockNumber(
  connection: RpcConnection
): Promise<bigint> {
  try {
    return await connection.getBlockNumber();
  } catch (error) {
    throw new RemoteFetchError(
      `Failed to get current block number: ${describeError(error)}`,
      'latest',
      { cause: error }
    );
  }
}
