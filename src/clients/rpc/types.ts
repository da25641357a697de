/**
 * JSON-RPC Connection Type Definitions
 */

import type { BlockIdentifier } from '../../services/types/block/block-metrics.js';

/**
 * Gas-related fields of a block header as returned by the node
 *
 * Fields are left optional: a malformed response may omit any of them,
 * and the block reader decides which absences are fatal.
 */
export interface RawBlockHeader {
  /** Block number, null for a pending block */
  number?: bigint | null;
  /** Block timestamp (Unix seconds) */
  timestamp?: bigint;
  gasLimit?: bigint;
  gasUsed?: bigint;
  /** Base fee per gas, null or absent before EIP-1559 */
  baseFeePerGas?: bigint | null;
}

/**
 * Capability the analysis pipeline needs from a blockchain node
 */
export interface RpcConnection {
  /** eth_chainId */
  getChainId(): Promise<number>;
  /** eth_blockNumber */
  getBlockNumber(): Promise<bigint>;
  /** eth_getBlockByNumber without transaction bodies */
  getBlockHeader(identifier: BlockIdentifier): Promise<RawBlockHeader>;
}
