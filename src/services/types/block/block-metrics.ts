/**
 * Block Metrics
 *
 * Gas figures of one block, derived from a single block header.
 * All on-chain quantities are bigint to preserve precision.
 */
export interface BlockMetrics {
  /** Block number */
  readonly blockNumber: bigint;

  /** Base fee per gas in wei (0 on chains without EIP-1559) */
  readonly baseFeeWei: bigint;

  /** Maximum gas allowed in the block */
  readonly gasLimit: bigint;

  /** Total gas used in the block */
  readonly gasUsed: bigint;

  /** gasUsed / gasLimit as a percentage, rounded to 2 decimals */
  readonly utilizationPercent: number;

  /** Block timestamp as UTC ISO-8601 (e.g. "2023-11-14T22:13:20Z") */
  readonly timestamp: string;
}

/**
 * Identifies the block to fetch: the chain head or a specific number
 */
export type BlockIdentifier = 'latest' | bigint;
