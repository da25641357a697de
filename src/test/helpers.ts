/**
 * Test helper functions
 *
 * An in-process stand-in for an EVM JSON-RPC node, exposed as a viem
 * custom transport, plus BlockMetrics fixtures.
 */

import { custom, numberToHex, type Transport } from 'viem';
import type { BlockMetrics } from '../services/types/block/block-metrics.js';

export interface FakeBlock {
  number: bigint;
  timestamp: bigint;
  gasLimit: bigint;
  gasUsed: bigint;
  /** Omitted for pre-London blocks */
  baseFeePerGas?: bigint;
}

export interface FakeNodeOptions {
  chainId?: number;
  blocks: FakeBlock[];
  /** eth_chainId fails, as if the endpoint were down */
  unreachable?: boolean;
  /** eth_getBlockByNumber fails for this block */
  failingBlock?: bigint;
}

export interface RecordedRequest {
  method: string;
  params: unknown;
}

export interface FakeNode {
  transport: Transport;
  requests: RecordedRequest[];
}

function toRpcBlock(block: FakeBlock): Record<string, unknown> {
  return {
    number: numberToHex(block.number),
    hash: numberToHex(block.number, { size: 32 }),
    parentHash: numberToHex(block.number - 1n, { size: 32 }),
    timestamp: numberToHex(block.timestamp),
    gasLimit: numberToHex(block.gasLimit),
    gasUsed: numberToHex(block.gasUsed),
    ...(block.baseFeePerGas !== undefined && {
      baseFeePerGas: numberToHex(block.baseFeePerGas),
    }),
    transactions: [],
  };
}

/**
 * Create a fake node serving the given blocks
 *
 * The head is the highest block number. Unknown blocks resolve to null,
 * which viem reports as BlockNotFoundError.
 */
export function createFakeNode(options: FakeNodeOptions): FakeNode {
  const requests: RecordedRequest[] = [];
  const byNumber = new Map(options.blocks.map((block) => [block.number, block]));
  const head = options.blocks.reduce(
    (max, block) => (block.number > max ? block.number : max),
    0n
  );

  const request = async ({
    method,
    params,
  }: {
    method: string;
    params?: unknown;
  }): Promise<unknown> => {
    requests.push({ method, params });

    switch (method) {
      case 'eth_chainId':
        if (options.unreachable) {
          throw new Error('connect ECONNREFUSED 127.0.0.1:8545');
        }
        return numberToHex(options.chainId ?? 1);

      case 'eth_blockNumber':
        return numberToHex(head);

      case 'eth_getBlockByNumber': {
        const tag = Array.isArray(params) ? params[0] : undefined;
        const blockNumber = tag === 'latest' ? head : BigInt(String(tag));
        if (options.failingBlock === blockNumber) {
          throw new Error('upstream request timed out');
        }
        const block = byNumber.get(blockNumber);
        return block ? toRpcBlock(block) : null;
      }

      default:
        throw new Error(`Unsupported method: ${method}`);
    }
  };

  return {
    transport: custom({ request }, { retryCount: 0 }),
    requests,
  };
}

/**
 * Consecutive blocks ending at `head`, 12 seconds apart
 */
export function createFakeChain(
  head: bigint,
  gasUsed: bigint[],
  baseFees: bigint[],
  gasLimit = 30_000_000n
): FakeBlock[] {
  const first = head - BigInt(gasUsed.length) + 1n;
  return gasUsed.map((used, index) => ({
    number: first + BigInt(index),
    timestamp: 1_700_000_000n + BigInt(index * 12),
    gasLimit,
    gasUsed: used,
    baseFeePerGas: baseFees[index],
  }));
}

export function createBlockMetrics(
  overrides: Partial<BlockMetrics> = {}
): BlockMetrics {
  return {
    blockNumber: 19_000_000n,
    baseFeeWei: 30_000_000_000n,
    gasLimit: 30_000_000n,
    gasUsed: 15_000_000n,
    utilizationPercent: 50,
    timestamp: '2023-11-14T22:13:20Z',
    ...overrides,
  };
}
