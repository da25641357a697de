/**
 * Tests for the viem-backed RPC connection
 */

import { describe, it, expect } from 'vitest';
import { createPublicClient } from 'viem';
import { ConnectivityError } from '../../errors/index.js';
import { createFakeChain, createFakeNode } from '../../test/helpers.js';
import { checkConnectivity, createRpcConnection } from './rpc-connection.js';

const blocks = createFakeChain(
  1000n,
  [3_000_000n, 6_000_000n, 9_000_000n],
  [1_000_000_000n, 2_000_000_000n, 3_000_000_000n]
);

function connect(node: ReturnType<typeof createFakeNode>) {
  return createRpcConnection(createPublicClient({ transport: node.transport }));
}

describe('createRpcConnection', () => {
  it('should read the chain ID', async () => {
    const node = createFakeNode({ chainId: 8453, blocks });

    await expect(connect(node).getChainId()).resolves.toBe(8453);
  });

  it('should read the head block number', async () => {
    const node = createFakeNode({ blocks });

    await expect(connect(node).getBlockNumber()).resolves.toBe(1000n);
  });

  it('should read a block header by number without transactions', async () => {
    const node = createFakeNode({ blocks });

    const header = await connect(node).getBlockHeader(999n);

    expect(header).toEqual({
      number: 999n,
      timestamp: 1_700_000_012n,
      gasLimit: 30_000_000n,
      gasUsed: 6_000_000n,
      baseFeePerGas: 2_000_000_000n,
    });
    expect(node.requests).toEqual([
      { method: 'eth_getBlockByNumber', params: ['0x3e7', false] },
    ]);
  });

  it('should read the latest block header', async () => {
    const node = createFakeNode({ blocks });

    const header = await connect(node).getBlockHeader('latest');

    expect(header.number).toBe(1000n);
    expect(node.requests).toEqual([
      { method: 'eth_getBlockByNumber', params: ['latest', false] },
    ]);
  });

  it('should report a null base fee for pre-London blocks', async () => {
    const node = createFakeNode({
      blocks: [
        {
          number: 5n,
          timestamp: 1_438_269_988n,
          gasLimit: 5000n,
          gasUsed: 0n,
        },
      ],
    });

    const header = await connect(node).getBlockHeader(5n);

    expect(header.baseFeePerGas).toBeNull();
  });

  it('should reject for a block that does not exist', async () => {
    const node = createFakeNode({ blocks });

    await expect(connect(node).getBlockHeader(5000n)).rejects.toThrow();
  });

  it('should issue exactly one request when a call fails', async () => {
    const node = createFakeNode({ blocks, failingBlock: 999n });

    await expect(connect(node).getBlockHeader(999n)).rejects.toThrow();
    expect(node.requests).toHaveLength(1);
  });
});

describe('checkConnectivity', () => {
  it('should return the chain ID of a reachable node', async () => {
    const node = createFakeNode({ chainId: 1, blocks });

    await expect(
      checkConnectivity(connect(node), 'https://rpc.example.test')
    ).resolves.toBe(1);
  });

  it('should throw ConnectivityError when the node is unreachable', async () => {
    const node = createFakeNode({ blocks, unreachable: true });

    const error = await checkConnectivity(
      connect(node),
      'https://rpc.example.test'
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectivityError);
    if (error instanceof ConnectivityError) {
      expect(error.message).toBe(
        'RPC connection failed. Check RPC_URL (https://rpc.example.test).'
      );
      expect(error.rpcUrl).toBe('https://rpc.example.test');
    }
  });
});
