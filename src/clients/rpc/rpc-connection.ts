/**
 * RPC Connection
 *
 * Adapts a viem PublicClient to the RpcConnection interface and performs
 * the startup liveness check.
 */

import type { PublicClient } from 'viem';
import { ConnectivityError } from '../../errors/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { BlockIdentifier } from '../../services/types/block/block-metrics.js';
import type { RawBlockHeader, RpcConnection } from './types.js';

const logger = createServiceLogger('RpcConnection');

/**
 * Wrap a viem PublicClient as an RpcConnection
 *
 * Every method issues exactly one JSON-RPC request. Retries are the
 * transport's concern and are expected to be disabled.
 */
export function createRpcConnection(client: PublicClient): RpcConnection {
  return {
    async getChainId(): Promise<number> {
      log.externalApiCall(logger, 'Ethereum RPC', 'eth_chainId');
      return client.getChainId();
    },

    async getBlockNumber(): Promise<bigint> {
      log.externalApiCall(logger, 'Ethereum RPC', 'eth_blockNumber');
      return client.getBlockNumber({ cacheTime: 0 });
    },

    async getBlockHeader(identifier: BlockIdentifier): Promise<RawBlockHeader> {
      log.externalApiCall(logger, 'Ethereum RPC', 'eth_getBlockByNumber', {
        block: identifier.toString(),
      });

      const block =
        identifier === 'latest'
          ? await client.getBlock({
              blockTag: 'latest',
              includeTransactions: false,
            })
          : await client.getBlock({
              blockNumber: identifier,
              includeTransactions: false,
            });

      return {
        number: block.number,
        timestamp: block.timestamp,
        gasLimit: block.gasLimit,
        gasUsed: block.gasUsed,
        baseFeePerGas: block.baseFeePerGas,
      };
    },
  };
}

/**
 * Verify the endpoint answers JSON-RPC requests
 *
 * @param rpcUrl - Endpoint URL, used in the error message only
 * @returns Chain ID reported by the node
 * @throws ConnectivityError if the request fails for any reason
 */
export async function checkConnectivity(
  connection: RpcConnection,
  rpcUrl: string
): Promise<number> {
  try {
    const chainId = await connection.getChainId();
    logger.info({ chainId }, 'RPC endpoint reachable');
    return chainId;
  } catch (error) {
    log.methodError(logger, 'checkConnectivity', error, { rpcUrl });
    throw new ConnectivityError(
      `RPC connection failed. Check RPC_URL (${rpcUrl}).`,
      rpcUrl,
      { cause: error }
    );
  }
}
