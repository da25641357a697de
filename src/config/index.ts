/**
 * Configuration exports
 */

export {
  RpcConfig,
  resolveRpcUrl,
  validateRpcUrl,
  validatePositiveInteger,
  DEFAULT_RPC_URL,
  DEFAULT_BLOCK_COUNT,
  DEFAULT_TIMEOUT_SECONDS,
  type RpcConfigOptions,
} from './rpc.js';
