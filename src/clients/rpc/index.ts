/**
 * JSON-RPC Client Exports
 */

export { createRpcConnection, checkConnectivity } from './rpc-connection.js';
export type { RpcConnection, RawBlockHeader } from './types.js';
