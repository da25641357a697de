/**
 * RPC Run Configuration
 *
 * Resolved settings for one analysis run and the viem client built from them.
 *
 * Environment Variables:
 * - RPC_URL - Default RPC endpoint when --rpc is not given
 *
 * The environment is read once, by resolveRpcUrl(); everything downstream
 * receives an RpcConfig instance.
 */

import {
  createPublicClient,
  http,
  type PublicClient,
  type Transport,
} from 'viem';
import { ConfigurationError } from '../errors/index.js';

/**
 * Placeholder endpoint used when neither --rpc nor RPC_URL is set
 */
export const DEFAULT_RPC_URL = 'https://mainnet.infura.io/v3/YOUR_INFURA_KEY';

export const DEFAULT_BLOCK_COUNT = 10;

export const DEFAULT_TIMEOUT_SECONDS = 30;

const ALLOWED_URL_PREFIXES = ['http://', 'https://'] as const;

/**
 * Options accepted by the RpcConfig constructor
 */
export interface RpcConfigOptions {
  /** JSON-RPC endpoint (http:// or https://) */
  rpcUrl: string;
  /** Per-request timeout in seconds */
  timeoutSeconds?: number;
  /** Number of most recent blocks to analyze */
  blockCount?: number;
  /** Emit the JSON document after the text report */
  json?: boolean;
  /**
   * Transport override. When omitted, an HTTP transport without retries
   * is created for rpcUrl.
   */
  transport?: Transport;
}

/**
 * Pick the RPC URL: explicit flag first, then RPC_URL, then the placeholder
 */
export function resolveRpcUrl(
  flagValue: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return flagValue ?? env['RPC_URL'] ?? DEFAULT_RPC_URL;
}

/**
 * @throws ConfigurationError unless the URL starts with http:// or https://
 */
export function validateRpcUrl(rpcUrl: string): void {
  if (!ALLOWED_URL_PREFIXES.some((prefix) => rpcUrl.startsWith(prefix))) {
    throw new ConfigurationError(
      `Invalid RPC URL format: "${rpcUrl}". Expected an http:// or https:// URL.`
    );
  }
}

/**
 * @throws ConfigurationError unless value is an integer >= 1
 */
export function validatePositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigurationError(
      `Invalid ${name}: ${value}. Expected an integer >= 1.`
    );
  }
}

/**
 * RPC Configuration
 *
 * Validates its inputs on construction, so an instance always describes a
 * runnable configuration. The viem client is created lazily and reused.
 */
export class RpcConfig {
  readonly rpcUrl: string;
  readonly timeoutSeconds: number;
  readonly blockCount: number;
  readonly json: boolean;
  private readonly transport: Transport | undefined;
  private client: PublicClient | null = null;

  /**
   * @throws ConfigurationError on a malformed URL, count or timeout
   */
  constructor(options: RpcConfigOptions) {
    validateRpcUrl(options.rpcUrl);
    const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    const blockCount = options.blockCount ?? DEFAULT_BLOCK_COUNT;
    validatePositiveInteger(timeoutSeconds, 'timeout');
    validatePositiveInteger(blockCount, 'block count');

    this.rpcUrl = options.rpcUrl;
    this.timeoutSeconds = timeoutSeconds;
    this.blockCount = blockCount;
    this.json = options.json ?? false;
    this.transport = options.transport;
  }

  /**
   * Build a configuration whose URL falls back to RPC_URL
   */
  static fromEnvironment(
    options: Omit<RpcConfigOptions, 'rpcUrl'> & { rpcUrl?: string },
    env: NodeJS.ProcessEnv = process.env
  ): RpcConfig {
    return new RpcConfig({
      ...options,
      rpcUrl: resolveRpcUrl(options.rpcUrl, env),
    });
  }

  get timeoutMs(): number {
    return this.timeoutSeconds * 1000;
  }

  /**
   * Get the viem PublicClient for this endpoint
   *
   * The HTTP transport applies timeoutMs to every request and never retries.
   */
  getPublicClient(): PublicClient {
    if (this.client) {
      return this.client;
    }

    const client = createPublicClient({
      transport:
        this.transport ??
        http(this.rpcUrl, { timeout: this.timeoutMs, retryCount: 0 }),
    });

    this.client = client;
    return client;
  }
}
