/**
 * Gas Monitor Errors
 *
 * Every failure of a run surfaces as one of these classes. The CLI maps
 * them to exit codes; nothing in the pipeline retries.
 */

/**
 * Base class for all gas monitor failures
 */
export class GasMonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GasMonitorError';
  }
}

/**
 * Invalid local configuration (RPC URL, block count, timeout).
 * Raised before any network activity.
 */
export class ConfigurationError extends GasMonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Initial liveness check against the RPC endpoint failed
 */
export class ConnectivityError extends GasMonitorError {
  constructor(
    message: string,
    public readonly rpcUrl: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConnectivityError';
  }
}

/**
 * Any failure while fetching blocks: missing block, malformed response,
 * timeout or mid-run disconnect
 */
export class RemoteFetchError extends GasMonitorError {
  constructor(
    message: string,
    public readonly blockIdentifier?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteFetchError';
  }
}

/**
 * Requested block count reaches below the genesis block
 */
export class InvalidRangeError extends GasMonitorError {
  constructor(
    public readonly headBlockNumber: bigint,
    public readonly count: number
  ) {
    super(
      `Cannot analyze ${count} blocks: chain head is block ${headBlockNumber}, ` +
        `only ${headBlockNumber + 1n} blocks exist`
    );
    this.name = 'InvalidRangeError';
  }
}
