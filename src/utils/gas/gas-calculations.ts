/**
 * Gas Calculation Utilities
 *
 * Pure functions deriving utilization and fee figures from block header values.
 *
 * @module gas-calculations
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Wei per gwei (1 gwei = 10^9 wei)
 */
export const WEI_PER_GWEI = 1e9;

// ============================================================================
// ROUNDING
// ============================================================================

/**
 * Round a number to a fixed number of decimal places
 *
 * Works on the exact decimal expansion of the double, so 2.675 (stored as
 * 2.67499999...) rounds to 2.67. Exact ties round half to even.
 *
 * @example
 * ```typescript
 * roundTo(41.15226, 2); // 41.15
 * roundTo(50.125, 2);   // 50.12
 * roundTo(2.0004, 3);   // 2
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const expansion = Math.abs(value).toFixed(100);
  const point = expansion.indexOf('.');
  if (point === -1) {
    return value;
  }

  const kept = expansion.slice(0, point + 1 + decimals);
  const rest = expansion.slice(point + 1 + decimals);
  const lastKeptDigit = Number(
    decimals === 0 ? expansion.charAt(point - 1) : kept.charAt(kept.length - 1)
  );
  if (/^50*$/.test(rest) && lastKeptDigit % 2 === 0) {
    return value < 0 ? -Number(kept) : Number(kept);
  }

  return Number(value.toFixed(decimals));
}

/**
 * Format with exactly `decimals` places, rounding ties to even
 *
 * @example
 * ```typescript
 * formatFixed(6.25, 1); // "6.2"
 * formatFixed(100, 1);  // "100.0"
 * ```
 */
export function formatFixed(value: number, decimals: number): string {
  return roundTo(value, decimals).toFixed(decimals);
}

// ============================================================================
// BLOCK FIGURES
// ============================================================================

/**
 * Calculate gas utilization of a block as a percentage
 *
 * Formula: round(gasUsed / gasLimit × 100, 2)
 *
 * A zero gas limit yields 0 rather than dividing by zero.
 *
 * @example
 * ```typescript
 * calculateUtilizationPercent(15_000_000n, 30_000_000n); // 50
 * ```
 */
export function calculateUtilizationPercent(
  gasUsed: bigint,
  gasLimit: bigint
): number {
  if (gasLimit === 0n) {
    return 0;
  }
  return roundTo((Number(gasUsed) / Number(gasLimit)) * 100, 2);
}

/**
 * Convert a wei amount to gwei
 */
export function weiToGwei(wei: number): number {
  return wei / WEI_PER_GWEI;
}

/**
 * Format a Unix timestamp (seconds) as a UTC ISO-8601 string without milliseconds
 *
 * @example
 * ```typescript
 * formatBlockTimestamp(1_700_000_000n); // "2023-11-14T22:13:20Z"
 * ```
 */
export function formatBlockTimestamp(unixSeconds: bigint): string {
  return new Date(Number(unixSeconds) * 1000)
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z');
}
