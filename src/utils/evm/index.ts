/**
 * EVM Utilities
 *
 * Block header reading
 */

export {
  fetchBlockMetrics,
  getHeadBlockNumber,
  toBlockMetrics,
} from './block-reader.js';
