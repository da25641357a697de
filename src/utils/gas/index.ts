export {
  WEI_PER_GWEI,
  roundTo,
  formatFixed,
  calculateUtilizationPercent,
  weiToGwei,
  formatBlockTimestamp,
} from './gas-calculations.js';
export { summarizeBlocks, NO_DATA_SUMMARY } from './summarize.js';
