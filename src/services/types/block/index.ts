export type { BlockMetrics, BlockIdentifier } from './block-metrics.js';
