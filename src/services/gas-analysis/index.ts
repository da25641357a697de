export { GasAnalysisService } from './gas-analysis-service.js';
export type {
  GasAnalysisServiceDependencies,
  GasAnalysisResult,
} from './gas-analysis-service.js';
export { analyzeBlockRange, computeBlockRange } from './block-range-analyzer.js';
export { formatProgressPercent, type ProgressSink } from './progress.js';
