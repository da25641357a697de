export type {
  AnalysisSummary,
  GasStatistics,
  NoDataSummary,
} from './analysis-summary.js';
