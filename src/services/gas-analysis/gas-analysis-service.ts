/**
 * Gas Analysis Service
 *
 * Fetches recent block headers and summarizes their gas utilization and
 * base fee. Wraps the block reader, range analyzer and summarizer with
 * structured logging.
 */

import type { RpcConnection } from '../../clients/rpc/types.js';
import { createServiceLogger, log } from '../../logging/logger-factory.js';
import { fetchBlockMetrics } from '../../utils/evm/block-reader.js';
import { summarizeBlocks } from '../../utils/gas/summarize.js';
import type {
  BlockIdentifier,
  BlockMetrics,
} from '../types/block/block-metrics.js';
import type { AnalysisSummary } from '../types/gas-analysis/analysis-summary.js';
import { analyzeBlockRange } from './block-range-analyzer.js';
import { formatProgressPercent, type ProgressSink } from './progress.js';

/**
 * Dependencies for GasAnalysisService
 */
export interface GasAnalysisServiceDependencies {
  /**
   * Connection to the node being analyzed
   */
  connection: RpcConnection;

  /**
   * Receives per-block progress during analyzeRange()
   * If not provided, progress is logged at debug level
   */
  progressSink?: ProgressSink;
}

export interface GasAnalysisResult {
  blocks: BlockMetrics[];
  summary: AnalysisSummary;
}

export class GasAnalysisService {
  private readonly connection: RpcConnection;
  private readonly progressSink: ProgressSink;
  private readonly logger = createServiceLogger('GasAnalysisService');

  constructor(dependencies: GasAnalysisServiceDependencies) {
    this.connection = dependencies.connection;
    this.progressSink = dependencies.progressSink ?? {
      report: (processed, total, blockNumber) => {
        this.logger.debug(
          {
            processed,
            total,
            percent: formatProgressPercent(processed, total),
            blockNumber: blockNumber.toString(),
          },
          'Block analyzed'
        );
      },
    };
  }

  /**
   * Fetch gas metrics for a single block
   *
   * @throws RemoteFetchError if the block cannot be retrieved
   */
  async fetchBlock(identifier: BlockIdentifier): Promise<BlockMetrics> {
    const block = identifier.toString();
    log.methodEntry(this.logger, 'fetchBlock', { block });

    try {
      const metrics = await fetchBlockMetrics(this.connection, identifier);

      log.methodExit(this.logger, 'fetchBlock', {
        blockNumber: metrics.blockNumber.toString(),
        utilizationPercent: metrics.utilizationPercent,
      });

      return metrics;
    } catch (error) {
      log.methodError(this.logger, 'fetchBlock', error, { block });
      throw error;
    }
  }

  /**
   * Fetch gas metrics for the `count` most recent blocks, oldest first
   *
   * @throws RemoteFetchError on any RPC failure
   * @throws InvalidRangeError if the chain is shorter than `count`
   */
  async analyzeRange(count: number): Promise<BlockMetrics[]> {
    log.methodEntry(this.logger, 'analyzeRange', { count });

    try {
      const blocks = await analyzeBlockRange(
        this.connection,
        count,
        this.progressSink
      );

      log.methodExit(this.logger, 'analyzeRange', {
        count: blocks.length,
        fromBlock: blocks[0]?.blockNumber.toString(),
        toBlock: blocks[blocks.length - 1]?.blockNumber.toString(),
      });

      return blocks;
    } catch (error) {
      log.methodError(this.logger, 'analyzeRange', error, { count });
      throw error;
    }
  }

  /**
   * Aggregate statistics over analyzed blocks
   */
  summarize(blocks: readonly BlockMetrics[]): AnalysisSummary {
    return summarizeBlocks(blocks);
  }

  /**
   * Analyze the `count` most recent blocks and summarize them
   */
  async run(count: number): Promise<GasAnalysisResult> {
    const blocks = await this.analyzeRange(count);
    const summary = this.summarize(blocks);

    if (summary.ok) {
      this.logger.info(
        {
          totalBlocks: summary.totalBlocks,
          avgUtilizationPercent: summary.avgUtilizationPercent,
          avgBaseFeeGwei: summary.avgBaseFeeGwei,
        },
        'Gas analysis complete'
      );
    }

    return { blocks, summary };
  }
}
