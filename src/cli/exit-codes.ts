/**
 * Process exit codes
 */

import { ConfigurationError, ConnectivityError } from '../errors/index.js';

export enum ExitCode {
  SUCCESS = 0,
  /** Invalid configuration or failed connectivity check */
  SETUP_FAILED = 1,
  /** Failure while fetching or analyzing blocks */
  ANALYSIS_FAILED = 2,
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError || error instanceof ConnectivityError) {
    return ExitCode.SETUP_FAILED;
  }
  return ExitCode.ANALYSIS_FAILED;
}
