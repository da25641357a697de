#!/usr/bin/env node
/**
 * gas-utilization-monitor entry point
 *
 * Structured logs stay off unless LOG_LEVEL is set; the logger reads it
 * when first imported, hence the dynamic import.
 */

process.env['LOG_LEVEL'] ??= 'silent';

const { runGasMonitor } = await import('./run.js');

process.exitCode = await runGasMonitor(process.argv.slice(2));

export {};
