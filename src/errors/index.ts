export {
  GasMonitorError,
  ConfigurationError,
  ConnectivityError,
  RemoteFetchError,
  InvalidRangeError,
} from './gas-monitor-errors.js';
