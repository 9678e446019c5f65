export {
  getConfigWarnings,
  getConfiguredLogLevel,
  getEnvPassword,
  getLogDirectory,
  getNodeEnv,
  getToolTimeoutMs,
  getToolsDirectory,
  getWalletRootDirectory,
  isDevelopment,
  resetEnvCache,
  type ConfigLogLevel,
  type ConfigWarning,
} from './config.js';
