// ============================================================================
// sd-connector: public API
// ============================================================================

export * from './params/index.js';
export * from './registry/index.js';
export * from './invoker/index.js';
export * from './client/index.js';
export * from './errors.js';
export { getConfig, log, warn, DEFAULT_WSDL_PREFIX, DEFAULT_TIMEOUT_MS, type Config } from './config.js';
export {
  loadConnectorConfig,
  mergeCliOverrides,
  resolveCredentials,
  toConnectorOptions,
  getConfigPath,
  type ConnectorConfig,
} from './connectorConfig.js';
