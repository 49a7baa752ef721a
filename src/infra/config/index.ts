/**
 * Configuration module exports
 */
export { getConfigDir } from './config-paths.js';

export {
  type TickgraphRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  getRuntimeConfigPath,
  normalizeConfig,
  applyEnvironmentOverrides,
  loadRuntimeConfig,
  saveRuntimeConfig,
} from './runtime-config.js';

export { isDebugLoggingEnabled, isGenericDebugEnabled, isTickgraphDebugEnabled } from './debug-flags.js';
