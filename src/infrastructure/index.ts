export * from './boundary/index.js';
export * from './sse/index.js';
export { loadConfig, requireBoundarySecret, ConfigError, DEFAULT_CONFIG } from './config.js';
export type { AppConfig, FanoutMode, LogLevel } from './config.js';
