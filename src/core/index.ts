// Core module exports
export {
  ConfigManager,
  parseConfigText,
  resolveConfigPath,
  type ConfigSections,
  type Settings,
  type LogLevel,
  type Rotation,
} from './config.js';
export {
  AppLogger,
  setupLogger,
  getLogger,
  createAppLogger,
  runLoggingDemo,
  type LoggerOptions,
  type LogMeta,
} from './logger.js';
