export * from './errors/index.js';
export {
  createConsoleLogger,
  resolveLogLevel,
  type Logger,
  type LogFields,
  type LogLevel,
} from './logger.js';
export { loadEnv, type EnvLoaderOptions, type EnvLoaderResult } from './env-loader.js';
