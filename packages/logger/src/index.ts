export {
  flushLoggers,
  formatLabel,
  getLogger,
  getLoggerTransports,
  setLoggerTransports,
  type Logger,
} from './logger.ts';
export { LOG_LEVELS, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.ts';
