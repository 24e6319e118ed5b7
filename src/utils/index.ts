export { config } from './config';
export type { Config, LoggingConfig, AnalysisConfig } from './config';
export { logger, createComponentLogger, setLogLevel, flushLogs } from './logger';
