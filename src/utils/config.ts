import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface AnalysisConfig {
  /** Case-insensitive name tokens marking clock/reset nets that are never wired */
  ignoredSignals: string[];
  /** Operator count above which an unclocked block is a datapath */
  datapathOpThreshold: number;
}

export interface Config {
  logging: LoggingConfig;
  analysis: AnalysisConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

function getEnvVarAsList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value
    .split(',')
    .map(item => item.trim().toLowerCase())
    .filter(item => item.length > 0);
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: process.env.LOG_FILE,
  },
  analysis: {
    ignoredSignals: getEnvVarAsList('RTLGRAPH_IGNORED_SIGNALS', ['clk', 'clock', 'rst', 'reset']),
    datapathOpThreshold: getEnvVarAsNumber('RTLGRAPH_DATAPATH_OP_THRESHOLD', 3),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
