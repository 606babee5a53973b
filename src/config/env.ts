/**
 * Environment configuration loader
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

// Load .env file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: join(__dirname, '../../.env') });

export interface Config {
  // Input logs
  acdLogSource: string;
  callLogSource?: string;

  // Output
  outputDir: string;
  reportFilename: string;
  writeJsonSummary: boolean;

  // Loading
  httpTimeoutMs: number;

  logLevel: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getOptionalEnvVar(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim() !== '' ? value : undefined;
}

function getEnvVarBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvVarNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    return defaultValue;
  }
  return parsed;
}

export const env: Config = {
  acdLogSource: getEnvVar('ACD_LOG_SOURCE', './data/acd.xlsx'),
  callLogSource: getOptionalEnvVar('CALL_LOG_SOURCE'),

  outputDir: getEnvVar('OUTPUT_DIR', './output'),
  reportFilename: getEnvVar('REPORT_FILENAME', 'abandon_analysis.xlsx'),
  writeJsonSummary: getEnvVarBoolean('WRITE_JSON_SUMMARY', true),

  httpTimeoutMs: getEnvVarNumber('HTTP_TIMEOUT_MS', 30000),

  logLevel: getEnvVar('LOG_LEVEL', 'INFO'),
};
