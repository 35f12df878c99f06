import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { UsageError } from './errors';
import type { OutputFormat, Severity } from './types';
import { isOutputFormat, isRecord, isSeverity } from './utils';

/** Values a `.spm-lens.yaml` file may set. */
export interface LensConfig {
  format?: OutputFormat;
  severity?: Severity;
  metrics?: boolean;
  verbose?: boolean;
}

export interface ResolvedLensConfig {
  format: OutputFormat;
  severity: Severity;
  metrics: boolean;
  verbose: boolean;
}

export const CONFIG_FILE_NAME = '.spm-lens.yaml';

export const DEFAULT_CONFIG: ResolvedLensConfig = {
  format: 'json',
  severity: 'info',
  metrics: false,
  verbose: false
};

/**
 * Project directory first, then the home directory.
 */
export function getConfigSearchPaths(cwd: string = process.cwd()): string[] {
  return [path.join(cwd, CONFIG_FILE_NAME), path.join(os.homedir(), CONFIG_FILE_NAME)];
}

/**
 * Returns undefined if the file doesn't exist or can't be parsed.
 */
export function loadConfigFile(filePath: string): LensConfig | undefined {
  try {
    if (!fs.existsSync(filePath)) return undefined;
    const content = fs.readFileSync(filePath, 'utf8');
    return validateConfig(yaml.load(content));
  } catch {
    return undefined;
  }
}

export function validateConfig(config: unknown): LensConfig | undefined {
  if (!isRecord(config)) return undefined;

  const result: LensConfig = {};
  if (isOutputFormat(config.format)) {
    result.format = config.format;
  }
  if (isSeverity(config.severity)) {
    result.severity = config.severity;
  }
  if (typeof config.metrics === 'boolean') {
    result.metrics = config.metrics;
  }
  if (typeof config.verbose === 'boolean') {
    result.verbose = config.verbose;
  }
  return result;
}

export function mergeConfig(base: ResolvedLensConfig, override?: LensConfig): ResolvedLensConfig {
  if (!override) return { ...base };
  return {
    format: override.format ?? base.format,
    severity: override.severity ?? base.severity,
    metrics: override.metrics ?? base.metrics,
    verbose: override.verbose ?? base.verbose
  };
}

/**
 * Merges the first readable config file over the defaults. An explicit path skips the search
 * and must exist. Command-line flags are applied on top of the result by the caller.
 */
export function resolveConfig(configPath?: string, cwd?: string): ResolvedLensConfig {
  if (configPath) {
    if (!fs.existsSync(configPath)) throw new UsageError(`Config file not found: ${configPath}`);
    return mergeConfig(DEFAULT_CONFIG, loadConfigFile(configPath));
  }
  for (const candidate of getConfigSearchPaths(cwd)) {
    const loaded = loadConfigFile(candidate);
    if (loaded) return mergeConfig(DEFAULT_CONFIG, loaded);
  }
  return { ...DEFAULT_CONFIG };
}
