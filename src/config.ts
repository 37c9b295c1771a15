// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import * as fs from 'fs';
import * as path from 'path';
import { logger, LogLevel, logLevelFromName, parseLogLevel } from './logger.js';
import { ShellPaths } from './paths.js';

/**
 * Shape of ~/.agent-shell/config.json. Every key is optional.
 */
export interface ShellConfig {
  /** Directory holding agent definitions and general.json */
  agentsDir?: string;
  /** File the line history is appended to */
  historyFile?: string;
  /** Load the default agent on startup (default: true) */
  loadDefaultAgent?: boolean;
  /** normal | verbose | debug | trace */
  logLevel?: string;
}

/**
 * Options taken from the command line. Commander fills `defaultAgent`
 * with false when --no-default-agent is passed.
 */
export interface CliOptions {
  agentsDir?: string;
  historyFile?: string;
  defaultAgent?: boolean;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

export interface ResolvedConfig {
  agentsDir: string;
  historyFile: string;
  loadDefaultAgent: boolean;
  logLevel: LogLevel;
}

const VALID_LOG_LEVELS = ['normal', 'verbose', 'debug', 'trace'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys out of parsed JSON.
 * Returns the typed config plus a warning for every key that was dropped.
 */
export function parseConfig(raw: unknown): { config: ShellConfig; warnings: string[] } {
  const warnings: string[] = [];
  const config: ShellConfig = {};

  if (!isRecord(raw)) {
    return { config, warnings: ['Config must be a JSON object'] };
  }

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'agentsDir':
      case 'historyFile':
      case 'logLevel':
        if (typeof value === 'string') {
          config[key] = value;
        } else {
          warnings.push(`${key} must be a string`);
        }
        break;
      case 'loadDefaultAgent':
        if (typeof value === 'boolean') {
          config.loadDefaultAgent = value;
        } else {
          warnings.push('loadDefaultAgent must be a boolean');
        }
        break;
      default:
        warnings.push(`Unknown config key "${key}"`);
    }
  }

  return { config, warnings };
}

/**
 * Validate config values.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: ShellConfig): string[] {
  const warnings: string[] = [];

  if (config.logLevel !== undefined && logLevelFromName(config.logLevel) === undefined) {
    warnings.push(`Unknown logLevel "${config.logLevel}". Valid: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  if (config.agentsDir !== undefined && config.agentsDir.trim() === '') {
    warnings.push('agentsDir must not be empty');
  }

  if (config.historyFile !== undefined && config.historyFile.trim() === '') {
    warnings.push('historyFile must not be empty');
  }

  return warnings;
}

/**
 * Load the global config file.
 * A missing file is not an error; an unreadable one is reported as a warning.
 */
export function loadGlobalConfig(configPath: string = ShellPaths.config()): {
  config: ShellConfig | null;
  configPath: string | null;
} {
  if (!fs.existsSync(configPath)) {
    return { config: null, configPath: null };
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const { config, warnings } = parseConfig(JSON.parse(content));
    for (const warning of [...warnings, ...validateConfig(config)]) {
      logger.warn(`${configPath}: ${warning}`);
    }
    return { config, configPath };
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return { config: null, configPath };
  }
}

/**
 * Merge defaults, the config file and CLI options. CLI options win.
 */
export function resolveConfig(
  fileConfig: ShellConfig | null,
  cli: CliOptions = {},
  cwd: string = process.cwd()
): ResolvedConfig {
  const file = fileConfig ?? {};

  const agentsDir = cli.agentsDir || file.agentsDir;
  const historyFile = cli.historyFile || file.historyFile;

  let logLevel = parseLogLevel(cli);
  if (logLevel === LogLevel.NORMAL && file.logLevel) {
    logLevel = logLevelFromName(file.logLevel) ?? LogLevel.NORMAL;
  }

  return {
    agentsDir: agentsDir ? path.resolve(cwd, agentsDir) : ShellPaths.agents(cwd),
    historyFile: historyFile ? path.resolve(cwd, historyFile) : ShellPaths.history(),
    loadDefaultAgent: cli.defaultAgent === false ? false : file.loadDefaultAgent ?? true,
    logLevel,
  };
}
