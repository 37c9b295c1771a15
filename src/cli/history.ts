// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Line history persisted across sessions.
 */

import { existsSync, readFileSync, appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../logger.js';

export const MAX_HISTORY_SIZE = 1000;

/**
 * Patterns that indicate sensitive data which should not be saved to history.
 */
const SENSITIVE_PATTERNS: RegExp[] = [
  // API keys and tokens
  /api[_-]?key\s*[=:]/i,
  /auth[_-]?token\s*[=:]/i,
  /bearer\s+[a-z0-9_-]+/i,
  /--key[=\s]/i,
  /--token[=\s]/i,
  /--api-key[=\s]/i,

  // Passwords and secrets
  /password\s*[=:]/i,
  /passwd\s*[=:]/i,
  /secret\s*[=:]/i,
  /--password[=\s]/i,
  /--secret[=\s]/i,

  // Common key formats
  /sk-[a-zA-Z0-9]{20,}/,
  /xoxb-[a-zA-Z0-9-]+/,
  /ghp_[a-zA-Z0-9]+/,
];

/**
 * Check if a line contains sensitive patterns that should not be saved.
 */
export function containsSensitivePattern(line: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(line));
}

/**
 * Load line history from file.
 * Node.js readline shows index 0 first when pressing UP, so newest must be first.
 */
export function loadHistory(file: string, maxSize: number = MAX_HISTORY_SIZE): string[] {
  try {
    if (existsSync(file)) {
      const content = readFileSync(file, 'utf-8');
      const lines = content.split('\n').filter((line) => line.trim());
      // File has oldest first, newest last. Reverse so newest is at index 0.
      return lines.slice(-maxSize).reverse();
    }
  } catch (error) {
    logger.debug(`Could not read history ${file}: ${error instanceof Error ? error.message : error}`);
  }
  return [];
}

/**
 * Append a line to the history file.
 * Lines containing sensitive patterns (API keys, passwords, etc.) are skipped.
 * @returns whether the line was written
 */
export function saveToHistory(file: string, line: string): boolean {
  if (containsSensitivePattern(line)) {
    logger.debug('Skipping line with sensitive pattern from history');
    return false;
  }

  try {
    mkdirSync(dirname(file), { recursive: true });
    appendFileSync(file, line + '\n');
    return true;
  } catch (error) {
    logger.debug(`Could not write history ${file}: ${error instanceof Error ? error.message : error}`);
    return false;
  }
}
