// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Visual feedback while the shell waits on an agent, using ora.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    try {
      if (this.spinner) {
        this.spinner.stop();
      }

      this.spinner = ora({
        text,
        color: 'cyan',
        spinner: 'dots',
        discardStdin: false, // Don't interfere with readline's stdin handling
      }).start();
    } catch {
      // A spinner that fails to render must not take the shell down
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner with a success message.
   */
  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    try {
      if (this.spinner) {
        this.spinner.stop();
        this.spinner = null;
      }
    } catch {
      this.spinner = null;
    }
  }

  // ============================================
  // Convenience methods for common operations
  // ============================================

  modelSetup(agentName: string): void {
    this.start(chalk.cyan(`Setting up model provider for ${agentName}...`));
  }

  awaitingReply(agentName: string): void {
    this.start(chalk.cyan(`${agentName} is thinking...`));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
