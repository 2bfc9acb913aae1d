/**
 * Base Command Class for the confstore CLI
 *
 * Provides common output and error handling for all commands, and access
 * to the configured store through the dependency injection service.
 */

import { Command } from 'commander';
import { isNotFound } from '@confstore/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/** Process exit code when the requested entry does not exist */
export const EXIT_NOT_FOUND = 2;

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> implements ICommand {
  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode,
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error instanceof Error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Reports a failed store operation. Missing entries exit with EXIT_NOT_FOUND.
   */
  protected handleStoreError(action: string, error: unknown, options: TOptions): void {
    const reason = error instanceof Error ? error.message : String(error);
    this.handleError(`Failed to ${action}: ${reason}`, options, error, isNotFound(error) ? EXIT_NOT_FOUND : 1);
  }

  /**
   * Handle successful output consistently
   *
   * @param data - payload of the JSON envelope
   * @param message - status line for humans
   * @param text - body for humans (documents, listings)
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, text?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data,
      }, null, 2));
      return;
    }
    if (isQuiet) return;
    if (message) {
      console.log(`✅ ${message}`);
    }
    if (text) {
      console.log(text);
    }
  }
}
