/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: process exit code
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger';

export const YTDLP_INSTALL_URL = 'https://github.com/yt-dlp/yt-dlp#installation';

/**
 * Base error class with exit code
 */
export abstract class YtgrabError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: conflicting flags, missing URLs, malformed option values
 */
export class InvalidInputError extends YtgrabError {
  readonly code = 1;

  static fromConflictingCookieOptions(): InvalidInputError {
    return new InvalidInputError(
      'Please specify either --cookies or --browser, not both',
      '--cookies reads a Netscape cookies file; --browser extracts cookies from an installed browser'
    );
  }

  static fromMissingUrls(): InvalidInputError {
    return new InvalidInputError(
      'At least one URL is required. Usage: ytgrab <urls...> [options]',
      'Run ytgrab without arguments in a terminal to use the interactive prompts'
    );
  }
}

/**
 * Downloader executable missing or not runnable (exit code 127, as a shell would report)
 */
export class ToolNotFoundError extends YtgrabError {
  readonly code = 127;

  static fromBinary(bin: string, reason?: string): ToolNotFoundError {
    return new ToolNotFoundError(
      `${bin} not found. Please install it first. Installation instructions: ${YTDLP_INSTALL_URL}`,
      reason ?? `Set YTGRAB_BIN if ${bin} is installed outside PATH`
    );
  }
}

/**
 * The downloader ran and exited non-zero; its exit code is passed through
 */
export class DownloadFailedError extends YtgrabError {
  readonly code: number;

  constructor(exitCode: number, message?: string, details?: string) {
    super(message ?? `Error downloading video: yt-dlp exited with status ${exitCode}`, details);
    this.code = exitCode > 0 ? exitCode : 1;
  }
}

/**
 * User cancelled the prompt flow (exit code 0)
 */
export class CancelledError extends YtgrabError {
  readonly code = 0;

  constructor(message: string = 'Operation canceled by user.') {
    super(message);
  }

  log(): void {
    getLogger().info(this.message);
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof YtgrabError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof YtgrabError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
