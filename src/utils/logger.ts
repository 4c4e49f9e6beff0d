/**
 * Logger utility with verbose mode support
 * - info(): always prints
 * - debug(): only prints with --verbose
 * - command(): echoes the external command line (verbose only)
 */

export interface LoggerConfig {
  verbose?: boolean;
}

const PREFIX = '[ytgrab]';

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
}

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Print the command about to be run, shell-quoted so it can be pasted
   */
  command(bin: string, args: string[]): void {
    this.debug(`Running: ${[bin, ...args].map(quoteArg).join(' ')}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger, quoteArg };
