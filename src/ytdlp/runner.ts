import { getLogger } from '../utils/logger';
import { ToolNotFoundError } from '../utils/errors';
import { run as defaultExec } from '../utils/exec';
import type { ExecFn, ExecResult } from '../utils/exec';
import { buildFormatListArgs } from './args';
import type { CookieSource, RunResult } from './types';

export interface ToolRunner {
  readonly bin: string;
  /** Resolves to the reported version; throws ToolNotFoundError when the tool cannot run */
  checkInstalled(): Promise<string>;
  /** Runs the tool with stdio inherited so its output reaches the user unchanged */
  run(args: string[]): Promise<RunResult>;
}

const SIGNAL_EXIT_CODES: Record<string, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createYtDlpRunner(bin: string = 'yt-dlp', exec: ExecFn = defaultExec): ToolRunner {
  const spawn = async (args: string[], inherit: boolean): Promise<ExecResult> => {
    try {
      return await exec(bin, args, { inherit });
    } catch (error) {
      throw ToolNotFoundError.fromBinary(bin, describeFailure(error));
    }
  };

  const checkInstalled = async (): Promise<string> => {
    const result = await spawn(['--version'], false);
    if (result.exitCode !== 0) {
      throw ToolNotFoundError.fromBinary(bin, result.stderr.trim() || undefined);
    }
    return result.stdout.trim();
  };

  const run = async (args: string[]): Promise<RunResult> => {
    getLogger().command(bin, args);

    const result = await spawn(args, true);
    if (result.exitCode !== null) {
      return { exitCode: result.exitCode };
    }

    // No exit code: either killed by a signal or never spawned
    if (result.signal) {
      return { exitCode: SIGNAL_EXIT_CODES[result.signal] ?? 1, signal: result.signal };
    }
    throw ToolNotFoundError.fromBinary(bin, `Failed to start: ${result.command}`);
  };

  return { bin, checkInstalled, run };
}

/**
 * Print the available formats for a URL and resolve to the listing's exit code
 * A failed listing is reported as a warning; callers decide whether it is fatal
 */
export async function listFormats(
  runner: ToolRunner,
  url: string,
  cookies?: CookieSource
): Promise<number> {
  const logger = getLogger();
  logger.info('Available formats:');

  const { exitCode } = await runner.run(buildFormatListArgs(url, cookies));
  if (exitCode !== 0) {
    logger.warn(`Error getting formats: ${runner.bin} exited with status ${exitCode}`);
  }
  return exitCode;
}
