import { DownloadFailedError, InvalidInputError, getLogger } from '../utils';
import type { EnvConfig } from '../config/env';
import { findCookiesFile, resolveCookieSource } from '../cookies';
import { runDownload } from '../core';
import { runInteractive } from '../interactive';
import type { Prompter } from '../interactive';
import { listFormats } from '../ytdlp';
import type { ToolRunner } from '../ytdlp';
import { buildRequest } from './program';
import type { CliOptions } from './types';

export interface CliDeps {
  env: EnvConfig;
  runner: ToolRunner;
  createPrompter: () => Prompter;
  /** Whether stdin is a terminal the prompts can read from */
  isTTY: boolean;
  /** Write usage help to stderr */
  showHelp: () => void;
  /** Directory searched for cookies files in interactive mode */
  cwd?: string;
}

/**
 * Dispatch a parsed command line: prompt flow, format listing, or a download
 */
export async function executeCli(urls: string[], options: CliOptions, deps: CliDeps): Promise<void> {
  const logger = getLogger({ verbose: Boolean(options.verbose) || deps.env.verbose });
  const { runner } = deps;

  if (options.interactive || urls.length === 0) {
    if (!options.interactive && !deps.isTTY) {
      deps.showHelp();
      throw InvalidInputError.fromMissingUrls();
    }
    if (urls.length > 0) {
      logger.warn('URLs given on the command line are ignored in interactive mode');
    }
    const cookiesFile = await findCookiesFile(deps.cwd);
    await runInteractive({ prompter: deps.createPrompter(), runner, cookiesFile });
    return;
  }

  const cookies = await resolveCookieSource({
    cookies: options.cookies,
    browser: options.browser,
    fallbackCookies: deps.env.defaultCookiesFile,
  });

  logger.debug('Parsed CLI arguments:');
  logger.debug(`  URLs: ${urls.join(' ')}`);
  logger.debug(`  Cookies: ${cookies.kind}`);

  if (options.listFormats) {
    await runner.checkInstalled();
    if (urls.length > 1) {
      logger.warn(`Listing formats for the first URL only (${urls[0]})`);
    }
    const exitCode = await listFormats(runner, urls[0], cookies);
    if (exitCode !== 0) {
      throw new DownloadFailedError(exitCode, `Error getting formats: ${runner.bin} exited with status ${exitCode}`);
    }
    return;
  }

  await runDownload(buildRequest(urls, options, cookies), runner);
}
