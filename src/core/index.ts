import { getLogger } from '../utils/logger';
import { DownloadFailedError } from '../utils/errors';
import { buildDownloadArgs } from '../ytdlp/args';
import type { ToolRunner } from '../ytdlp/runner';
import type { DownloadRequest } from '../ytdlp/types';

function describeRequest(request: DownloadRequest): string {
  const mode = request.mode.kind === 'format' ? `format ${request.mode.selector}` : request.mode.kind;
  const cookies =
    request.cookies.kind === 'file'
      ? `file ${request.cookies.path}`
      : request.cookies.kind === 'browser'
        ? `browser ${request.cookies.browser}`
        : 'none';
  return `${request.urls.length} URL(s), mode: ${mode}, cookies: ${cookies}`;
}

export interface DownloadOptions {
  /** Run `yt-dlp --version` first (default: true) */
  verifyInstalled?: boolean;
}

/**
 * Run one yt-dlp download for the request
 * Resolves on success; a non-zero exit becomes a DownloadFailedError carrying yt-dlp's status
 */
export async function runDownload(
  request: DownloadRequest,
  runner: ToolRunner,
  options?: DownloadOptions
): Promise<void> {
  const logger = getLogger();

  if (options?.verifyInstalled ?? true) {
    const version = await runner.checkInstalled();
    logger.debug(`Using ${runner.bin} ${version}`);
  }
  logger.debug(`Download request: ${describeRequest(request)}`);

  const { exitCode, signal } = await runner.run(buildDownloadArgs(request));

  if (exitCode !== 0) {
    const reason = signal ? `terminated by ${signal}` : `exited with status ${exitCode}`;
    throw new DownloadFailedError(exitCode, `Error downloading video: ${runner.bin} ${reason}`);
  }

  logger.info('Download completed successfully!');
}
