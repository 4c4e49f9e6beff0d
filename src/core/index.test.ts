import { jest } from '@jest/globals';
import { runDownload } from './index';
import { DownloadFailedError, ToolNotFoundError } from '../utils/errors';
import { resetLogger } from '../utils/logger';
import type { ToolRunner } from '../ytdlp/runner';
import type { DownloadRequest, RunResult } from '../ytdlp/types';

function createFakeRunner(result: RunResult) {
  const checkInstalled = jest.fn<() => Promise<string>>().mockResolvedValue('2024.08.06');
  const run = jest.fn<(args: string[]) => Promise<RunResult>>().mockResolvedValue(result);
  const runner: ToolRunner = { bin: 'yt-dlp', checkInstalled, run };
  return { runner, checkInstalled, run };
}

const request: DownloadRequest = {
  urls: ['https://youtu.be/one'],
  mode: { kind: 'video' },
  outputTemplate: '%(title)s.%(ext)s',
  subtitles: false,
  playlist: false,
  metadata: true,
  thumbnail: false,
  sponsorblock: false,
  cookies: { kind: 'none' },
};

describe('runDownload', () => {
  beforeEach(() => {
    resetLogger();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('checks the tool, runs the built arguments, and reports success', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const { runner, checkInstalled, run } = createFakeRunner({ exitCode: 0 });

    await runDownload(request, runner);

    expect(checkInstalled).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith([
      '-f',
      'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]',
      '-o',
      '%(title)s.%(ext)s',
      '--no-playlist',
      '--add-metadata',
      'https://youtu.be/one',
    ]);
    expect(log).toHaveBeenCalledWith('[ytgrab] Download completed successfully!');
  });

  it('skips the install check when asked to', async () => {
    const { runner, checkInstalled, run } = createFakeRunner({ exitCode: 0 });

    await runDownload(request, runner, { verifyInstalled: false });

    expect(checkInstalled).not.toHaveBeenCalled();
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('propagates the exit status of a failed download', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const { runner } = createFakeRunner({ exitCode: 2 });

    const error = await runDownload(request, runner).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DownloadFailedError);
    expect(error).toMatchObject({
      code: 2,
      message: 'Error downloading video: yt-dlp exited with status 2',
    });
    expect(log).not.toHaveBeenCalledWith('[ytgrab] Download completed successfully!');
  });

  it('reports the signal when the download was interrupted', async () => {
    const { runner } = createFakeRunner({ exitCode: 130, signal: 'SIGINT' });

    await expect(runDownload(request, runner)).rejects.toMatchObject({
      code: 130,
      message: 'Error downloading video: yt-dlp terminated by SIGINT',
    });
  });

  it('does not run anything when the tool is missing', async () => {
    const { runner, checkInstalled, run } = createFakeRunner({ exitCode: 0 });
    checkInstalled.mockRejectedValueOnce(ToolNotFoundError.fromBinary('yt-dlp'));

    await expect(runDownload(request, runner)).rejects.toBeInstanceOf(ToolNotFoundError);
    expect(run).not.toHaveBeenCalled();
  });
});
